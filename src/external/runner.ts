/**
 * Per-record script invocation for for_each.
 */

import { ChannelDecodeError, decodeChannelText, decodeObjectList } from "../channel/index.js";
import { RUN_ID_ENV, type Logger } from "../logging/index.js";
import type { DataRecord, ObjectList } from "../records/index.js";
import { passRecord, type PassMode } from "./passing.js";
import { lastLine, runProcess } from "./process.js";
import type { ResolvedScript } from "./resolve.js";

export interface RecordInvocation {
  readonly script: ResolvedScript;
  /** The script's fixed argument template */
  readonly fixedArgs: readonly string[];
  readonly record: DataRecord;
  readonly index: number;
  readonly total: number;
  readonly passMode: PassMode;
}

export type ScriptOutcome =
  | { readonly kind: "success"; readonly output: ObjectList }
  | {
      readonly kind: "failure";
      readonly reason: string;
      readonly exitCode: number | null;
      /** Whatever the script printed that still decodes */
      readonly partial: ObjectList;
    }
  | { readonly kind: "cancelled" };

export interface ScriptRunner {
  run(invocation: RecordInvocation, signal?: AbortSignal): Promise<ScriptOutcome>;
}

export interface ChildProcessRunnerOptions {
  runId: string;
  killGraceMs?: number;
  cwd?: string;
  logger?: Logger;
}

/**
 * Blank output means the script emitted zero records.
 *
 * @throws ChannelDecodeError on invalid UTF-8 or an undecodable list
 */
export function decodeScriptOutput(stdout: Uint8Array): ObjectList {
  const text = decodeChannelText(stdout);
  return text.trim() === "" ? [] : decodeObjectList(text);
}

function decodePartial(stdout: Uint8Array): ObjectList {
  try {
    return decodeScriptOutput(stdout);
  } catch (err) {
    if (err instanceof ChannelDecodeError) {
      return [];
    }
    throw err;
  }
}

export function describeExit(exitCode: number | null, signal: NodeJS.Signals | null, stderr: string): string {
  const status = exitCode !== null ? `exit code ${exitCode}` : `killed by ${signal ?? "unknown signal"}`;
  const detail = lastLine(stderr);
  return detail ? `${status}: ${detail}` : status;
}

/**
 * Runs one child process per record.
 */
export class ChildProcessScriptRunner implements ScriptRunner {
  private readonly options: ChildProcessRunnerOptions;

  constructor(options: ChildProcessRunnerOptions) {
    this.options = options;
  }

  async run(invocation: RecordInvocation, signal?: AbortSignal): Promise<ScriptOutcome> {
    const { script, record } = invocation;
    const passing = passRecord(record, invocation.passMode);

    const result = await runProcess({
      command: script.command,
      args: [...script.prefixArgs, script.path, ...invocation.fixedArgs, ...passing.args],
      stdin: passing.stdin,
      env: {
        ...passing.env,
        [RUN_ID_ENV]: this.options.runId,
        GRAPHPIPE_RECORD_INDEX: String(invocation.index),
        GRAPHPIPE_RECORD_COUNT: String(invocation.total),
      },
      cwd: this.options.cwd,
      signal,
      killGraceMs: this.options.killGraceMs,
    });

    if (result.stderr.trim() !== "") {
      this.options.logger?.debug("Script stderr", { index: invocation.index, stderr: result.stderr });
    }

    if (result.cancelled) {
      return { kind: "cancelled" };
    }

    if (result.spawnError) {
      return {
        kind: "failure",
        reason: `could not run ${script.command}: ${result.spawnError.message}`,
        exitCode: result.exitCode,
        partial: [],
      };
    }

    if (result.exitCode !== 0) {
      return {
        kind: "failure",
        reason: describeExit(result.exitCode, result.signal, result.stderr),
        exitCode: result.exitCode,
        partial: decodePartial(result.stdout),
      };
    }

    try {
      return { kind: "success", output: decodeScriptOutput(result.stdout) };
    } catch (err) {
      if (err instanceof ChannelDecodeError) {
        return { kind: "failure", reason: `${err.name}: ${err.message}`, exitCode: 0, partial: [] };
      }
      throw err;
    }
  }
}
