/**
 * An external script used directly as a pipeline stage.
 *
 * The script runs once, gets the whole input list on stdin and prints an
 * ObjectList on stdout. Its exit code is the stage status. Output is
 * decoded for status 0 and 1 (partial success) and discarded otherwise.
 */

import { encodeObjectList } from "../channel/index.js";
import { RUN_ID_ENV } from "../logging/index.js";
import { ExitCode, type Operation, type ScriptStageFactory } from "../pipeline/index.js";
import { runProcess } from "./process.js";
import { isScriptFile, resolveScript, type InterpreterOptions, type ResolvedScript } from "./resolve.js";
import { decodeScriptOutput, describeExit } from "./runner.js";

export interface ScriptStageOptions extends InterpreterOptions {
  killGraceMs?: number;
}

export function createScriptStage(name: string, script: ResolvedScript, options: ScriptStageOptions = {}): Operation {
  return {
    name,
    summary: `external script ${script.path}`,
    usage: `${name} [args...]`,
    input: "optional",
    validate() {
      // Arguments belong to the script
    },
    async run(args, input, ctx) {
      const result = await runProcess({
        command: script.command,
        args: [...script.prefixArgs, script.path, ...args],
        stdin: input ? encodeObjectList(input) : "",
        env: { [RUN_ID_ENV]: ctx.runId },
        signal: ctx.signal,
        killGraceMs: options.killGraceMs,
      });

      if (result.cancelled) {
        return { output: [], status: ExitCode.Cancelled };
      }
      if (result.spawnError) {
        throw new Error(`could not run ${script.command}: ${result.spawnError.message}`);
      }

      const status = result.exitCode ?? ExitCode.Failed;
      if (status !== ExitCode.Success) {
        ctx.logger.warn("Script stage exited with non-zero status", {
          script: script.path,
          reason: describeExit(result.exitCode, result.signal, result.stderr),
        });
      }
      if (status !== ExitCode.Success && status !== ExitCode.PartialFailure) {
        return { output: [], status };
      }
      return { output: decodeScriptOutput(result.stdout), status };
    },
  };
}

/**
 * Catch-all for the registry: any path to an existing file is a script stage.
 */
export function createScriptStageFactory(options: ScriptStageOptions = {}): ScriptStageFactory {
  return (name) => (isScriptFile(name) ? createScriptStage(name, resolveScript(name, options), options) : undefined);
}
