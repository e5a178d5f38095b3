/**
 * graphpipe command line.
 *
 * Usage:
 *   graphpipe [--verbose] [--summary] [--manifest <file>] [--pretty] <command>
 *
 * Commands:
 *   <operation> [args...]   Run one operation; input is read from stdin when piped
 *   run "<pipeline>"        Compose and run a chain of stages
 *   list                    List operations (as an object list)
 *   help                    Show this help
 *
 * Options:
 *   --verbose               Mirror log entries to stderr
 *   --summary               Print the record failure summary to stderr
 *   --manifest <file>       Write the failure manifest to a file as an object list
 *   --pretty                Indent the object list on stdout
 *
 * Exit codes:
 *   0   - Success
 *   1   - Partial failure: some records failed
 *   2   - A stage failed, every record failed, fail-fast tripped, or input could not be decoded
 *   3   - Invalid pipeline or configuration: nothing ran
 *   130 - Cancelled
 */

import { writeFile } from "node:fs/promises";
import type { Writable } from "node:stream";

import {
  ChannelDecodeError,
  encodeObjectList,
  readOptionalObjectList,
  writeObjectList,
  type BlobStore,
  type ByteSource,
} from "../channel/index.js";
import { ConfigError } from "../config/index.js";
import { failuresToObjectList, formatFailureSummary } from "../foreach/index.js";
import type { Logger } from "../logging/index.js";
import {
  ExitCode,
  OperationRegistry,
  PipelineError,
  ResolutionError,
  parsePipeline,
  parsePipelineArgv,
  resolvePipeline,
  runPipeline,
  type Operation,
  type PipelineResult,
  type Stage,
} from "../pipeline/index.js";
import { RecordValidationError, createObjectList, type ObjectList } from "../records/index.js";

// ============================================================
// Types
// ============================================================

export interface GlobalOptions {
  verbose: boolean;
  summary: boolean;
  pretty: boolean;
  manifest?: string;
  help: boolean;
}

export interface CliIO {
  stdin: ByteSource;
  /** Stdin is a terminal: nothing was piped */
  stdinIsTTY: boolean;
  stdout: Writable;
  stderr: { write(chunk: string): unknown };
}

export interface CliDeps {
  io: CliIO;
  /** Called once the global options are known */
  createLogger(options: { verbose: boolean }): Logger;
  createRegistry(logger: Logger): OperationRegistry;
  blobs: BlobStore;
  runId: string;
  signal?: AbortSignal;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `Usage: graphpipe [--verbose] [--summary] [--manifest <file>] [--pretty] <command>

Commands:
  <operation> [args...]   Run one operation; input is read from stdin when piped
  run "<pipeline>"        Compose and run a chain, e.g.
                          run "search_attachments --query invoice > save_attachments %"
  list                    List operations
  help                    Show this help

Stages are separated by '>'; '%' binds the previous stage's output as input.
Any other stage name that is a path to a file runs as an external script.`;

// ============================================================
// Argument handling
// ============================================================

/**
 * Split leading global options from the command.
 *
 * @throws CliUsageError for an unknown global option
 */
export function parseGlobalOptions(argv: readonly string[]): { options: GlobalOptions; rest: string[] } {
  const options: GlobalOptions = { verbose: false, summary: false, pretty: false, help: false };
  let i = 0;

  for (; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined || !arg.startsWith("-")) break;

    if (arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "--summary") {
      options.summary = true;
    } else if (arg === "--pretty") {
      options.pretty = true;
    } else if (arg === "-h" || arg === "--help") {
      options.help = true;
    } else if (arg === "--manifest") {
      const file = argv[++i];
      if (file === undefined) {
        throw new CliUsageError("--manifest needs a file path");
      }
      options.manifest = file;
    } else if (arg.startsWith("--manifest=")) {
      options.manifest = arg.slice("--manifest=".length);
    } else {
      throw new CliUsageError(`unknown option: ${arg}`);
    }
  }

  return { options, rest: argv.slice(i) };
}

/**
 * The first stage's operation, if it resolves; resolvePipeline reports it
 * with its location otherwise.
 */
function peekOperation(registry: OperationRegistry, name: string): Operation | undefined {
  try {
    return registry.resolve(name);
  } catch (err) {
    if (err instanceof ResolutionError) {
      return undefined;
    }
    throw err;
  }
}

function composeCommand(command: string, args: readonly string[]): readonly Stage[] {
  if (command !== "run") {
    return parsePipelineArgv([command, ...args]);
  }
  if (args.length === 0) {
    throw new CliUsageError('run needs a pipeline, e.g. run "find_files --query report > download_files %"');
  }
  // One quoted argument is tokenized here; several are taken as already split by the shell
  const [only] = args;
  return args.length === 1 && only !== undefined ? parsePipeline(only) : parsePipelineArgv(args);
}

// ============================================================
// Output
// ============================================================

function operationList(registry: OperationRegistry): ObjectList {
  return createObjectList(
    registry.list().map((operation) => ({
      name: operation.name,
      input: operation.input,
      summary: operation.summary,
      usage: operation.usage,
    }))
  );
}

async function report(result: PipelineResult, options: GlobalOptions, io: CliIO): Promise<void> {
  if (result.failedStage !== undefined) {
    const stage = result.stages[result.failedStage];
    const status = stage ? ` (${stage.operation}) failed with status ${stage.status}` : " failed";
    io.stderr.write(`graphpipe: stage ${result.failedStage}${status}\n`);
  }
  if (result.cancelled) {
    const at = result.cancelledStage !== undefined ? ` at stage ${result.cancelledStage}` : "";
    io.stderr.write(`graphpipe: cancelled${at}\n`);
  }

  if (options.summary) {
    io.stderr.write(formatFailureSummary(result.failures) + "\n");
  } else if (result.failures.length > 0) {
    io.stderr.write(`graphpipe: ${result.failures.length} record(s) did not succeed; rerun with --summary for details\n`);
  }

  if (options.manifest !== undefined) {
    await writeFile(options.manifest, encodeObjectList(failuresToObjectList(result.failures), { pretty: true }) + "\n");
  }
}

function exitCodeFor(err: unknown): number {
  if (err instanceof PipelineError) return err.exitCode;
  if (err instanceof CliUsageError || err instanceof ConfigError) return ExitCode.InvalidPipeline;
  return ExitCode.Failed;
}

function describeError(err: unknown): string {
  if (err instanceof PipelineError) return err.describe();
  if (err instanceof ChannelDecodeError) return `stdin: ${err.format()}`;
  if (err instanceof RecordValidationError) return err.format();
  return err instanceof Error ? err.message : String(err);
}

// ============================================================
// Main
// ============================================================

/**
 * Run graphpipe and return the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const { io } = deps;

  let parsed: { options: GlobalOptions; rest: string[] };
  try {
    parsed = parseGlobalOptions(argv);
  } catch (err) {
    io.stderr.write(`graphpipe: ${describeError(err)}\n\n${USAGE}\n`);
    return ExitCode.InvalidPipeline;
  }

  const { options, rest } = parsed;
  const [command, ...args] = rest;
  if (options.help || command === "help") {
    io.stderr.write(USAGE + "\n");
    return ExitCode.Success;
  }
  if (command === undefined) {
    io.stderr.write(USAGE + "\n");
    return ExitCode.InvalidPipeline;
  }

  const logger = deps.createLogger({ verbose: options.verbose });

  try {
    const registry = deps.createRegistry(logger);

    if (command === "list") {
      await writeObjectList(io.stdout, operationList(registry), { pretty: options.pretty });
      return ExitCode.Success;
    }

    const stages = composeCommand(command, args);
    const first = stages[0];
    const firstOperation = first ? peekOperation(registry, first.operation) : undefined;

    // Stdin is only consumed when the first stage can take a list
    const initialInput =
      firstOperation && firstOperation.input !== "none" && !io.stdinIsTTY
        ? await readOptionalObjectList(io.stdin)
        : undefined;

    const plan = resolvePipeline(stages, registry, { externalInput: initialInput !== undefined });
    logger.info("Pipeline starting", {
      stages: plan.map((resolved) => resolved.operation.name),
      input: initialInput?.length ?? null,
    });

    const result = await runPipeline(plan, {
      initialInput,
      signal: deps.signal,
      logger,
      blobs: deps.blobs,
      runId: deps.runId,
    });

    await writeObjectList(io.stdout, result.output, { pretty: options.pretty });
    await report(result, options, io);

    logger.info("Pipeline finished", {
      exitCode: result.exitCode,
      records: result.output.length,
      failures: result.failures.length,
    });
    return result.exitCode;
  } catch (err) {
    logger.error("Pipeline aborted", { error: describeError(err) });
    io.stderr.write(`graphpipe: ${describeError(err)}\n`);
    return exitCodeFor(err);
  }
}
