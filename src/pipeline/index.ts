/**
 * Pipeline composition and execution.
 *
 * Usage:
 *   const stages = parsePipeline("find_files --query report > download_files %");
 *   const plan = resolvePipeline(stages, registry);
 *   const result = await runPipeline(plan, { logger, blobs, runId });
 */

export {
  ExitCode,
  PipelineError,
  CompositionError,
  ResolutionError,
  StageFailedError,
  CancellationError,
  type StageLocation,
} from "./errors.js";

export type {
  InputMode,
  InputBinding,
  Stage,
  FailureEntry,
  FailureStatus,
  Operation,
  OperationContext,
  OperationResult,
} from "./types.js";

export {
  defineOperation,
  requireOption,
  splitList,
  parsePositiveInt,
  OperationArgumentError,
  type OperationDefinition,
} from "./operation.js";

export {
  tokenizePipeline,
  tokensFromArgv,
  isPlaceholder,
  STAGE_SEPARATOR,
  INPUT_PLACEHOLDER,
  type PipelineToken,
} from "./tokenizer.js";

export { composePipeline, parsePipeline, parsePipelineArgv } from "./composer.js";
export { OperationRegistry, type ScriptStageFactory } from "./registry.js";
export { resolvePipeline, resolveStage, type ResolvedStage, type ResolveOptions } from "./resolver.js";
export { invokeStage, type StageExecution } from "./invoker.js";
export { runPipeline, type RunOptions, type PipelineResult } from "./runner.js";
