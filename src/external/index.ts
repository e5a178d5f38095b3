/**
 * External scripts: resolution, record passing and child process plumbing.
 */

export {
  PASS_MODES,
  RECORD_ENV,
  FIELD_ENV_PREFIX,
  isPassMode,
  passRecord,
  fieldToText,
  fieldEnvName,
  type PassMode,
  type RecordPassing,
} from "./passing.js";

export { runProcess, lastLine, type ProcessRequest, type ProcessResult } from "./process.js";

export {
  resolveScript,
  isScriptFile,
  type ResolvedScript,
  type InterpreterOptions,
} from "./resolve.js";

export {
  ChildProcessScriptRunner,
  decodeScriptOutput,
  describeExit,
  type RecordInvocation,
  type ScriptOutcome,
  type ScriptRunner,
  type ChildProcessRunnerOptions,
} from "./runner.js";

export { createScriptStage, createScriptStageFactory, type ScriptStageOptions } from "./script-stage.js";
