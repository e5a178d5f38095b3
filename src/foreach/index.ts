/**
 * for_each: per-record script execution with a failure manifest.
 */

export { ForEachExecutor, type ExecutorState, type ForEachOptions, type ForEachResult } from "./executor.js";
export {
  createForEachOperation,
  parseForEachArgs,
  type ForEachArgs,
  type ForEachOperationOptions,
} from "./operation.js";
export {
  countFailures,
  summarizeBatch,
  formatFailureSummary,
  failuresToObjectList,
  type BatchCounts,
} from "./manifest.js";
