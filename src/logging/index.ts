/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, RUN_ID_ENV } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
