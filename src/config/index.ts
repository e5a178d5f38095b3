/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";
import { PASS_MODES, isPassMode, type PassMode } from "../external/passing.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError, type EnvSource } from "./env.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const ENVIRONMENTS = ["development", "production", "test"] as const;

export interface GraphCredentials {
  readonly tenantId: string;
  readonly clientId: string;
  readonly clientSecret: string;
  /** Mailbox / drive owner the app-only token acts on */
  readonly userId: string;
}

export interface ForEachDefaults {
  readonly concurrency: number;
  readonly failFast: boolean;
  readonly passMode: PassMode;
  readonly killGraceMs: number;
}

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: LogLevel;
  readonly logDir: string;
  readonly logFile: string;
  readonly logToFile: boolean;
  /** Mirror log lines to stderr */
  readonly logToConsole: boolean;
  /** Where operations write binary content they were not told to put elsewhere */
  readonly blobDir: string;
  readonly forEach: ForEachDefaults;
  /** Interpreter used for .py scripts */
  readonly python: string;
  readonly graphBaseUrl: string;
  /** Undefined until all four GRAPH_* variables are set */
  readonly graph?: GraphCredentials;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function loadGraphCredentials(env: EnvSource): GraphCredentials | undefined {
  const keys = ["GRAPH_TENANT_ID", "GRAPH_CLIENT_ID", "GRAPH_CLIENT_SECRET", "GRAPH_USER_ID"];
  if (keys.every((key) => !env[key])) {
    return undefined;
  }
  return {
    tenantId: requireEnv("GRAPH_TENANT_ID", env),
    clientId: requireEnv("GRAPH_CLIENT_ID", env),
    clientSecret: requireEnv("GRAPH_CLIENT_SECRET", env),
    userId: requireEnv("GRAPH_USER_ID", env),
  };
}

/**
 * Load and validate application configuration.
 * Fails fast on malformed values; Graph credentials are only checked for
 * completeness once any of them is present.
 */
export function loadConfig(env: EnvSource = process.env): Readonly<AppConfig> {
  const logLevel = optionalEnv("LOG_LEVEL", "info", env).toLowerCase();
  const passMode = optionalEnv("GRAPHPIPE_PASS_MODE", "stdin", env).toLowerCase();

  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }
  if (!isPassMode(passMode)) {
    throw new ConfigError(
      `Invalid GRAPHPIPE_PASS_MODE: ${passMode}. Must be one of ${PASS_MODES.join(", ")}.`
    );
  }

  const graph = loadGraphCredentials(env);
  const config: AppConfig = {
    env: optionalEnv("NODE_ENV", "development", env),
    logLevel,
    logDir: optionalEnv("GRAPHPIPE_LOG_DIR", "logs", env),
    logFile: optionalEnv("GRAPHPIPE_LOG_FILE", "graphpipe.log", env),
    logToFile: optionalEnvBool("GRAPHPIPE_LOG_TO_FILE", true, env),
    logToConsole: optionalEnvBool("GRAPHPIPE_LOG_CONSOLE", false, env),
    blobDir: optionalEnv("GRAPHPIPE_BLOB_DIR", ".graphpipe/blobs", env),
    forEach: Object.freeze({
      concurrency: optionalEnvInt("GRAPHPIPE_CONCURRENCY", 1, env),
      failFast: optionalEnvBool("GRAPHPIPE_FAIL_FAST", false, env),
      passMode,
      killGraceMs: optionalEnvInt("GRAPHPIPE_KILL_GRACE_MS", 5000, env),
    }),
    python: optionalEnv("GRAPHPIPE_PYTHON", "python3", env),
    graphBaseUrl: optionalEnv("GRAPH_BASE_URL", "https://graph.microsoft.com/v1.0", env),
    ...(graph ? { graph: Object.freeze(graph) } : {}),
  };

  validateConfig(config);
  return Object.freeze(config);
}

/**
 * Validate value ranges that the loaders cannot express.
 */
export function validateConfig(config: AppConfig): void {
  if (!(ENVIRONMENTS as readonly string[]).includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (config.forEach.concurrency < 1) {
    throw new ConfigError(
      `Invalid GRAPHPIPE_CONCURRENCY: ${config.forEach.concurrency}. Must be at least 1.`
    );
  }

  if (config.forEach.killGraceMs < 0) {
    throw new ConfigError(
      `Invalid GRAPHPIPE_KILL_GRACE_MS: ${config.forEach.killGraceMs}. Must not be negative.`
    );
  }
}
