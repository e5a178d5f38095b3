#!/usr/bin/env node
/**
 * Entry point for graphpipe.
 */

import { BlobStore } from "./channel/index.js";
import { createDefaultRegistry } from "./cli/registry.js";
import { runCli } from "./cli/graphpipe.js";
import { loadConfig, ConfigError, type AppConfig } from "./config/index.js";
import { initRunId, createLogger } from "./logging/index.js";
import { ExitCode } from "./pipeline/index.js";

function tryLoadConfig(): AppConfig | undefined {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`graphpipe: configuration error: ${err.message}\n`);
      return undefined;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  // Initialize run ID first; scripts started by for_each inherit it
  const runId = initRunId();

  const config = tryLoadConfig();
  if (!config) {
    return ExitCode.InvalidPipeline;
  }

  // First SIGINT cancels the run cooperatively, a second one exits at once
  const controller = new AbortController();
  process.on("SIGINT", () => {
    if (controller.signal.aborted) {
      process.exit(ExitCode.Cancelled);
    }
    process.stderr.write("graphpipe: interrupting; press Ctrl-C again to exit immediately\n");
    controller.abort();
  });

  return runCli(process.argv.slice(2), {
    io: {
      stdin: process.stdin,
      stdinIsTTY: process.stdin.isTTY === true,
      stdout: process.stdout,
      stderr: process.stderr,
    },
    createLogger: ({ verbose }) =>
      createLogger({
        level: config.logLevel,
        logDir: config.logDir,
        logFile: config.logFile,
        file: config.logToFile,
        console: verbose || config.logToConsole,
      }),
    createRegistry: (logger) => createDefaultRegistry({ config, logger }),
    blobs: new BlobStore(config.blobDir),
    runId,
    signal: controller.signal,
  });
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`graphpipe: unexpected error: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = ExitCode.Failed;
  }
);
