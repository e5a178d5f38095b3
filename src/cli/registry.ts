/**
 * The registry graphpipe starts with: Graph operations, for_each, and the
 * script catch-all for any other name that is a path to a file.
 */

import type { AppConfig } from "../config/index.js";
import { ChildProcessScriptRunner, createScriptStageFactory } from "../external/index.js";
import { createForEachOperation } from "../foreach/index.js";
import { createGraphSession, registerGraphOperations, type GraphSession } from "../graph/index.js";
import type { Logger } from "../logging/index.js";
import { OperationRegistry } from "../pipeline/index.js";

export interface RegistryOptions {
  config: AppConfig;
  logger?: Logger;
  /** Defaults to an HTTP session built from the config */
  graph?: GraphSession;
}

export function createDefaultRegistry(options: RegistryOptions): OperationRegistry {
  const { config, logger } = options;
  const interpreters = { python: config.python };

  const registry = new OperationRegistry(
    createScriptStageFactory({ ...interpreters, killGraceMs: config.forEach.killGraceMs })
  );

  registerGraphOperations(registry, options.graph ?? createGraphSession(config, logger));

  registry.register(
    createForEachOperation({
      defaults: config.forEach,
      interpreters,
      createRunner: (ctx) =>
        new ChildProcessScriptRunner({
          runId: ctx.runId,
          killGraceMs: config.forEach.killGraceMs,
          logger: ctx.logger,
        }),
    })
  );

  return registry;
}
