/**
 * Resolve a composed pipeline against the registry.
 *
 * Every stage is resolved, its input binding checked and its arguments
 * validated before the first stage runs. A plan that comes back from here
 * can only fail at run time for reasons outside graphpipe's control.
 */

import { CompositionError, PipelineError, ResolutionError } from "./errors.js";
import { INPUT_PLACEHOLDER } from "./tokenizer.js";
import type { OperationRegistry } from "./registry.js";
import type { InputBinding, Operation, Stage } from "./types.js";

export interface ResolvedStage {
  readonly stage: Stage;
  readonly operation: Operation;
}

export interface ResolveOptions {
  /** A list was piped into graphpipe and is available to the first stage */
  externalInput?: boolean;
}

/**
 * @returns the stage's binding once it is known to be valid
 */
function checkInputBinding(stage: Stage, operation: Operation, externalInput: boolean): InputBinding {
  const location = { stageIndex: stage.index, operation: stage.operation };

  if (operation.input === "none" && stage.usesPrevious) {
    throw new CompositionError(
      `${operation.name} does not take an input list; remove '${INPUT_PLACEHOLDER}'`,
      location
    );
  }

  const hasInput = stage.usesPrevious || (stage.index === 0 && externalInput);
  if (operation.input === "required" && !hasInput) {
    throw new CompositionError(
      stage.index === 0
        ? `${operation.name} needs an input list piped on stdin`
        : `${operation.name} needs an input list; bind the previous stage with '${INPUT_PLACEHOLDER}'`,
      location
    );
  }
  return { hasInput: hasInput && operation.input !== "none" };
}

export function resolveStage(
  stage: Stage,
  registry: OperationRegistry,
  options: ResolveOptions = {}
): ResolvedStage {
  const location = { stageIndex: stage.index, operation: stage.operation };

  let operation: Operation;
  try {
    operation = registry.resolve(stage.operation);
  } catch (err) {
    if (err instanceof ResolutionError) {
      throw new ResolutionError(err.message, location);
    }
    throw err;
  }

  const binding = checkInputBinding(stage, operation, options.externalInput ?? false);

  try {
    operation.validate(stage.args, binding);
  } catch (err) {
    if (err instanceof PipelineError) {
      throw err instanceof ResolutionError
        ? new ResolutionError(err.message, location)
        : new CompositionError(err.message, location);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new CompositionError(`invalid arguments for ${stage.operation}: ${message}`, location);
  }

  return Object.freeze({ stage, operation });
}

/**
 * Resolve and validate all stages, in order.
 *
 * @throws ResolutionError for an unknown operation or script
 * @throws CompositionError for bad input binding or arguments
 */
export function resolvePipeline(
  stages: readonly Stage[],
  registry: OperationRegistry,
  options: ResolveOptions = {}
): readonly ResolvedStage[] {
  return Object.freeze(stages.map((stage) => resolveStage(stage, registry, options)));
}
