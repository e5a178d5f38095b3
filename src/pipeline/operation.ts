/**
 * Helpers for declaring built-in operations.
 *
 * An operation is declared as a pair of functions: `parse` turns the raw
 * argument list into typed parameters (and, with the optional `bind` check,
 * is all that runs during validation), `execute` does the work. Both share
 * the parser, so a stage that validated cannot fail on its arguments later.
 */

import { createObjectList, type ObjectList } from "../records/index.js";
import { CancellationError, ExitCode } from "./errors.js";
import type { InputBinding, InputMode, Operation, OperationContext, OperationResult } from "./types.js";

/**
 * Arguments an operation cannot accept.
 */
export class OperationArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OperationArgumentError";
  }
}

export interface OperationDefinition<P> {
  name: string;
  summary: string;
  usage: string;
  input: InputMode;
  parse(args: readonly string[]): P;
  /** Reject parameters that leave nothing to work on for this binding */
  bind?(params: P, binding: InputBinding): void;
  execute(params: P, input: ObjectList | undefined, ctx: OperationContext): Promise<ObjectList>;
}

export function defineOperation<P>(definition: OperationDefinition<P>): Operation {
  return {
    name: definition.name,
    summary: definition.summary,
    usage: definition.usage,
    input: definition.input,
    validate(args, binding) {
      const params = definition.parse(args);
      if (binding) {
        definition.bind?.(params, binding);
      }
    },
    async run(args, input, ctx): Promise<OperationResult> {
      const params = definition.parse(args);
      definition.bind?.(params, { hasInput: input !== undefined });
      try {
        const output = await definition.execute(params, input, ctx);
        return { output, status: ExitCode.Success };
      } catch (err) {
        if (err instanceof CancellationError) {
          ctx.logger.warn("Operation interrupted", { operation: definition.name, completed: err.output.length });
          return { output: createObjectList(err.output), status: ExitCode.Cancelled };
        }
        throw err;
      }
    },
  };
}

/**
 * Value of a required string option.
 */
export function requireOption(value: string | undefined, flag: string): string {
  if (value === undefined || value.trim() === "") {
    throw new OperationArgumentError(`missing required option --${flag}`);
  }
  return value;
}

/**
 * Split a comma separated option value, dropping empty items.
 */
export function splitList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse a positive integer option.
 */
export function parsePositiveInt(value: string | undefined, flag: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
    throw new OperationArgumentError(`--${flag} must be a positive integer, got: ${value}`);
  }
  return parseInt(value, 10);
}
