/**
 * Shared plumbing for Graph-backed operations: option parsing, reading
 * fields off input records and building Graph resource paths.
 */

import {
  CancellationError,
  defineOperation,
  OperationArgumentError,
  type InputBinding,
  type Operation,
  type OperationContext,
  type OperationDefinition,
} from "../pipeline/index.js";
import type { DataRecord, ObjectList } from "../records/index.js";
import type { GraphClient } from "./client.js";
import type { GraphSession } from "./session.js";

export const DEFAULT_TOP = 25;

export interface GraphOperationDefinition<P> extends Omit<OperationDefinition<P>, "execute"> {
  execute(client: GraphClient, params: P, input: ObjectList | undefined, ctx: OperationContext): Promise<ObjectList>;
}

/**
 * An operation that talks to Graph through the session. Resolution fails
 * without credentials; arguments are still checked first.
 */
export function defineGraphOperation<P>(session: GraphSession, definition: GraphOperationDefinition<P>): Operation {
  const operation = defineOperation<P>({
    ...definition,
    execute: (params, input, ctx) => definition.execute(session.client(definition.name), params, input, ctx),
  });
  return {
    ...operation,
    validate(args, binding) {
      operation.validate(args, binding);
      session.ensureAvailable(definition.name);
    },
  };
}

/**
 * Run a `node:util` parseArgs call, reporting its errors as argument errors.
 */
export function parseOptions<T>(operation: string, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof TypeError) {
      throw new OperationArgumentError(`${operation}: ${err.message}`);
    }
    throw err;
  }
}

// ============================================================
// Record fields
// ============================================================

export function stringField(record: DataRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * @throws Error naming the record when the field is missing
 */
export function requireStringField(record: DataRecord, key: string, index: number, operation: string): string {
  const value = stringField(record, key);
  if (value === undefined) {
    throw new Error(`${operation}: input record #${index} has no '${key}' field`);
  }
  return value;
}

// ============================================================
// Paths
// ============================================================

export function segment(value: string): string {
  return encodeURIComponent(value);
}

/**
 * Split a drive path into non-empty segments: "/a//b/" -> ["a", "b"].
 */
export function pathSegments(path: string | undefined): string[] {
  return (path ?? "").split("/").filter((part) => part !== "");
}

/**
 * Address a drive item by path relative to the drive root.
 * An empty path addresses the root itself.
 */
export function driveItemByPath(path: string | undefined): string {
  const parts = pathSegments(path);
  return parts.length === 0 ? "/drive/root" : `/drive/root:/${parts.map(segment).join("/")}:`;
}

export function driveItemById(id: string): string {
  return `/drive/items/${segment(id)}`;
}

export function messageById(id: string): string {
  return `/messages/${segment(id)}`;
}

export function recipients(addresses: readonly string[]): Array<{ emailAddress: { address: string } }> {
  return addresses.map((address) => ({ emailAddress: { address } }));
}

/**
 * Stop between items once the run has been interrupted. The records done so
 * far travel with the error and become the stage's output.
 */
export function throwIfCancelled(ctx: OperationContext, operation: string, done: readonly DataRecord[]): void {
  if (ctx.signal.aborted) {
    throw new CancellationError(`${operation} interrupted`, { stageIndex: ctx.stageIndex, operation }, done);
  }
}

/**
 * Bind check for operations that take their items from an option or from
 * the input list.
 */
export function requireItemsOrInput(items: readonly string[], binding: InputBinding, operation: string, flag: string): void {
  if (items.length === 0 && !binding.hasInput) {
    throw new OperationArgumentError(`${operation} needs --${flag} or an input list`);
  }
}

/**
 * Item ids from `--ids`, else from the `id` field of the input records.
 */
export function idsFrom(ids: readonly string[], input: ObjectList | undefined, operation: string): string[] {
  if (ids.length > 0) {
    return [...ids];
  }
  return (input ?? []).map((record, index) => requireStringField(record, "id", index, operation));
}
