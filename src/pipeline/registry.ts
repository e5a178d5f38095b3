/**
 * Operation registry: operation name -> capability.
 *
 * Populated at startup with the built-in operations. A name that is not
 * registered falls through to the script factory, which turns a path to an
 * existing file into an external-script stage.
 */

import { ResolutionError } from "./errors.js";
import type { Operation } from "./types.js";

export type ScriptStageFactory = (name: string) => Operation | undefined;

export class OperationRegistry {
  private readonly operations = new Map<string, Operation>();
  private readonly scriptStage?: ScriptStageFactory;

  constructor(scriptStage?: ScriptStageFactory) {
    this.scriptStage = scriptStage;
  }

  /**
   * Register an operation. Names are unique.
   */
  register(operation: Operation): this {
    if (this.operations.has(operation.name)) {
      throw new Error(`Operation already registered: ${operation.name}`);
    }
    this.operations.set(operation.name, operation);
    return this;
  }

  get(name: string): Operation | undefined {
    return this.operations.get(name);
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  /** Registered operations sorted by name */
  list(): Operation[] {
    return [...this.operations.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Registered operation, else an external-script stage.
   *
   * @throws ResolutionError when neither matches
   */
  resolve(name: string): Operation {
    const operation = this.operations.get(name) ?? this.scriptStage?.(name);
    if (!operation) {
      throw new ResolutionError(`unknown operation or script: ${name}`, { operation: name });
    }
    return operation;
  }
}
