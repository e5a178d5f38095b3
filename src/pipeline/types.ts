/**
 * Stage, operation and result definitions shared by the composer, the
 * invoker and every operation.
 */

import type { BlobStore } from "../channel/index.js";
import type { Logger } from "../logging/index.js";
import type { ObjectList, RecordIdentity } from "../records/index.js";

/** Whether an operation reads an input list */
export type InputMode = "none" | "optional" | "required";

export interface Stage {
  readonly index: number;
  readonly operation: string;
  /** Arguments with the `%` placeholder removed */
  readonly args: readonly string[];
  /** The stage consumes the preceding stage's output (`%`) */
  readonly usesPrevious: boolean;
}

export type FailureStatus = "failed" | "skipped";

/**
 * One record that did not produce output, tied to its identifying fields.
 */
export interface FailureEntry {
  readonly index: number;
  readonly identity: RecordIdentity;
  readonly status: FailureStatus;
  readonly reason: string;
  readonly exitCode?: number | null;
  /** Filled in by the runner */
  readonly stageIndex?: number;
}

export interface OperationResult {
  readonly output: ObjectList;
  readonly status: number;
  readonly failures?: readonly FailureEntry[];
}

export interface OperationContext {
  readonly stageIndex: number;
  readonly signal: AbortSignal;
  readonly logger: Logger;
  readonly blobs: BlobStore;
  readonly runId: string;
}

/**
 * What a stage will receive, known once the pipeline is composed.
 */
export interface InputBinding {
  /** The stage is bound to an input list ('%', or stdin for the first stage) */
  readonly hasInput: boolean;
}

/**
 * Uniform capability: (args, optional input list) -> (output list, status).
 * Built-in operations and external scripts look the same to the invoker.
 */
export interface Operation {
  readonly name: string;
  readonly summary: string;
  readonly usage: string;
  readonly input: InputMode;
  /**
   * Parse arguments without side effects; throws on invalid input. With a
   * binding, also throws when the arguments and the input together cannot
   * name anything to work on.
   */
  validate(args: readonly string[], binding?: InputBinding): void;
  run(
    args: readonly string[],
    input: ObjectList | undefined,
    ctx: OperationContext
  ): Promise<OperationResult>;
}
