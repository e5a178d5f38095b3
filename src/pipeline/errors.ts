import type { ObjectList } from "../records/index.js";

/**
 * Pipeline error taxonomy and process exit codes.
 *
 * Setup errors (composition, resolution) surface before any stage runs.
 * Stage errors carry the index of the stage that raised them.
 */

export const ExitCode = {
  Success: 0,
  /** Some records failed, at least one succeeded */
  PartialFailure: 1,
  /** A stage failed, every record failed, or fail-fast tripped */
  Failed: 2,
  /** Composition or resolution error: nothing ran */
  InvalidPipeline: 3,
  Cancelled: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface StageLocation {
  readonly stageIndex?: number;
  readonly operation?: string;
}

export class PipelineError extends Error {
  public readonly exitCode: number;
  public readonly stageIndex?: number;
  public readonly operation?: string;

  constructor(message: string, exitCode: number, location: StageLocation = {}) {
    super(message);
    this.name = "PipelineError";
    this.exitCode = exitCode;
    this.stageIndex = location.stageIndex;
    this.operation = location.operation;
  }

  /**
   * Message prefixed with the failing stage, when known.
   */
  describe(): string {
    if (this.stageIndex === undefined) {
      return `${this.name}: ${this.message}`;
    }
    const op = this.operation ? ` (${this.operation})` : "";
    return `${this.name} at stage ${this.stageIndex}${op}: ${this.message}`;
  }
}

/** Bad pipeline syntax or argument binding. */
export class CompositionError extends PipelineError {
  constructor(message: string, location: StageLocation = {}) {
    super(message, ExitCode.InvalidPipeline, location);
    this.name = "CompositionError";
  }
}

/** Unknown operation or script. */
export class ResolutionError extends PipelineError {
  constructor(message: string, location: StageLocation = {}) {
    super(message, ExitCode.InvalidPipeline, location);
    this.name = "ResolutionError";
  }
}

/** An operation threw, or exited with a status that stops the pipeline. */
export class StageFailedError extends PipelineError {
  constructor(message: string, location: StageLocation, options: { exitCode?: number; cause?: unknown } = {}) {
    super(message, options.exitCode ?? ExitCode.Failed, location);
    this.name = "StageFailedError";
    this.cause = options.cause;
  }
}

/** The user interrupted the run. */
export class CancellationError extends PipelineError {
  /** Records the interrupted operation completed before it stopped */
  public readonly output: ObjectList;

  constructor(message: string, location: StageLocation = {}, output: ObjectList = []) {
    super(message, ExitCode.Cancelled, location);
    this.name = "CancellationError";
    this.output = output;
  }
}
