/**
 * Pipeline runner.
 *
 * Executes resolved stages strictly in order. The list a stage produces is
 * handed to the next stage as an explicit argument when that stage bound it
 * with '%'; there is no shared "current list".
 *
 * Propagation policy for stage status:
 *   0, 1  continue (1 = partial success, its output still flows)
 *   130   stop as cancelled, keeping that stage's output, when the run was
 *         actually interrupted; a stage cannot claim a cancellation
 *   other stop with exit 2; the failing stage's output becomes the final output
 *
 * An interrupt between stages ends the run as cancelled with the last
 * completed stage's output and every failure entry gathered so far.
 */

import type { BlobStore } from "../channel/index.js";
import type { Logger } from "../logging/index.js";
import type { ObjectList } from "../records/index.js";
import { CancellationError, ExitCode } from "./errors.js";
import { invokeStage, type StageExecution } from "./invoker.js";
import type { ResolvedStage } from "./resolver.js";
import type { FailureEntry, OperationContext } from "./types.js";

export interface RunOptions {
  /** List piped into graphpipe, offered to the first stage */
  initialInput?: ObjectList;
  signal?: AbortSignal;
  logger: Logger;
  blobs: BlobStore;
  runId: string;
}

export interface PipelineResult {
  readonly stages: readonly StageExecution[];
  readonly output: ObjectList;
  readonly failures: readonly FailureEntry[];
  readonly exitCode: number;
  readonly cancelled: boolean;
  /** Index of the stage whose status stopped the pipeline */
  readonly failedStage?: number;
  /** Index of the stage that was interrupted or never started */
  readonly cancelledStage?: number;
}

function inputFor(
  resolved: ResolvedStage,
  previous: ObjectList | undefined,
  initialInput: ObjectList | undefined
): ObjectList | undefined {
  if (resolved.stage.index === 0) {
    return resolved.operation.input === "none" ? undefined : initialInput;
  }
  return resolved.stage.usesPrevious ? previous : undefined;
}

/**
 * Run a resolved pipeline.
 *
 * @throws StageFailedError when an operation throws
 */
export async function runPipeline(
  plan: readonly ResolvedStage[],
  options: RunOptions
): Promise<PipelineResult> {
  const signal = options.signal ?? new AbortController().signal;
  const executions: StageExecution[] = [];
  const failures: FailureEntry[] = [];
  let previous: ObjectList | undefined;

  const finish = (extra: Partial<PipelineResult> & { exitCode: number }): PipelineResult => ({
    stages: executions,
    output: previous ?? [],
    failures,
    cancelled: false,
    ...extra,
  });

  for (const resolved of plan) {
    const { stage, operation } = resolved;
    if (signal.aborted) {
      options.logger.warn("Pipeline cancelled before the stage started", {
        stage: stage.index,
        operation: operation.name,
      });
      return finish({ exitCode: ExitCode.Cancelled, cancelled: true, cancelledStage: stage.index });
    }

    if (stage.index > 0 && !stage.usesPrevious && previous && previous.length > 0) {
      options.logger.warn("Stage output is not consumed by the next stage", {
        stage: stage.index - 1,
        records: previous.length,
      });
    }

    const ctx: OperationContext = {
      stageIndex: stage.index,
      signal,
      logger: options.logger.child(operation.name),
      blobs: options.blobs,
      runId: options.runId,
    };
    let execution: StageExecution;
    try {
      execution = await invokeStage(resolved, inputFor(resolved, previous, options.initialInput), ctx);
    } catch (err) {
      if (err instanceof CancellationError) {
        options.logger.warn("Pipeline cancelled", { stage: stage.index, error: err.message });
        return finish({ exitCode: ExitCode.Cancelled, cancelled: true, cancelledStage: stage.index });
      }
      throw err;
    }
    executions.push(execution);
    failures.push(...execution.failures);
    previous = execution.output;

    if (execution.status === ExitCode.Cancelled && signal.aborted) {
      options.logger.warn("Pipeline cancelled", { stage: stage.index });
      return finish({ exitCode: ExitCode.Cancelled, cancelled: true, cancelledStage: stage.index });
    }

    if (execution.status !== ExitCode.Success && execution.status !== ExitCode.PartialFailure) {
      options.logger.error("Stage failed; pipeline stopped", {
        stage: stage.index,
        operation: operation.name,
        status: execution.status,
      });
      return finish({ exitCode: ExitCode.Failed, failedStage: stage.index });
    }
  }

  const exitCode = executions.reduce((max, execution) => Math.max(max, execution.status), 0);
  return finish({ exitCode });
}
