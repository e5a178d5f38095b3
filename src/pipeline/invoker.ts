/**
 * Stage invoker: runs one resolved stage and reports what it produced.
 *
 * The invoker sees only the declared contract of an operation (output list,
 * status, failure manifest). Network calls and file writes an operation
 * makes on the way are invisible here.
 */

import { ChannelDecodeError } from "../channel/index.js";
import type { ObjectList } from "../records/index.js";
import { PipelineError, StageFailedError } from "./errors.js";
import type { ResolvedStage } from "./resolver.js";
import type { FailureEntry, OperationContext } from "./types.js";

export interface StageExecution {
  readonly index: number;
  readonly operation: string;
  readonly output: ObjectList;
  readonly status: number;
  readonly failures: readonly FailureEntry[];
  readonly durationMs: number;
}

/**
 * Invoke one stage.
 *
 * @throws PipelineError subclasses unchanged
 * @throws StageFailedError wrapping anything else the operation throws,
 *   a ChannelDecodeError included (available as `cause`)
 */
export async function invokeStage(
  resolved: ResolvedStage,
  input: ObjectList | undefined,
  ctx: OperationContext
): Promise<StageExecution> {
  const { stage, operation } = resolved;
  const startedAt = Date.now();

  ctx.logger.debug("Stage starting", {
    stage: stage.index,
    operation: operation.name,
    args: stage.args,
    inputRecords: input?.length ?? null,
  });

  try {
    const result = await operation.run(stage.args, input, ctx);
    const execution: StageExecution = {
      index: stage.index,
      operation: operation.name,
      output: result.output,
      status: result.status,
      failures: (result.failures ?? []).map((entry) => ({ ...entry, stageIndex: stage.index })),
      durationMs: Date.now() - startedAt,
    };

    ctx.logger.info("Stage finished", {
      stage: stage.index,
      operation: operation.name,
      status: execution.status,
      outputRecords: execution.output.length,
      failures: execution.failures.length,
      durationMs: execution.durationMs,
    });
    return execution;
  } catch (err) {
    if (err instanceof PipelineError) {
      throw err;
    }
    if (err instanceof ChannelDecodeError) {
      ctx.logger.error("Stage could not decode its input", {
        stage: stage.index,
        operation: operation.name,
        error: err.format(),
      });
      throw new StageFailedError(
        `${err.name}: ${err.format()}`,
        { stageIndex: stage.index, operation: operation.name },
        { cause: err }
      );
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new StageFailedError(message, { stageIndex: stage.index, operation: operation.name }, { cause: err });
  }
}
