/**
 * for_each executor.
 *
 * Applies an external script to every record of a list, one invocation per
 * record, and aggregates what the invocations print.
 *
 * States:
 *
 *   idle -> running(i of N) -> done
 *                           -> failed(i)     fail-fast tripped at record i
 *                           -> cancelled     abort signal fired
 *
 * Records are independent units of work, so by default a failing record is
 * logged in the failure manifest and the batch goes on. With fail-fast, no
 * record is scheduled after the first failure; invocations already running
 * finish and keep their outcome.
 *
 * With concurrency K > 1 up to K children run at once. Outcomes are stored
 * by record index and assembled in input order once the batch has settled,
 * so the aggregate never depends on completion order.
 */

import { findDanglingBlobs } from "../channel/index.js";
import type { ResolvedScript, PassMode, ScriptOutcome, ScriptRunner } from "../external/index.js";
import type { Logger } from "../logging/index.js";
import { ExitCode, type FailureEntry } from "../pipeline/index.js";
import { identifyRecord, type DataRecord, type ObjectList } from "../records/index.js";
import { countFailures, summarizeBatch } from "./manifest.js";

export type ExecutorState =
  | { readonly kind: "idle" }
  | { readonly kind: "running"; readonly index: number; readonly total: number }
  | { readonly kind: "failed"; readonly index: number }
  | { readonly kind: "done" }
  | { readonly kind: "cancelled" };

export interface ForEachOptions {
  /** Stop scheduling after the first failed record */
  failFast?: boolean;
  /** Maximum concurrent invocations (default 1) */
  concurrency?: number;
  passMode?: PassMode;
  /** Append decodable output of failed invocations to the aggregate */
  keepPartial?: boolean;
  logger?: Logger;
  onTransition?: (state: ExecutorState) => void;
}

export interface ForEachResult {
  /** Successful outputs concatenated in input order */
  readonly output: ObjectList;
  /** Failed and skipped records in input order */
  readonly failures: readonly FailureEntry[];
  readonly exitCode: number;
  readonly state: ExecutorState;
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
}

export class ForEachExecutor {
  private readonly runner: ScriptRunner;
  private readonly options: ForEachOptions;
  private current: ExecutorState = { kind: "idle" };

  constructor(runner: ScriptRunner, options: ForEachOptions = {}) {
    this.runner = runner;
    this.options = options;
  }

  get state(): ExecutorState {
    return this.current;
  }

  /**
   * Run the batch. An executor runs one batch.
   */
  async run(
    list: ObjectList,
    script: ResolvedScript,
    fixedArgs: readonly string[] = [],
    signal?: AbortSignal
  ): Promise<ForEachResult> {
    if (this.current.kind !== "idle") {
      throw new Error(`for_each executor already used (state: ${this.current.kind})`);
    }

    const total = list.length;
    const limit = Math.max(1, this.options.concurrency ?? 1);
    const outcomes = new Array<ScriptOutcome | undefined>(total).fill(undefined);
    const inFlight = new Set<Promise<void>>();
    let next = 0;
    // Written by completion callbacks
    const halt: { index?: number } = {};

    this.options.logger?.info("for_each starting", {
      script: script.path,
      records: total,
      concurrency: limit,
      failFast: this.options.failFast ?? false,
    });

    const launch = (index: number, record: DataRecord): void => {
      this.transition({ kind: "running", index, total });
      const task = this.invoke(script, fixedArgs, record, index, total, signal).then((outcome) => {
        outcomes[index] = outcome;
        if (outcome.kind === "failure") {
          this.options.logger?.warn("Record failed", {
            index,
            record: identifyRecord(record, index),
            reason: outcome.reason,
          });
          if (this.options.failFast && halt.index === undefined) {
            halt.index = index;
          }
        }
      });
      const tracked: Promise<void> = task.finally(() => inFlight.delete(tracked));
      inFlight.add(tracked);
    };

    for (;;) {
      while (inFlight.size < limit && next < total && halt.index === undefined && !signal?.aborted) {
        const index = next++;
        const record = list[index];
        if (record !== undefined) launch(index, record);
      }
      if (inFlight.size === 0) break;
      await Promise.race(inFlight);
    }

    const interrupted = outcomes.some((outcome) => outcome?.kind === "cancelled");
    const cancelled = interrupted || (signal?.aborted === true && outcomes.some((o) => o === undefined));

    const output: DataRecord[] = [];
    const failures: FailureEntry[] = [];
    let succeeded = 0;

    list.forEach((record, index) => {
      const outcome = outcomes[index];
      const identity = identifyRecord(record, index);
      if (outcome === undefined) {
        failures.push({ index, identity, status: "skipped", reason: cancelled ? "not started" : "fail-fast" });
      } else if (outcome.kind === "cancelled") {
        failures.push({ index, identity, status: "skipped", reason: "interrupted" });
      } else if (outcome.kind === "failure") {
        failures.push({ index, identity, status: "failed", reason: outcome.reason, exitCode: outcome.exitCode });
        if (this.options.keepPartial) {
          output.push(...outcome.partial);
        }
      } else {
        succeeded++;
        output.push(...outcome.output);
      }
    });

    const { failed, skipped } = countFailures(failures);
    const tripped = halt.index;
    const state: ExecutorState = cancelled
      ? { kind: "cancelled" }
      : tripped !== undefined
        ? { kind: "failed", index: tripped }
        : { kind: "done" };
    this.transition(state);

    const exitCode = cancelled
      ? ExitCode.Cancelled
      : state.kind === "failed" || (failed > 0 && succeeded === 0)
        ? ExitCode.Failed
        : failed > 0
          ? ExitCode.PartialFailure
          : ExitCode.Success;

    this.options.logger?.info(`for_each finished: ${summarizeBatch({ total, succeeded, failed, skipped })}`, {
      state: state.kind,
      exitCode,
    });

    return {
      output: Object.freeze(output),
      failures: Object.freeze(failures),
      exitCode,
      state,
      total,
      succeeded,
      failed,
      skipped,
    };
  }

  private transition(state: ExecutorState): void {
    this.current = state;
    this.options.logger?.debug("for_each state", { ...state });
    this.options.onTransition?.(state);
  }

  private async invoke(
    script: ResolvedScript,
    fixedArgs: readonly string[],
    record: DataRecord,
    index: number,
    total: number,
    signal: AbortSignal | undefined
  ): Promise<ScriptOutcome> {
    const dangling = findDanglingBlobs(record);
    if (dangling.length > 0) {
      return {
        kind: "failure",
        reason: `missing blob: ${dangling.map((ref) => ref.$blob).join(", ")}`,
        exitCode: null,
        partial: [],
      };
    }

    try {
      return await this.runner.run(
        { script, fixedArgs, record, index, total, passMode: this.options.passMode ?? "stdin" },
        signal
      );
    } catch (err) {
      // A runner error fails the record, not the batch
      return {
        kind: "failure",
        reason: `runner error: ${err instanceof Error ? err.message : String(err)}`,
        exitCode: null,
        partial: [],
      };
    }
  }
}
