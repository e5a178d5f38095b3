/**
 * Failure manifest rendering: a human-readable report for stderr and an
 * ObjectList form for `--manifest <file>`.
 */

import { createObjectList, formatIdentity, type ObjectList } from "../records/index.js";
import type { FailureEntry } from "../pipeline/index.js";

export interface BatchCounts {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
}

export function countFailures(failures: readonly FailureEntry[]): { failed: number; skipped: number } {
  const failed = failures.filter((entry) => entry.status === "failed").length;
  return { failed, skipped: failures.length - failed };
}

/**
 * One-line batch summary, e.g. "71 of 73 records succeeded, 2 failed, 0 skipped".
 */
export function summarizeBatch(counts: BatchCounts): string {
  return `${counts.succeeded} of ${counts.total} records succeeded, ${counts.failed} failed, ${counts.skipped} skipped`;
}

function formatEntry(entry: FailureEntry): string {
  const marker = entry.status === "failed" ? "✗" : "○";
  const stage = entry.stageIndex !== undefined ? `[stage ${entry.stageIndex}] ` : "";
  const reason = entry.status === "skipped" ? `skipped (${entry.reason})` : entry.reason;
  return `  ${marker} ${stage}#${entry.index} ${formatIdentity(entry.identity)}: ${reason}`;
}

/**
 * Report listing every failed and skipped record.
 */
export function formatFailureSummary(failures: readonly FailureEntry[]): string {
  if (failures.length === 0) {
    return "No record failures.";
  }
  const { failed, skipped } = countFailures(failures);
  const lines = [`Record failures: ${failed} failed, ${skipped} skipped`];
  for (const entry of failures) {
    lines.push(formatEntry(entry));
  }
  return lines.join("\n");
}

export function failuresToObjectList(failures: readonly FailureEntry[]): ObjectList {
  return createObjectList(
    failures.map((entry) => ({
      index: entry.index,
      status: entry.status,
      reason: entry.reason,
      exitCode: entry.exitCode ?? null,
      stage: entry.stageIndex ?? null,
      record: { ...entry.identity },
    }))
  );
}
