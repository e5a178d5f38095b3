/**
 * Run ID generation and management.
 * Each execution gets a unique run ID for tracing. Scripts started by
 * for_each receive it as GRAPHPIPE_RUN_ID, so a nested graphpipe process
 * logs under its parent's run.
 */

import { randomBytes } from "node:crypto";

export const RUN_ID_ENV = "GRAPHPIPE_RUN_ID";

const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(): string {
  const datePart = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Current run ID for this execution */
let currentRunId: string | null = null;

/**
 * Initialize the run ID for this execution: inherited from the environment
 * when a parent graphpipe process set one, freshly generated otherwise.
 */
export function initRunId(env: Readonly<Record<string, string | undefined>> = process.env): string {
  const inherited = env[RUN_ID_ENV];
  currentRunId = inherited && RUN_ID_PATTERN.test(inherited) ? inherited : generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID.
 * Returns null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}
