/**
 * Run ID generation and management.
 * Each validation or search run gets a run ID used in log lines and file names.
 */

import { randomBytes } from "node:crypto";

/** "20240115-a1b2c3": UTC date + 6 hex chars */
export const RUN_ID_PATTERN = /^\d{8}-[a-f0-9]{6}$/;

export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this process.
 * An explicit ID (e.g. one handed over by the generation layer) is kept as is
 * when it has the standard format.
 */
export function initRunId(runId?: string): string {
  if (runId !== undefined && !RUN_ID_PATTERN.test(runId)) {
    throw new Error(`Invalid run ID "${runId}": expected format YYYYMMDD-xxxxxx`);
  }
  currentRunId = runId ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
