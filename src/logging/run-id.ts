/**
 * Run ID generation and management.
 * Each CLI invocation gets a run ID that tags its log entries. Run IDs are
 * never written into evidence bundles (they would break determinism).
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: UTC date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Current run ID for this execution */
let currentRunId: string | null = null;

/**
 * Initialize the run ID for this execution.
 * Should be called once at startup; an explicit ID is kept as given.
 */
export function initRunId(explicitId?: string): string {
  currentRunId = explicitId ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID.
 * Returns null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}
