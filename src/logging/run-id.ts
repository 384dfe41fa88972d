/**
 * Run ID generation and management.
 * Each fixture run gets a run ID that tags every log line.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(): string {
  const datePart = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  return `${datePart}-${randomBytes(3).toString("hex")}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this process, once at startup.
 * A caller-supplied ID (e.g. from CI) takes precedence over a generated one.
 */
export function initRunId(fixed?: string): string {
  currentRunId = fixed && fixed.length > 0 ? fixed : generateRunId();
  return currentRunId;
}

/**
 * Current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
