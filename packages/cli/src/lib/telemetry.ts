/**
 * Verbose diagnostics: one `metric` line per command on stderr
 */

import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line, e.g. `metric cli.add duration_ms=3 success=true`
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ");
}

/**
 * Emit a metric to stderr when verbose
 */
export function emitMetric(key: string, fields: Record<string, unknown>, verbose: boolean): void {
  if (verbose) {
    writeStderr(formatMetric(key, fields) + "\n");
  }
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  verbose: boolean,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(label, { duration_ms: Date.now() - start, success }, verbose);
  }
}
