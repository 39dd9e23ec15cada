/**
 * Shared utility functions used across the sideload codebase.
 *
 * @module utils
 */

/**
 * Get current timestamp as an ISO-8601 string.
 *
 * @returns ISO-8601 formatted timestamp (e.g., "2026-01-25T12:34:56.789Z")
 */
export function isoNow(): string {
  return new Date().toISOString();
}

/**
 * Type guard to check if a value is a non-null object (Record).
 *
 * @returns true if v is a non-null, non-array object
 */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Extract YYYY-MM-DD from an ISO timestamp string.
 */
export function yyyyMmDdUtc(tsIso: string): string {
  return tsIso.slice(0, 10);
}

/**
 * Render an unknown thrown value as a single-line message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
