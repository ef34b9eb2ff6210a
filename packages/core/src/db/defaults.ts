/**
 * Conservative execution limits applied when the caller gives none.
 */

export const SAFE_DEFAULTS = {
  /** Hard cap on returned rows */
  maxRows: 5000,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
  /** Connection timeout in milliseconds */
  connectTimeoutMs: 10_000,
} as const;
