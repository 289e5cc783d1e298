/**
 * Timeout constants for Compute operations.
 */

/** Interval between two status queries of a long-running operation */
export const OPERATION_POLL_INTERVAL_MS = 5_000;

/** Default budget for waiting on a single operation (10 minutes) */
export const OPERATION_TIMEOUT_MS = 600_000;

/** The only operation status that will not change any more */
export const TERMINAL_OPERATION_STATUS = "DONE";
