/**
 * Long-running operation types.
 *
 * Structural subsets of the Compute API resources, so SDK records can be
 * passed in directly.
 */

/** Status values reported by the remote API. Only "DONE" is terminal. */
export type OperationStatus = "PENDING" | "RUNNING" | "DONE";

/** One failure entry of a finished operation. */
export interface OperationErrorEntry {
  code?: string | null;
  message?: string | null;
  location?: string | null;
}

/**
 * Failure detail of a finished operation. No entries means success.
 */
export interface OperationError {
  errors?: OperationErrorEntry[] | null;
}

/**
 * A long-running operation as returned by a mutating call or a status query.
 * Read-only to computekit.
 */
export interface ComputeOperation {
  /** Opaque operation id */
  name?: string | null;
  /** Zone self link or name */
  zone?: string | null;
  /** Remote-defined status, compared against "DONE" */
  status?: string | number | null;
  /** Populated once the operation is terminal */
  error?: OperationError | null;
}

/** Instance metadata entry. */
export interface MetadataItem {
  key?: string | null;
  value?: string | null;
}

/** Deprecation status attached to regions, images, machine types, etc. */
export interface DeprecationStatus {
  state?: unknown;
}
