import type { OperationError } from "../types";

export function hasOperationErrors(error: OperationError | null | undefined): boolean {
  return (error?.errors?.length ?? 0) > 0;
}

/**
 * Render an operation error payload on one line, e.g.
 * "QUOTA_EXCEEDED: Quota 'SNAPSHOTS' exceeded; INTERNAL_ERROR: retry later".
 */
export function formatOperationError(error: OperationError | null | undefined): string {
  const entries = error?.errors ?? [];
  return entries
    .map((entry) => {
      const message = entry.message ?? "unknown error";
      return entry.code ? `${entry.code}: ${message}` : message;
    })
    .join("; ");
}
