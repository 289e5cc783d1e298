/**
 * Operation Poller Interface
 *
 * Waits on zonal long-running operations.
 */

import type { ComputeLogCallback, ComputeOperation, OperationError } from "@computekit/compute-common";

export interface WaitOptions {
  /** Abort to stop waiting; the remote operation keeps running */
  signal?: AbortSignal;
  /** Log sink for this call only */
  log?: ComputeLogCallback;
  /** Human-readable label used in log lines (defaults to the operation id) */
  description?: string;
}

export interface IOperationPoller {
  /**
   * Block until the operation is DONE or the timeout elapses.
   *
   * @returns the operation's error payload, undefined when it reported none
   * @throws OperationTimeoutError when the operation is not DONE in time
   */
  waitForCompletion(
    projectId: string,
    zone: string,
    operationId: string,
    timeoutMs: number,
    options?: WaitOptions
  ): Promise<OperationError | undefined>;

  /** Same as waitForCompletion, reading zone and id from the operation record. */
  waitForOperation(
    projectId: string,
    operation: ComputeOperation,
    timeoutMs: number,
    options?: WaitOptions
  ): Promise<OperationError | undefined>;
}
