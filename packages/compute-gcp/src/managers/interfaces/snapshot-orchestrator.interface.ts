/**
 * Snapshot Orchestrator Interface
 */

import type { OperationError } from "@computekit/compute-common";
import type { WaitOptions } from "./operation-poller.interface";

export interface SnapshotOptions extends WaitOptions {
  /**
   * Stop polling the other disks once one disk fails.
   * Remote snapshot operations already issued keep running either way.
   */
  cancelSiblingsOnFailure?: boolean;
}

/** Outcome of one disk's snapshot. */
export interface DiskSnapshotResult {
  diskName: string;
  /** Error payload reported by the finished snapshot operation, if any */
  error?: OperationError;
}

export interface ISnapshotOrchestrator {
  /**
   * Snapshot every disk attached to the instance, all disks at once.
   * Rejects with the first per-disk failure.
   */
  createSnapshot(
    projectId: string,
    zone: string,
    instanceId: string,
    timeoutMs: number,
    options?: SnapshotOptions
  ): Promise<DiskSnapshotResult[]>;

  /** Snapshot one disk (the snapshot is named after it) and wait for it. */
  createSnapshotForDisk(
    projectId: string,
    zone: string,
    diskName: string,
    timeoutMs: number,
    options?: WaitOptions
  ): Promise<OperationError | undefined>;
}
