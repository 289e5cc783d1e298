/**
 * Snapshot Orchestrator
 *
 * Snapshots every disk attached to an instance as one logical call. Disks are
 * processed concurrently, each with the full timeout budget.
 *
 * The first disk failure rejects the call. Other disks are not cancelled
 * unless `cancelSiblingsOnFailure` is set, and even then only their local
 * polling stops: snapshot operations already issued run to completion on the
 * remote side.
 */

import {
  OperationInterruptedError,
  checkNotEmpty,
  checkPositive,
  formatOperationError,
  hasOperationErrors,
  nameFromSelfLink,
  noopLog,
} from "@computekit/compute-common";
import type { ComputeLogCallback, OperationError } from "@computekit/compute-common";
import type { Instance, Snapshot } from "../types";
import type {
  DiskSnapshotResult,
  IOperationPoller,
  IResourceGateway,
  ISnapshotOrchestrator,
  SnapshotOptions,
  WaitOptions,
} from "./interfaces";

export class SnapshotOrchestrator implements ISnapshotOrchestrator {
  constructor(
    private readonly gateway: Pick<IResourceGateway, "getInstance" | "createDiskSnapshot">,
    private readonly poller: IOperationPoller,
    private readonly log: ComputeLogCallback = noopLog
  ) {}

  async createSnapshot(
    projectId: string,
    zone: string,
    instanceId: string,
    timeoutMs: number,
    options: SnapshotOptions = {}
  ): Promise<DiskSnapshotResult[]> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zone, "zone");
    checkNotEmpty(instanceId, "instanceId");
    checkPositive(timeoutMs, "timeoutMs");

    const zoneName = nameFromSelfLink(zone);
    const log = options.log ?? this.log;

    let instance: Instance;
    try {
      instance = await this.gateway.getInstance(projectId, zoneName, instanceId);
    } catch (error) {
      log("Error retrieving instance.", "warn", { instanceId, error: errorMessage(error) });
      throw error;
    }

    const diskNames = this.attachedDiskNames(instance, log);
    if (diskNames.length === 0) {
      log(`Instance ${instanceId} has no disks to snapshot`, "info", { instanceId });
      return [];
    }

    // Caller aborts and sibling cancellation both flow through this controller
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      forwardAbort();
    } else {
      options.signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    let failed = false;
    const tasks = diskNames.map(async (diskName): Promise<DiskSnapshotResult> => {
      try {
        const error = await this.createSnapshotForDisk(projectId, zoneName, diskName, timeoutMs, {
          log,
          signal: controller.signal,
        });
        if (failed) {
          log(`Snapshot of disk ${diskName} finished after the call failed; result discarded`, "debug", {
            diskName,
          });
        } else if (hasOperationErrors(error)) {
          log(`Snapshot of disk ${diskName} reported errors: ${formatOperationError(error)}`, "warn", {
            diskName,
          });
        }
        return { diskName, error };
      } catch (error) {
        if (error instanceof OperationInterruptedError) {
          log("Interruption in creating snapshot.", "warn", { diskName, error: errorMessage(error) });
        } else {
          log("Error in creating snapshot.", "warn", { diskName, error: errorMessage(error) });
        }
        if (!failed) {
          failed = true;
          if (options.cancelSiblingsOnFailure) {
            controller.abort(error);
          }
        }
        throw error;
      }
    });

    // allSettled never rejects; the listener goes once every disk is through
    void Promise.allSettled(tasks).then(() =>
      options.signal?.removeEventListener("abort", forwardAbort)
    );

    return Promise.all(tasks);
  }

  async createSnapshotForDisk(
    projectId: string,
    zone: string,
    diskName: string,
    timeoutMs: number,
    options: WaitOptions = {}
  ): Promise<OperationError | undefined> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zone, "zone");
    checkNotEmpty(diskName, "diskName");
    checkPositive(timeoutMs, "timeoutMs");

    const zoneName = nameFromSelfLink(zone);
    const snapshot: Snapshot = { name: diskName };

    const operation = await this.gateway.createDiskSnapshot(projectId, zoneName, diskName, snapshot);
    return this.poller.waitForOperation(
      projectId,
      { ...operation, zone: operation.zone ?? zoneName },
      timeoutMs,
      { description: `snapshot ${diskName}`, ...options }
    );
  }

  private attachedDiskNames(instance: Instance, log: ComputeLogCallback): string[] {
    const names: string[] = [];
    for (const disk of instance.disks ?? []) {
      if (!disk.source) {
        log(`Skipping attached disk without a source on ${instance.name ?? "instance"}`, "warn", {
          deviceName: disk.deviceName,
        });
        continue;
      }
      names.push(nameFromSelfLink(disk.source));
    }
    return names;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
