/**
 * Operation Poller
 *
 * Waits for zonal long-running operations by querying their status at a fixed
 * interval until they are DONE or the caller's budget runs out.
 */

import {
  OPERATION_POLL_INTERVAL_MS,
  OperationTimeoutError,
  TERMINAL_OPERATION_STATUS,
  checkNotEmpty,
  checkNotNull,
  checkPositive,
  formatOperationError,
  hasOperationErrors,
  monotonicClock,
  nameFromSelfLink,
  noopLog,
  pollUntil,
  sleep,
} from "@computekit/compute-common";
import type {
  Clock,
  ComputeLogCallback,
  ComputeOperation,
  OperationError,
  Sleeper,
} from "@computekit/compute-common";
import type { IOperationPoller, IResourceGateway, WaitOptions } from "./interfaces";

export interface OperationPollerOptions {
  /** Delay between two status queries. Default: 5s */
  pollIntervalMs?: number;
  /** Default log sink, overridable per call */
  log?: ComputeLogCallback;
  clock?: Clock;
  sleep?: Sleeper;
}

export function isOperationDone(operation: ComputeOperation | null | undefined): boolean {
  return String(operation?.status ?? "") === TERMINAL_OPERATION_STATUS;
}

export class OperationPoller implements IOperationPoller {
  private readonly pollIntervalMs: number;
  private readonly log: ComputeLogCallback;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;

  constructor(
    private readonly gateway: Pick<IResourceGateway, "getZoneOperation">,
    options: OperationPollerOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? OPERATION_POLL_INTERVAL_MS;
    this.log = options.log ?? noopLog;
    this.clock = options.clock ?? monotonicClock;
    this.sleep = options.sleep ?? sleep;
  }

  async waitForCompletion(
    projectId: string,
    zone: string,
    operationId: string,
    timeoutMs: number,
    options: WaitOptions = {}
  ): Promise<OperationError | undefined> {
    checkNotEmpty(projectId, "projectId");
    checkNotEmpty(zone, "zone");
    checkNotEmpty(operationId, "operationId");
    checkPositive(timeoutMs, "timeoutMs");

    const zoneName = nameFromSelfLink(zone);
    const log = options.log ?? this.log;
    const description = options.description ?? operationId;
    const start = this.clock();
    let lastStatus = "";

    try {
      return await pollUntil<OperationError | undefined>(
        async (attempt) => {
          log(`Waiting for operation ${operationId} to complete..`, "debug", {
            operationId,
            zone: zoneName,
            attempt,
          });
          const operation = await this.gateway.getZoneOperation(projectId, zoneName, operationId);

          const status = String(operation.status ?? "UNKNOWN");
          if (status !== lastStatus) {
            const elapsed = Math.round((this.clock() - start) / 1000);
            log(`[${description}] ${status} - ${elapsed}s elapsed`, "info", { operationId, status });
            lastStatus = status;
          }

          if (!isOperationDone(operation)) {
            return { done: false };
          }
          if (hasOperationErrors(operation.error)) {
            log(`[${description}] finished with errors: ${formatOperationError(operation.error)}`, "warn", {
              operationId,
            });
          }
          return { done: true, value: operation.error ?? undefined };
        },
        {
          timeoutMs,
          intervalMs: this.pollIntervalMs,
          signal: options.signal,
          clock: this.clock,
          sleep: this.sleep,
          timeoutMessage: `Timed out waiting for operation ${operationId} to complete`,
          onCheckError: (error, attempt) => {
            log("Error retrieving operation.", "warn", {
              operationId,
              attempt,
              error: error instanceof Error ? error.message : String(error),
            });
          },
        }
      );
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        log(`[${description}] TIMEOUT after ${timeoutMs / 1000}s`, "error", { operationId });
      }
      throw error;
    }
  }

  async waitForOperation(
    projectId: string,
    operation: ComputeOperation,
    timeoutMs: number,
    options: WaitOptions = {}
  ): Promise<OperationError | undefined> {
    checkNotNull(operation, "operation");
    checkNotEmpty(operation.name, "operation.name");
    checkNotEmpty(operation.zone, "operation.zone");
    return this.waitForCompletion(projectId, operation.zone, operation.name, timeoutMs, options);
  }
}
