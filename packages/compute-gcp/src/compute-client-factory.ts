/**
 * Compute Client Factory
 *
 * Creates and wires up the gateway, poller and snapshot orchestrator behind a
 * ComputeClient.
 */

import { noopLog } from "@computekit/compute-common";
import { ComputeClient } from "./compute-client";
import { parseComputeClientConfig } from "./config";
import type { ComputeClientConfig } from "./config";
import { GcpResourceGateway } from "./gateway/gcp-resource-gateway";
import type { GcpComputeClients } from "./gateway/gcp-resource-gateway";
import { OperationPoller, SnapshotOrchestrator } from "./managers";
import type { IOperationPoller, IResourceGateway, ISnapshotOrchestrator } from "./managers";

/**
 * Collection of the components behind a ComputeClient.
 */
export interface ComputeComponents {
  gateway: IResourceGateway;
  poller: IOperationPoller;
  snapshots: ISnapshotOrchestrator;
}

export class ComputeClientFactory {
  /**
   * Create all components with their dependencies wired.
   *
   * @param clients - SDK clients to use instead of creating them from the config
   */
  static createComponents(config: ComputeClientConfig = {}, clients?: GcpComputeClients): ComputeComponents {
    const settings = parseComputeClientConfig(config);
    const log = config.log ?? noopLog;

    const sdkClients =
      clients ??
      GcpResourceGateway.createClients({
        projectId: settings.projectId,
        keyFilename: settings.keyFilename,
        credentials: settings.credentials,
      });

    const gateway = new GcpResourceGateway(sdkClients, log);
    const poller = new OperationPoller(gateway, { pollIntervalMs: settings.pollIntervalMs, log });
    const snapshots = new SnapshotOrchestrator(gateway, poller, log);

    return { gateway, poller, snapshots };
  }

  static create(config: ComputeClientConfig = {}, clients?: GcpComputeClients): ComputeClient {
    const { gateway, poller, snapshots } = ComputeClientFactory.createComponents(config, clients);
    return new ComputeClient(gateway, poller, snapshots);
  }
}

/**
 * Create a compute client with the given configuration.
 * Application Default Credentials are used unless keyFilename or credentials is set.
 */
export function createComputeClient(config: ComputeClientConfig = {}): ComputeClient {
  return ComputeClientFactory.create(config);
}
