export { ComputeClient } from "./compute-client";
export { ComputeClientFactory, createComputeClient } from "./compute-client-factory";
export { GcpResourceGateway, toComputeOperation } from "./gateway/gcp-resource-gateway";
export { OperationPoller, SnapshotOrchestrator, isOperationDone } from "./managers";
export {
  ComputeClientConfigSchema,
  ServiceAccountCredentialsSchema,
  parseComputeClientConfig,
} from "./config";

export type { ComputeComponents } from "./compute-client-factory";
export type { GcpComputeClients, GcpClientOptions } from "./gateway/gcp-resource-gateway";
export type {
  OperationPollerOptions,
  IResourceGateway,
  IOperationPoller,
  WaitOptions,
  ISnapshotOrchestrator,
  SnapshotOptions,
  DiskSnapshotResult,
} from "./managers";
export type { ComputeClientConfig, ComputeClientSettings } from "./config";
export type {
  Instance,
  AttachedDisk,
  Metadata,
  Region,
  Zone,
  MachineType,
  DiskType,
  Image,
  AcceleratorType,
  Network,
  Subnetwork,
  InstanceTemplate,
  Snapshot,
  InstanceStatus,
} from "./types";
