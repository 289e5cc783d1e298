export type { IResourceGateway } from "./resource-gateway.interface";
export type { IOperationPoller, WaitOptions } from "./operation-poller.interface";
export type {
  ISnapshotOrchestrator,
  SnapshotOptions,
  DiskSnapshotResult,
} from "./snapshot-orchestrator.interface";
