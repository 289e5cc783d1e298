export { OperationPoller, isOperationDone } from "./operation-poller";
export type { OperationPollerOptions } from "./operation-poller";
export { SnapshotOrchestrator } from "./snapshot-orchestrator";
export type {
  IResourceGateway,
  IOperationPoller,
  WaitOptions,
  ISnapshotOrchestrator,
  SnapshotOptions,
  DiskSnapshotResult,
} from "./interfaces";
