export type { LogLevel, ComputeLogCallback } from "./logging";
export { noopLog } from "./logging";
export type {
  OperationStatus,
  OperationErrorEntry,
  OperationError,
  ComputeOperation,
  MetadataItem,
  DeprecationStatus,
} from "./operation";
