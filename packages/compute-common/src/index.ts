// Errors
export {
  ComputeError,
  ComputeErrorCode,
  InvalidArgumentError,
  ComputeIoError,
  OperationInterruptedError,
  OperationTimeoutError,
  isNotFoundError,
} from "./errors";

// Types
export type {
  LogLevel,
  ComputeLogCallback,
  OperationStatus,
  OperationErrorEntry,
  OperationError,
  ComputeOperation,
  MetadataItem,
  DeprecationStatus,
} from "./types";
export { noopLog } from "./types";

// Constants
export {
  OPERATION_POLL_INTERVAL_MS,
  OPERATION_TIMEOUT_MS,
  TERMINAL_OPERATION_STATUS,
} from "./constants";

// Utilities
export {
  checkArgument,
  checkNotNull,
  checkNotEmpty,
  checkPositive,
  nameFromSelfLink,
  processResourceList,
  isDeprecated,
  compareStrings,
  byName,
  buildLabelsFilterString,
  mergeMetadataItems,
  hasOperationErrors,
  formatOperationError,
  pollUntil,
  sleep,
  monotonicClock,
} from "./utils";
export type { Clock, Sleeper, PollOutcome, PollOptions } from "./utils";
