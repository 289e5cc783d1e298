export {
  ComputeError,
  ComputeErrorCode,
  InvalidArgumentError,
  ComputeIoError,
  OperationInterruptedError,
  OperationTimeoutError,
  isNotFoundError,
} from "./compute-error";
