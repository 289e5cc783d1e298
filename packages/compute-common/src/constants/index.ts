export {
  OPERATION_POLL_INTERVAL_MS,
  OPERATION_TIMEOUT_MS,
  TERMINAL_OPERATION_STATUS,
} from "./timeouts";
