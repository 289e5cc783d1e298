/**
 * Logging types.
 *
 * computekit never writes to a process-wide logger. Components accept a log
 * callback at construction and every long-running call can override it.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Sink for structured, leveled log events.
 */
export type ComputeLogCallback = (
  message: string,
  level: LogLevel,
  context?: Record<string, unknown>
) => void;

/** Discards every event. */
export const noopLog: ComputeLogCallback = () => undefined;
