/**
 * Compute error taxonomy.
 *
 * Every failure raised by computekit is a ComputeError carrying a stable code.
 * A remote operation that finishes with an error payload is NOT an exception;
 * see OperationError in ../types/operation.
 */

export enum ComputeErrorCode {
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  IO_FAILURE = "IO_FAILURE",
  INTERRUPTED = "INTERRUPTED",
  TIMEOUT = "TIMEOUT",
}

export class ComputeError extends Error {
  constructor(
    message: string,
    public readonly code: ComputeErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ComputeError";
  }
}

/** A precondition was violated. Raised before any remote call. */
export class InvalidArgumentError extends ComputeError {
  constructor(message: string) {
    super(message, ComputeErrorCode.INVALID_ARGUMENT);
    this.name = "InvalidArgumentError";
  }
}

/** A remote call could not be completed. */
export class ComputeIoError extends ComputeError {
  /** True when the remote API reported the resource as missing (404 / NOT_FOUND). */
  public readonly notFound: boolean;

  constructor(message: string, options: { cause?: unknown; notFound?: boolean } = {}) {
    super(message, ComputeErrorCode.IO_FAILURE, { cause: options.cause });
    this.name = "ComputeIoError";
    this.notFound = options.notFound ?? false;
  }

  /**
   * Wrap an SDK failure. ComputeErrors pass through untouched.
   */
  static wrap(error: unknown, context: string): ComputeError {
    if (error instanceof ComputeError) {
      return error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new ComputeIoError(`${context}: ${detail}`, {
      cause: error,
      notFound: isNotFoundError(error),
    });
  }
}

/** A wait was interrupted before the awaited operation finished. */
export class OperationInterruptedError extends ComputeError {
  constructor(
    message: string,
    options: { cause?: unknown; code?: ComputeErrorCode } = {}
  ) {
    super(message, options.code ?? ComputeErrorCode.INTERRUPTED, { cause: options.cause });
    this.name = "OperationInterruptedError";
  }
}

/** The awaited operation did not reach a terminal state within its budget. */
export class OperationTimeoutError extends OperationInterruptedError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message, { code: ComputeErrorCode.TIMEOUT });
    this.name = "OperationTimeoutError";
  }
}

const NOT_FOUND_CODES: ReadonlySet<unknown> = new Set([5, 404, "404", "NOT_FOUND"]);

/**
 * Detect a "resource does not exist" failure from the Compute SDK.
 * gax surfaces gRPC code 5 or HTTP 404 depending on the transport.
 */
export function isNotFoundError(error: unknown): boolean {
  if (typeof error === "object" && error !== null && "code" in error) {
    if (NOT_FOUND_CODES.has(error.code)) return true;
  }
  return (
    error instanceof Error &&
    (error.message.includes("NOT_FOUND") ||
      error.message.includes("404") ||
      error.message.includes("was not found"))
  );
}
