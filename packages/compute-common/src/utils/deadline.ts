/**
 * Retry-with-deadline primitive.
 *
 * Runs a check once per interval until it reports completion or a deadline,
 * taken from a monotonic clock, passes. Checks in flight and sleeps both end
 * at the deadline or when the AbortSignal fires.
 */

import { OperationInterruptedError, OperationTimeoutError } from "../errors";

export type Clock = () => number;
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Outcome of one check: finished with a value, or not yet. */
export type PollOutcome<T> = { done: true; value: T } | { done: false };

export interface PollOptions {
  /** Total budget in milliseconds */
  timeoutMs: number;
  /** Delay between two checks */
  intervalMs: number;
  /** Abort to stop waiting at the next suspension point */
  signal?: AbortSignal;
  clock?: Clock;
  sleep?: Sleeper;
  /** Called when a check throws; the loop then carries on */
  onCheckError?: (error: unknown, attempt: number) => void;
  timeoutMessage?: string;
}

export const monotonicClock: Clock = () => performance.now();

/**
 * Sleep for a specified duration. Rejects with OperationInterruptedError as
 * soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(interruption(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(interruption(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Check until done or until the deadline passes.
 *
 * The first check runs immediately. After a failed or unfinished check the
 * loop sleeps for the interval, or for what is left of the budget when that is
 * shorter, so one last check lands on the deadline itself.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<PollOutcome<T>>,
  options: PollOptions
): Promise<T> {
  const clock = options.clock ?? monotonicClock;
  const sleepFn = options.sleep ?? sleep;
  const deadline = clock() + options.timeoutMs;
  const timeout = (): OperationTimeoutError =>
    new OperationTimeoutError(options.timeoutMessage ?? `Timed out after ${options.timeoutMs}ms`, options.timeoutMs);

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw interruption(options.signal);
    }

    try {
      const outcome = await withinDeadline(check(attempt), deadline - clock(), options.signal, timeout);
      if (outcome.done) {
        return outcome.value;
      }
    } catch (error) {
      if (error instanceof OperationInterruptedError) throw error;
      options.onCheckError?.(error, attempt);
    }

    const remaining = deadline - clock();
    if (remaining <= 0) {
      throw timeout();
    }
    await sleepFn(Math.min(options.intervalMs, remaining), options.signal);
  }
}

/**
 * Settle with `work`, unless the remaining budget runs out or the signal
 * aborts first. The work itself is not cancelled.
 */
async function withinDeadline<T>(
  work: Promise<T>,
  remainingMs: number,
  signal: AbortSignal | undefined,
  timeout: () => OperationTimeoutError
): Promise<T> {
  let fail: (error: Error) => void = () => undefined;
  const stop = new Promise<never>((_resolve, reject) => {
    fail = reject;
  });

  const onAbort = (): void => fail(interruption(signal));
  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }
  const timer = setTimeout(() => fail(timeout()), Math.max(remainingMs, 0));

  try {
    return await Promise.race([work, stop]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}

function interruption(signal: AbortSignal | undefined): OperationInterruptedError {
  return new OperationInterruptedError("Wait was aborted", { cause: signal?.reason });
}
