import { InvalidArgumentError } from "../errors";

/**
 * Argument guards. Each throws InvalidArgumentError, so callers fail before
 * touching the network.
 */

export function checkArgument(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvalidArgumentError(message);
  }
}

export function checkNotNull<T>(value: T | null | undefined, name: string): asserts value is T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(`${name} is required`);
  }
}

export function checkNotEmpty(value: string | null | undefined, name: string): asserts value is string {
  if (value === null || value === undefined || value.length === 0) {
    throw new InvalidArgumentError(`${name} must be a non-empty string`);
  }
}

export function checkPositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive number, got ${value}`);
  }
}
