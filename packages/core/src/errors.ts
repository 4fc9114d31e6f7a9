import type { BenchmarkErrorCode } from "@tickbench/types";

export class BenchmarkError extends Error {
  public readonly code: BenchmarkErrorCode;

  constructor(code: BenchmarkErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidConfigurationError extends BenchmarkError {
  constructor(message: string) {
    super("INVALID_CONFIGURATION", message);
  }
}

export class MalformedInputError extends BenchmarkError {
  constructor(message: string) {
    super("MALFORMED_INPUT", message);
  }
}

export class MeasurementUnavailableError extends BenchmarkError {
  constructor(message: string) {
    super("MEASUREMENT_UNAVAILABLE", message);
  }
}

export function isBenchmarkError(error: unknown): error is BenchmarkError {
  return error instanceof BenchmarkError;
}

export function assertPositiveInteger(value: number, label: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigurationError(`${label} must be a positive integer, got ${value}`);
  }
}
