export * from "./strategies/index.js";
export * from "./profiler/index.js";
export * from "./benchmark/index.js";
export { Deque } from "./collections/deque.js";
export {
  BenchmarkError,
  InvalidConfigurationError,
  MalformedInputError,
  MeasurementUnavailableError,
  isBenchmarkError,
  assertPositiveInteger
} from "./errors.js";
export { createLogger, type Logger, type LoggerOptions } from "./logger.js";
