export type StrategyName = "naive" | "cumulative" | "windowed";

export const STRATEGY_NAMES: readonly StrategyName[] = ["naive", "cumulative", "windowed"];

export type MemoryProbeName = "heap" | "rss";

export type BenchmarkErrorCode =
  | "INVALID_CONFIGURATION"
  | "MALFORMED_INPUT"
  | "MEASUREMENT_UNAVAILABLE";

export interface BenchmarkSample {
  readonly strategy: StrategyName;
  readonly size: number;
  /** Minimum wall-clock time over all timing repeats. */
  readonly elapsedSeconds: number;
  readonly peakMemoryBytes: number;
  /** False when the memory pass started without a forced collection; the peak may include earlier garbage. */
  readonly baselineIsolated: boolean;
  /** Probe that produced peakMemoryBytes; values from different probes are not comparable. */
  readonly memoryProbe: MemoryProbeName;
  readonly repeats: number;
}

export interface TrialFailure {
  readonly strategy: StrategyName;
  readonly size: number;
  readonly code: BenchmarkErrorCode;
  readonly message: string;
}

export interface BenchmarkReport {
  samples: BenchmarkSample[];
  failures: TrialFailure[];
  startedAt: string;
  finishedAt: string;
}
