import type { BenchmarkReport, BenchmarkSample, StrategyName, TrialFailure } from "@tickbench/types";
import type { StrategyFactory } from "../strategies/base.js";
import type { TrialProfiler } from "../profiler/profiler.js";
import { InvalidConfigurationError, assertPositiveInteger, isBenchmarkError } from "../errors.js";
import type { Logger } from "../logger.js";
import { createLogger } from "../logger.js";

export interface StrategyEntry {
  name: StrategyName;
  factory: StrategyFactory;
}

export interface Trial {
  strategy: StrategyName;
  size: number;
  /** 1-based position in the run. */
  index: number;
  total: number;
}

export interface BenchmarkRunOptions {
  strategies: readonly StrategyEntry[];
  prices: readonly number[];
  sizes: readonly number[];
  profiler: TrialProfiler;
  logger?: Logger;
  /** Record failed trials and keep going (default). When false the first failure is rethrown. */
  continueOnError?: boolean;
  onTrialStart?: (trial: Trial) => void;
  onTrialComplete?: (trial: Trial, sample: BenchmarkSample) => void;
  onTrialFailed?: (trial: Trial, failure: TrialFailure) => void;
}

export function normalizeSizes(sizes: readonly number[]): number[] {
  if (sizes.length === 0) {
    throw new InvalidConfigurationError("At least one input size is required");
  }
  for (const size of sizes) {
    assertPositiveInteger(size, "Input size");
  }
  return [...new Set(sizes)].sort((a, b) => a - b);
}

/**
 * Enumerates strategy x size, strategy-major then size ascending, and
 * profiles each combination one at a time.
 */
export function runBenchmark(options: BenchmarkRunOptions): BenchmarkReport {
  const {
    strategies,
    prices,
    profiler,
    logger = createLogger({ level: "silent" }),
    continueOnError = true,
    onTrialStart,
    onTrialComplete,
    onTrialFailed
  } = options;

  if (strategies.length === 0) {
    throw new InvalidConfigurationError("At least one strategy is required");
  }

  const sizes = normalizeSizes(options.sizes);
  const largest = sizes[sizes.length - 1];
  if (largest > prices.length) {
    throw new InvalidConfigurationError(
      `Not enough ticks: requested ${largest}, have ${prices.length}`
    );
  }

  const startedAt = new Date().toISOString();
  const samples: BenchmarkSample[] = [];
  const failures: TrialFailure[] = [];
  const total = strategies.length * sizes.length;
  let index = 0;

  for (const entry of strategies) {
    for (const size of sizes) {
      index++;
      const trial: Trial = { strategy: entry.name, size, index, total };
      const log = logger.child({ strategy: entry.name, size });

      log.debug({ trial: index, total }, "Trial started");
      onTrialStart?.(trial);

      try {
        const sample = profiler.measure(entry.factory, prices.slice(0, size));
        samples.push(sample);
        log.info(
          { elapsedSeconds: sample.elapsedSeconds, peakMemoryBytes: sample.peakMemoryBytes },
          "Trial completed"
        );
        if (!sample.baselineIsolated) {
          log.warn("Peak memory baseline not isolated: no garbage collection could be forced");
        }
        onTrialComplete?.(trial, sample);
      } catch (error) {
        if (!isBenchmarkError(error) || !continueOnError) {
          throw error;
        }

        const failure: TrialFailure = {
          strategy: entry.name,
          size,
          code: error.code,
          message: error.message
        };
        failures.push(failure);
        log.warn({ code: error.code, error: error.message }, "Trial failed");
        onTrialFailed?.(trial, failure);
      }
    }
  }

  return {
    samples,
    failures,
    startedAt,
    finishedAt: new Date().toISOString()
  };
}
