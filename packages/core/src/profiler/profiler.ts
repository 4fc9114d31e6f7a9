import type { BenchmarkSample, StrategyName } from "@tickbench/types";
import type { StrategyFactory } from "../strategies/base.js";
import { assertPositiveInteger } from "../errors.js";
import type { Clock } from "./clock.js";
import { monotonicClock, elapsedSeconds } from "./clock.js";
import type { MemoryProbe } from "./memory-probe.js";

export interface ProfilerOptions {
  memoryProbe: MemoryProbe;
  /** Timing trials per measurement; the fastest is reported. */
  repeats?: number;
  /** Ticks between memory readings during the memory pass. */
  sampleEvery?: number;
  clock?: Clock;
}

export interface TrialProfiler {
  measure(factory: StrategyFactory, prices: readonly number[]): BenchmarkSample;
}

interface TimedRun {
  strategy: StrategyName;
  seconds: number;
}

/**
 * Measures one (strategy, input size) trial.
 *
 * Timing and memory are taken in separate passes so probe readings never
 * land inside the timed region. Every pass builds its own strategy instance
 * and drops it on return.
 */
export class Profiler implements TrialProfiler {
  readonly repeats: number;
  readonly sampleEvery: number;
  private readonly memoryProbe: MemoryProbe;
  private readonly clock: Clock;

  constructor(options: ProfilerOptions) {
    const { memoryProbe, repeats = 3, sampleEvery = 256, clock = monotonicClock } = options;
    assertPositiveInteger(repeats, "repeats");
    assertPositiveInteger(sampleEvery, "sampleEvery");

    this.memoryProbe = memoryProbe;
    this.repeats = repeats;
    this.sampleEvery = sampleEvery;
    this.clock = clock;
  }

  measure(factory: StrategyFactory, prices: readonly number[]): BenchmarkSample {
    const runs: TimedRun[] = [];
    for (let r = 0; r < this.repeats; r++) {
      runs.push(this.timeOnce(factory, prices));
    }

    const peak = this.memoryProbe.measurePeak((checkpoint) => {
      const strategy = factory();
      for (let i = 0; i < prices.length; i++) {
        strategy.ingest(prices[i]);
        if ((i + 1) % this.sampleEvery === 0) {
          checkpoint();
        }
      }
      checkpoint();
    });

    return Object.freeze({
      strategy: runs[0].strategy,
      size: prices.length,
      elapsedSeconds: Math.min(...runs.map((run) => run.seconds)),
      peakMemoryBytes: peak.bytes,
      baselineIsolated: peak.baselineIsolated,
      memoryProbe: this.memoryProbe.name,
      repeats: this.repeats
    });
  }

  private timeOnce(factory: StrategyFactory, prices: readonly number[]): TimedRun {
    const strategy = factory();

    const start = this.clock();
    for (let i = 0; i < prices.length; i++) {
      strategy.ingest(prices[i]);
    }
    const end = this.clock();

    return { strategy: strategy.name, seconds: elapsedSeconds(start, end) };
  }
}
