import assert from "node:assert/strict";
import test from "node:test";
import type { MemoryProbe, PeakMeasurement } from "./memory-probe.js";
import { createHeapProbe } from "./memory-probe.js";
import { Profiler } from "./profiler.js";
import type { MovingAverageStrategy } from "../strategies/base.js";
import { CumulativeStrategy } from "../strategies/cumulative.js";
import { createStrategyFactory } from "../strategies/factory.js";
import { InvalidConfigurationError, MalformedInputError } from "../errors.js";

class RecordingProbe implements MemoryProbe {
  readonly name = "heap" as const;
  checkpoints = 0;
  runs = 0;

  constructor(private readonly peakBytes: number = 4096) {}

  isAvailable(): boolean {
    return true;
  }

  measurePeak(run: (checkpoint: () => void) => void): PeakMeasurement {
    this.runs++;
    run(() => {
      this.checkpoints++;
    });
    return { bytes: this.peakBytes, baselineIsolated: true };
  }
}

function sequenceClock(values: bigint[]): () => bigint {
  let index = 0;
  return () => {
    const value = values[index];
    index++;
    return value;
  };
}

test("Profiler reports the fastest of its timing repeats", () => {
  const profiler = new Profiler({
    memoryProbe: new RecordingProbe(),
    repeats: 3,
    clock: sequenceClock([0n, 3_000_000_000n, 0n, 1_000_000_000n, 0n, 2_000_000_000n])
  });

  const sample = profiler.measure(() => new CumulativeStrategy(), [1, 2, 3]);

  assert.deepEqual(sample, {
    strategy: "cumulative",
    size: 3,
    elapsedSeconds: 1,
    peakMemoryBytes: 4096,
    baselineIsolated: true,
    memoryProbe: "heap",
    repeats: 3
  });
  assert.ok(Object.isFrozen(sample));
});

test("Profiler keeps strategy construction outside the timed region", () => {
  let now = 0n;
  const factory = (): MovingAverageStrategy => {
    now += 1_000_000_000n;
    return {
      name: "naive",
      ingest: (price: number) => {
        now += 10n;
        return price;
      }
    };
  };

  const profiler = new Profiler({
    memoryProbe: new RecordingProbe(),
    repeats: 2,
    clock: () => now
  });

  const sample = profiler.measure(factory, [1, 2, 3, 4, 5]);

  assert.equal(sample.elapsedSeconds, 50 / 1e9);
  assert.equal(sample.strategy, "naive");
});

test("Profiler builds a fresh strategy for every pass", () => {
  let created = 0;
  const probe = new RecordingProbe();
  const profiler = new Profiler({ memoryProbe: probe, repeats: 3 });

  profiler.measure(() => {
    created++;
    return new CumulativeStrategy();
  }, [1, 2]);

  assert.equal(created, 4);
  assert.equal(probe.runs, 1);
});

test("Profiler takes memory readings every sampleEvery ticks and at the end", () => {
  const probe = new RecordingProbe();
  const profiler = new Profiler({ memoryProbe: probe, repeats: 1, sampleEvery: 4 });
  const prices = Array.from({ length: 10 }, (_, i) => i + 1);

  profiler.measure(() => new CumulativeStrategy(), prices);

  assert.equal(probe.checkpoints, 3);
});

test("Profiler propagates ingest failures and produces no sample", () => {
  const probe = new RecordingProbe();
  const profiler = new Profiler({ memoryProbe: probe, repeats: 2 });

  assert.throws(
    () => profiler.measure(() => new CumulativeStrategy(), [1, Number.NaN, 3]),
    MalformedInputError
  );
  assert.equal(probe.runs, 0);
});

test("Profiler rejects non-positive repeats and sample intervals", () => {
  const memoryProbe = new RecordingProbe();

  assert.throws(() => new Profiler({ memoryProbe, repeats: 0 }), InvalidConfigurationError);
  assert.throws(() => new Profiler({ memoryProbe, sampleEvery: -1 }), InvalidConfigurationError);
});

test("Profiler uses a monotonic clock by default", () => {
  const profiler = new Profiler({ memoryProbe: new RecordingProbe(), repeats: 2 });

  const sample = profiler.measure(() => new CumulativeStrategy(), [1, 2, 3, 4]);

  assert.ok(sample.elapsedSeconds >= 0);
  assert.ok(Number.isFinite(sample.elapsedSeconds));
});

test("windowed peak memory stays flat once the window is full", () => {
  const windowSize = 1_000;
  const factory = createStrategyFactory("windowed", { windowSize });
  const profiler = new Profiler({ memoryProbe: createHeapProbe(), repeats: 1 });
  const stream = Array.from({ length: 10 * windowSize }, (_, i) => (i % 100) + 1);

  profiler.measure(factory, stream.slice(0, windowSize));
  const atWindow = profiler.measure(factory, stream.slice(0, windowSize));
  const atTenWindows = profiler.measure(factory, stream);

  assert.equal(atTenWindows.baselineIsolated, true);
  assert.ok(
    Math.abs(atTenWindows.peakMemoryBytes - atWindow.peakMemoryBytes) <= 512 * 1024,
    `N=k ${atWindow.peakMemoryBytes} B, N=10k ${atTenWindows.peakMemoryBytes} B`
  );
});

test("naive peak memory grows with the number of ticks", () => {
  const factory = createStrategyFactory("naive", { windowSize: 1 });
  const profiler = new Profiler({ memoryProbe: createHeapProbe(), repeats: 1 });
  const stream = Array.from({ length: 20_000 }, (_, i) => (i % 100) + 0.5);

  profiler.measure(factory, stream.slice(0, 2_000));
  const small = profiler.measure(factory, stream.slice(0, 2_000));
  const large = profiler.measure(factory, stream);

  // 20,000 retained doubles occupy at least 8 bytes each.
  assert.ok(large.peakMemoryBytes >= 160_000, `N=20,000 ${large.peakMemoryBytes} B`);
  assert.ok(
    large.peakMemoryBytes > small.peakMemoryBytes,
    `N=2,000 ${small.peakMemoryBytes} B, N=20,000 ${large.peakMemoryBytes} B`
  );
});

test("cumulative strategy stays under 100 MB at 100,000 ticks", () => {
  const factory = createStrategyFactory("cumulative", { windowSize: 1 });
  const profiler = new Profiler({ memoryProbe: createHeapProbe(), repeats: 1 });
  const stream = Array.from({ length: 100_000 }, (_, i) => (i % 100) + 1);

  const sample = profiler.measure(factory, stream);

  assert.ok(sample.peakMemoryBytes < 100 * 1024 * 1024, `peak ${sample.peakMemoryBytes} B`);
});
