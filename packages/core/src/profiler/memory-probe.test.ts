import assert from "node:assert/strict";
import test from "node:test";
import {
  SamplingMemoryProbe,
  collectGarbage,
  createHeapProbe,
  createRssProbe,
  resolveMemoryProbe
} from "./memory-probe.js";
import { MeasurementUnavailableError } from "../errors.js";

function scriptedProbe(readings: number[], collect: () => boolean = () => true): SamplingMemoryProbe {
  let index = 0;
  return new SamplingMemoryProbe(
    "heap",
    () => {
      const value = readings[Math.min(index, readings.length - 1)];
      index++;
      return value;
    },
    collect
  );
}

test("SamplingMemoryProbe reports the peak above the baseline, not the final reading", () => {
  // baseline 1000, checkpoints 5000 and 3000, final 2000
  const probe = scriptedProbe([1000, 5000, 3000, 2000]);

  const peak = probe.measurePeak((checkpoint) => {
    checkpoint();
    checkpoint();
  });

  assert.deepEqual(peak, { bytes: 4000, baselineIsolated: true });
});

test("SamplingMemoryProbe flags a baseline taken without a forced collection", () => {
  const probe = scriptedProbe([1000, 1500], () => false);

  assert.deepEqual(
    probe.measurePeak((checkpoint) => checkpoint()),
    { bytes: 500, baselineIsolated: false }
  );
});

test("collectGarbage forces a collection", () => {
  assert.equal(collectGarbage(), true);
  assert.equal(collectGarbage(), true);
});

test("SamplingMemoryProbe never reports a negative peak", () => {
  const probe = scriptedProbe([5000, 4000, 3000]);

  assert.equal(probe.measurePeak((checkpoint) => checkpoint()).bytes, 0);
});

test("SamplingMemoryProbe refuses to report a non-finite reading", () => {
  const probe = scriptedProbe([1000, Number.NaN]);

  assert.throws(() => probe.measurePeak((checkpoint) => checkpoint()), MeasurementUnavailableError);
});

test("SamplingMemoryProbe wraps a failing reader", () => {
  const probe = new SamplingMemoryProbe("rss", () => {
    throw new Error("not supported");
  });

  assert.equal(probe.isAvailable(), false);
  assert.throws(() => probe.measurePeak(() => undefined), {
    name: "MeasurementUnavailableError",
    message: "rss probe failed: not supported"
  });
});

test("heap probe sees memory retained during the run", () => {
  const probe = createHeapProbe();
  let retainedLength = 0;

  const peak = probe.measurePeak((checkpoint) => {
    const retained = new Array<number>(1_000_000).fill(0.5);
    checkpoint();
    retainedLength = retained.length;
  });

  assert.equal(retainedLength, 1_000_000);
  assert.ok(peak.bytes >= 4_000_000, `peak was ${peak.bytes}`);
  assert.equal(peak.baselineIsolated, true);
});

test("both built-in probes are available on Node", () => {
  assert.equal(createHeapProbe().isAvailable(), true);
  assert.equal(createRssProbe().isAvailable(), true);
});

test("resolveMemoryProbe honours an explicit preference", () => {
  assert.equal(resolveMemoryProbe("rss").name, "rss");
  assert.equal(resolveMemoryProbe("heap").name, "heap");
});

test("resolveMemoryProbe falls back to the next available probe", () => {
  const broken = new SamplingMemoryProbe("heap", () => Number.NaN);
  const working = new SamplingMemoryProbe("rss", () => 1);

  assert.equal(resolveMemoryProbe("auto", [broken, working]), working);
});

test("resolveMemoryProbe fails when no probe is available", () => {
  const broken = new SamplingMemoryProbe("heap", () => Number.NaN);

  assert.throws(() => resolveMemoryProbe("auto", [broken]), {
    name: "MeasurementUnavailableError",
    message: 'No memory probe available for preference "auto" (tried: heap)'
  });
  assert.throws(() => resolveMemoryProbe("rss", [broken]), {
    message: 'No memory probe available for preference "rss" (tried: none)'
  });
});
