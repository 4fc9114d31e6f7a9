import { getHeapStatistics, setFlagsFromString } from "node:v8";
import { runInNewContext } from "node:vm";
import type { MemoryProbeName } from "@tickbench/types";
import { MeasurementUnavailableError } from "../errors.js";

export type MemoryProbePreference = MemoryProbeName | "auto";

export interface PeakMeasurement {
  /** Highest reading above the pre-run baseline. */
  bytes: number;
  /** False when no collection could be forced before the baseline was read. */
  baselineIsolated: boolean;
}

export interface MemoryProbe {
  readonly name: MemoryProbeName;
  isAvailable(): boolean;
  /**
   * Runs `run` and returns the highest reading seen above the pre-run
   * baseline. `run` calls `checkpoint` wherever a reading should be taken;
   * one more reading is taken after it returns.
   */
  measurePeak(run: (checkpoint: () => void) => void): PeakMeasurement;
}

let gcFunction: (() => void) | null | undefined;

function lookupGc(): (() => void) | null {
  const exposed: unknown = Reflect.get(globalThis, "gc");
  if (typeof exposed === "function") {
    return () => {
      exposed();
    };
  }

  // Without --expose-gc, a context created while the flag is on still gets `gc`.
  try {
    setFlagsFromString("--expose-gc");
    const fromContext: unknown = runInNewContext("gc");
    if (typeof fromContext === "function") {
      return () => {
        fromContext();
      };
    }
    return null;
  } catch {
    return null;
  } finally {
    setFlagsFromString("--no-expose-gc");
  }
}

/** Forces a full collection. Returns false when the host allows none. */
export function collectGarbage(): boolean {
  if (gcFunction === undefined) {
    gcFunction = lookupGc();
  }
  if (gcFunction === null) {
    return false;
  }
  gcFunction();
  return true;
}

export class SamplingMemoryProbe implements MemoryProbe {
  constructor(
    readonly name: MemoryProbeName,
    private readonly read: () => number,
    private readonly collect: () => boolean = collectGarbage
  ) {}

  isAvailable(): boolean {
    try {
      return Number.isFinite(this.read());
    } catch {
      return false;
    }
  }

  measurePeak(run: (checkpoint: () => void) => void): PeakMeasurement {
    const baselineIsolated = this.collect();
    const baseline = this.sample();
    let peak = baseline;

    run(() => {
      const reading = this.sample();
      if (reading > peak) {
        peak = reading;
      }
    });

    const final = this.sample();
    if (final > peak) {
      peak = final;
    }

    return { bytes: Math.max(peak - baseline, 0), baselineIsolated };
  }

  private sample(): number {
    let reading: number;
    try {
      reading = this.read();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MeasurementUnavailableError(`${this.name} probe failed: ${reason}`);
    }
    if (!Number.isFinite(reading)) {
      throw new MeasurementUnavailableError(`${this.name} probe returned ${reading}`);
    }
    return reading;
  }
}

export function createHeapProbe(): MemoryProbe {
  return new SamplingMemoryProbe("heap", () => getHeapStatistics().used_heap_size);
}

export function createRssProbe(): MemoryProbe {
  return new SamplingMemoryProbe("rss", () => process.memoryUsage.rss());
}

export function defaultMemoryProbes(): MemoryProbe[] {
  return [createHeapProbe(), createRssProbe()];
}

/**
 * Picks the requested probe, or for "auto" the first available candidate.
 */
export function resolveMemoryProbe(
  preference: MemoryProbePreference = "auto",
  candidates: readonly MemoryProbe[] = defaultMemoryProbes()
): MemoryProbe {
  const eligible =
    preference === "auto" ? candidates : candidates.filter((probe) => probe.name === preference);

  for (const probe of eligible) {
    if (probe.isAvailable()) {
      return probe;
    }
  }

  const tried = eligible.map((probe) => probe.name).join(", ") || "none";
  throw new MeasurementUnavailableError(
    `No memory probe available for preference "${preference}" (tried: ${tried})`
  );
}
