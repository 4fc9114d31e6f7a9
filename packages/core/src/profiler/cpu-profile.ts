import { Session } from "node:inspector";
import type { Profiler as InspectorProfiler } from "node:inspector";
import type { StrategyName } from "@tickbench/types";
import type { StrategyFactory } from "../strategies/base.js";
import { assertPositiveInteger } from "../errors.js";

/** V8 sampling profile, the format Chrome DevTools opens as a .cpuprofile file. */
export type CpuProfile = InspectorProfiler.Profile;

export interface CpuProfileCapture {
  strategy: StrategyName;
  size: number;
  profile: CpuProfile;
}

export interface CpuProfileOptions {
  /** Sampling interval in microseconds. */
  samplingIntervalMicros?: number;
}

function startProfiling(session: Session, interval: number): Promise<void> {
  return new Promise((resolve, reject) => {
    session.post("Profiler.enable", (enableError: Error | null) => {
      if (enableError) {
        reject(enableError);
        return;
      }
      session.post("Profiler.setSamplingInterval", { interval }, (intervalError: Error | null) => {
        if (intervalError) {
          reject(intervalError);
          return;
        }
        session.post("Profiler.start", (startError: Error | null) => {
          if (startError) {
            reject(startError);
          } else {
            resolve();
          }
        });
      });
    });
  });
}

function stopProfiling(session: Session): Promise<CpuProfile> {
  return new Promise((resolve, reject) => {
    session.post(
      "Profiler.stop",
      (error: Error | null, result?: InspectorProfiler.StopReturnType) => {
        if (error) {
          reject(error);
        } else if (result) {
          resolve(result.profile);
        } else {
          reject(new Error("Profiler.stop returned no profile"));
        }
      }
    );
  });
}

/**
 * Drives one fresh strategy over `prices` under the V8 sampling profiler and
 * returns the per-function profile. Construction happens before sampling
 * starts. Errors from `ingest` propagate; the session is always closed.
 */
export async function captureCpuProfile(
  factory: StrategyFactory,
  prices: readonly number[],
  options: CpuProfileOptions = {}
): Promise<CpuProfileCapture> {
  const { samplingIntervalMicros = 100 } = options;
  assertPositiveInteger(samplingIntervalMicros, "samplingIntervalMicros");

  const strategy = factory();
  const session = new Session();
  session.connect();

  try {
    await startProfiling(session, samplingIntervalMicros);
    for (let i = 0; i < prices.length; i++) {
      strategy.ingest(prices[i]);
    }
    const profile = await stopProfiling(session);
    return { strategy: strategy.name, size: prices.length, profile };
  } finally {
    session.disconnect();
  }
}
