export { Profiler, type ProfilerOptions, type TrialProfiler } from "./profiler.js";
export { monotonicClock, elapsedSeconds, type Clock } from "./clock.js";
export {
  SamplingMemoryProbe,
  collectGarbage,
  createHeapProbe,
  createRssProbe,
  defaultMemoryProbes,
  resolveMemoryProbe,
  type MemoryProbe,
  type MemoryProbePreference,
  type PeakMeasurement
} from "./memory-probe.js";
export {
  captureCpuProfile,
  type CpuProfile,
  type CpuProfileCapture,
  type CpuProfileOptions
} from "./cpu-profile.js";
