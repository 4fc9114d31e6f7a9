export {
  runBenchmark,
  normalizeSizes,
  type BenchmarkRunOptions,
  type StrategyEntry,
  type Trial
} from "./runner.js";
