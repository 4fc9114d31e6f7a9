import chalk from "chalk";
import type { BenchmarkReport, BenchmarkSample, MemoryProbeName, StrategyName, TrialFailure } from "@tickbench/types";
import { STRATEGY_NAMES } from "@tickbench/types";
import { formatCount, formatMegabytes, formatSeconds } from "./utils/formatting.js";

export const COMPLEXITY_NOTES: Record<StrategyName, string> = {
  naive: "Per-tick time O(n), total O(N^2); space O(N) (stores full history).",
  cumulative: "Per-tick time O(1), total O(N); space O(1) (running sum + count).",
  windowed: "Per-tick time O(1) amortized, total O(N); space O(k) (circular deque window)."
};

export interface ReportContext {
  source: string;
  tickCount: number;
  windowSize: number;
  repeats: number;
  memoryProbe: MemoryProbeName;
}

type ChartMetric = "elapsedSeconds" | "peakMemoryBytes";

export function sortSamples(samples: readonly BenchmarkSample[]): BenchmarkSample[] {
  return [...samples].sort(
    (a, b) =>
      STRATEGY_NAMES.indexOf(a.strategy) - STRATEGY_NAMES.indexOf(b.strategy) || a.size - b.size
  );
}

export function renderMarkdownTable(samples: readonly BenchmarkSample[]): string {
  const lines = [
    "| Strategy | Ticks | Runtime (s) | Peak Memory (MB) |",
    "|---|---:|---:|---:|"
  ];
  for (const sample of sortSamples(samples)) {
    lines.push(
      `| ${sample.strategy} | ${formatCount(sample.size)} | ${formatSeconds(sample.elapsedSeconds)} | ${formatMegabytes(sample.peakMemoryBytes)} |`
    );
  }
  return lines.join("\n");
}

function formatMetric(metric: ChartMetric, value: number): string {
  return metric === "elapsedSeconds" ? `${formatSeconds(value)}s` : `${formatMegabytes(value)} MB`;
}

/** Horizontal bar chart, bars scaled to the largest value across all samples. */
export function renderScalingChart(
  samples: readonly BenchmarkSample[],
  metric: ChartMetric,
  width: number = 40
): string {
  const sorted = sortSamples(samples);
  const max = Math.max(0, ...sorted.map((sample) => sample[metric]));

  return sorted
    .map((sample) => {
      const value = sample[metric];
      const length = max > 0 && value > 0 ? Math.max(1, Math.round((value / max) * width)) : 0;
      const label = `${sample.strategy.padEnd(10)} ${formatCount(sample.size).padStart(9)}`;
      return `${label} | ${"#".repeat(length)} ${formatMetric(metric, value)}`;
    })
    .join("\n");
}

export function renderNarrative(samples: readonly BenchmarkSample[]): string {
  if (samples.length === 0) {
    return "No trials completed.";
  }

  const largest = Math.max(...samples.map((sample) => sample.size));
  const ranked = samples
    .filter((sample) => sample.size === largest)
    .sort((a, b) => a.elapsedSeconds - b.elapsedSeconds);

  const lines = [`For **${formatCount(largest)} ticks**, fastest to slowest (by runtime):`];
  for (const sample of ranked) {
    lines.push(
      `- ${sample.strategy}: ${formatSeconds(sample.elapsedSeconds)}s, peak ${formatMegabytes(sample.peakMemoryBytes)} MB`
    );
  }
  lines.push(
    "",
    "The naive strategy re-sums the entire history on every tick (quadratic total work), " +
      "so it scales much worse than the O(N) strategies as N grows.",
    "The cumulative strategy tracks only a running sum and count, so neither time per tick nor memory " +
      "depends on history length. The windowed strategy bounds memory to O(k) by keeping only the last k prices."
  );
  return lines.join("\n");
}

export function renderFailures(failures: readonly TrialFailure[]): string {
  if (failures.length === 0) {
    return "None.";
  }
  return failures
    .map((failure) => `- ${failure.strategy} @ ${formatCount(failure.size)}: ${failure.code}: ${failure.message}`)
    .join("\n");
}

export const UNISOLATED_BASELINE_NOTE =
  "- **Warning:** no garbage collection could be forced before some memory passes; their peaks may include garbage left by earlier trials.";

export function renderMarkdownReport(report: BenchmarkReport, context: ReportContext): string {
  const strategies = STRATEGY_NAMES.filter((name) =>
    report.samples.some((sample) => sample.strategy === name) ||
    report.failures.some((failure) => failure.strategy === name)
  );
  const notes = strategies.map((name) => `- **${name}**: ${COMPLEXITY_NOTES[name]}`).join("\n");
  const isolationNote = report.samples.every((sample) => sample.baselineIsolated)
    ? ""
    : `${UNISOLATED_BASELINE_NOTE}\n`;

  return `# Runtime & Space Complexity of Moving-Average Strategies

## Overview
Ticks: ${formatCount(context.tickCount)} from ${context.source}.
Window size (k): ${context.windowSize}. Timing repeats per trial: ${context.repeats}.
Run: ${report.startedAt} to ${report.finishedAt}.

## Complexity Annotations (Big-O)
${notes}

## Benchmark Results
${renderMarkdownTable(report.samples)}

## Scaling
### Runtime vs Input Size
\`\`\`
${renderScalingChart(report.samples, "elapsedSeconds")}
\`\`\`

### Peak Memory vs Input Size
\`\`\`
${renderScalingChart(report.samples, "peakMemoryBytes")}
\`\`\`

## Narrative Comparison
${renderNarrative(report.samples)}

## Failed Trials
${renderFailures(report.failures)}

## Notes on Measurement
- **Runtime** is the fastest of ${context.repeats} runs on a monotonic high-resolution clock; strategy construction is not timed.
- **Peak memory** comes from the \`${context.memoryProbe}\` probe, sampled during a separate untimed pass and reported above the pre-run baseline. Values from different probes are not comparable.
${isolationNote}`;
}

export function renderResultsCsv(samples: readonly BenchmarkSample[]): string {
  const rows = samples.map((sample) =>
    [
      sample.strategy,
      sample.size,
      sample.elapsedSeconds,
      sample.peakMemoryBytes,
      sample.memoryProbe,
      sample.repeats
    ].join(",")
  );
  return ["strategy,size,elapsed_seconds,peak_memory_bytes,memory_probe,repeats", ...rows].join("\n") + "\n";
}

export function renderResultsTable(report: BenchmarkReport): string[] {
  const header = [
    "Strategy".padEnd(12),
    "Ticks".padStart(10),
    "Runtime (s)".padStart(14),
    "Peak (MB)".padStart(12)
  ].join(" ");

  const lines = [`  ${chalk.bold(header)}`, `  ${chalk.dim("-".repeat(header.length))}`];
  for (const sample of sortSamples(report.samples)) {
    lines.push(
      "  " +
        [
          chalk.cyan(sample.strategy.padEnd(12)),
          formatCount(sample.size).padStart(10),
          formatSeconds(sample.elapsedSeconds).padStart(14),
          formatMegabytes(sample.peakMemoryBytes).padStart(12)
        ].join(" ")
    );
  }
  for (const failure of report.failures) {
    lines.push(
      "  " +
        [
          chalk.red(failure.strategy.padEnd(12)),
          formatCount(failure.size).padStart(10),
          chalk.red(`failed (${failure.code})`.padStart(27))
        ].join(" ")
    );
  }
  return lines;
}
