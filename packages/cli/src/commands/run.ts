import { join } from "path";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { MarketTick } from "@tickbench/types";
import {
  Profiler,
  captureCpuProfile,
  createStrategyFactory,
  resolveMemoryProbe,
  runBenchmark,
  type CpuProfileCapture,
  type Logger
} from "@tickbench/core";
import { resolveConfig } from "../config.js";
import { createFileLogger } from "../logger.js";
import { describeDatasetFootprint, extractPrices, loadMarketData } from "../data-loader.js";
import { generateMarketData } from "../market-data.js";
import { writeCpuProfiles } from "../profiles.js";
import { renderMarkdownReport, renderResultsCsv, renderResultsTable } from "../reporting.js";
import type { Config } from "../types.js";
import { ensureDir, writeJsonFile, writeTextFile } from "../utils/fs.js";
import {
  failSpinners,
  formatCount,
  formatMegabytes,
  formatSeconds,
  printError,
  printHeader,
  printKeyValue,
  printWarning
} from "../utils/formatting.js";

export interface RunOptions {
  csv?: string;
  sizes?: number[];
  window?: number;
  repeats?: number;
  probe?: Config["memoryProbe"];
  strategies?: Config["strategies"];
  out?: string;
  seed?: number;
  /** commander sets false for --no-profile. */
  profile?: boolean;
}

interface TickSource {
  ticks: MarketTick[];
  description: string;
}

function loadTicks(options: RunOptions, config: Config): TickSource {
  if (options.csv) {
    return { ticks: loadMarketData(options.csv), description: options.csv };
  }

  const seed = options.seed ?? 42;
  const count = Math.max(...config.sizes);
  return {
    ticks: generateMarketData({ count, seed }),
    description: `synthetic random walk (seed ${seed})`
  };
}

export async function runCommand(options: RunOptions = {}): Promise<void> {
  printHeader("Moving Average Complexity Benchmark");

  let logger: Logger | undefined;
  // Spinner of the running trial or profile capture, set from hooks.
  const active: { spinner?: Ora } = {};
  const spinner = ora("Loading configuration...").start();

  try {
    const config = resolveConfig({
      sizes: options.sizes,
      windowSize: options.window,
      repeats: options.repeats,
      memoryProbe: options.probe,
      strategies: options.strategies,
      outputDir: options.out,
      cpuProfile: options.profile === false ? false : undefined
    });
    logger = createFileLogger(config.logLevel);

    spinner.text = "Loading ticks...";
    const source = loadTicks(options, config);
    const prices = extractPrices(source.ticks);
    spinner.succeed(`Loaded ${formatCount(prices.length)} ticks from ${source.description}`);
    logger.info({ source: source.description, ticks: prices.length }, "Ticks loaded");

    console.log("");
    console.log(chalk.dim(describeDatasetFootprint(prices.length)));
    console.log("");

    const memoryProbe = resolveMemoryProbe(config.memoryProbe);
    const profiler = new Profiler({
      memoryProbe,
      repeats: config.repeats,
      sampleEvery: config.sampleEvery
    });

    printKeyValue("Strategies", config.strategies.join(", "));
    printKeyValue("Sizes", config.sizes.map(formatCount).join(", "));
    printKeyValue("Window", String(config.windowSize));
    printKeyValue("Repeats", String(config.repeats));
    printKeyValue("Memory probe", memoryProbe.name);
    console.log("");

    const strategies = config.strategies.map((name) => ({
      name,
      factory: createStrategyFactory(name, { windowSize: config.windowSize })
    }));

    const report = runBenchmark({
      strategies,
      prices,
      sizes: config.sizes,
      profiler,
      logger,
      onTrialStart: (trial) => {
        active.spinner = ora(
          `[${trial.index}/${trial.total}] ${trial.strategy} @ ${formatCount(trial.size)} ticks`
        ).start();
      },
      onTrialComplete: (trial, sample) => {
        active.spinner?.succeed(
          `[${trial.index}/${trial.total}] ${trial.strategy} @ ${formatCount(trial.size)} ticks: ` +
            `${formatSeconds(sample.elapsedSeconds)}s, ${formatMegabytes(sample.peakMemoryBytes)} MB`
        );
      },
      onTrialFailed: (trial, failure) => {
        active.spinner?.fail(
          `[${trial.index}/${trial.total}] ${trial.strategy} @ ${formatCount(trial.size)} ticks: ${failure.message}`
        );
      }
    });

    console.log("");
    for (const line of renderResultsTable(report)) {
      console.log(line);
    }
    console.log("");

    ensureDir(config.outputDir);
    const reportPath = join(config.outputDir, "complexity_report.md");
    const csvPath = join(config.outputDir, "results.csv");
    const jsonPath = join(config.outputDir, "results.json");

    writeTextFile(
      reportPath,
      renderMarkdownReport(report, {
        source: source.description,
        tickCount: prices.length,
        windowSize: config.windowSize,
        repeats: config.repeats,
        memoryProbe: memoryProbe.name
      })
    );
    writeTextFile(csvPath, renderResultsCsv(report.samples));
    writeJsonFile(jsonPath, report);

    const profilePaths: string[] = [];
    if (config.cpuProfile) {
      const largest = Math.max(...config.sizes);
      const profiled = strategies.filter((entry) =>
        report.samples.some((sample) => sample.strategy === entry.name && sample.size === largest)
      );
      active.spinner = ora(`Capturing CPU profiles at ${formatCount(largest)} ticks...`).start();
      const captures: CpuProfileCapture[] = [];
      for (const entry of profiled) {
        captures.push(await captureCpuProfile(entry.factory, prices.slice(0, largest)));
      }
      profilePaths.push(...writeCpuProfiles(captures, join(config.outputDir, "profiles")));
      active.spinner.succeed(`Captured ${captures.length} CPU profile(s) at ${formatCount(largest)} ticks`);
      logger.info({ size: largest, profiles: profilePaths }, "CPU profiles written");
    }

    logger.info(
      { samples: report.samples.length, failures: report.failures.length, outputDir: config.outputDir },
      "Benchmark finished"
    );

    if (report.samples.some((sample) => !sample.baselineIsolated)) {
      printWarning("Garbage collection could not be forced; peak memory may include earlier trials' garbage");
    }
    if (report.failures.length > 0) {
      printWarning(`${report.failures.length} trial(s) failed; see the report for details`);
    }

    console.log(chalk.bold("  Generated artifacts:"));
    console.log(`  - ${reportPath}`);
    console.log(`  - ${csvPath}`);
    console.log(`  - ${jsonPath}`);
    for (const path of profilePaths) {
      console.log(`  - ${path}`);
    }
    console.log("");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    failSpinners([active.spinner, spinner], "Benchmark aborted");
    logger?.error({ error: message }, "Benchmark aborted");
    console.log("");
    printError(message);
    process.exit(1);
  }
}
