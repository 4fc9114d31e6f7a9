#!/usr/bin/env -S tsx --expose-gc
import { Command, InvalidArgumentError, Option } from "commander";
import chalk from "chalk";
import { runCommand, type RunOptions } from "./commands/run.js";
import { generateCommand, type GenerateOptions } from "./commands/generate.js";
import { parseInteger, parseIntegerList, parseList, resolveConfig } from "./config.js";
import { getConfigPath } from "./paths.js";
import { StrategyNameSchema } from "./types.js";
import type { Config } from "./types.js";
import { printError } from "./utils/formatting.js";

const VERSION = "0.1.0";

function integerArg(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === undefined) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function numberArg(value: string): number {
  const parsed = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function sizesArg(value: string): number[] {
  const parsed = parseIntegerList(value);
  if (!parsed) {
    throw new InvalidArgumentError("Expected a comma-separated list of integers.");
  }
  return parsed;
}

function strategiesArg(value: string): Config["strategies"] {
  const result = StrategyNameSchema.array().min(1).safeParse(parseList(value));
  if (!result.success) {
    throw new InvalidArgumentError("Expected a comma-separated list of: naive, cumulative, windowed.");
  }
  return result.data;
}

const program = new Command();

program
  .name("tickbench")
  .description("Runtime and memory scaling of moving-average strategies over price ticks")
  .version(VERSION);

program
  .command("run")
  .description("Benchmark every strategy at every input size and write a report")
  .option("-c, --csv <path>", "Tick CSV (timestamp,symbol,price); omitted: synthetic random walk")
  .option("-s, --sizes <list>", "Comma-separated input sizes (default: 1000,10000,100000)", sizesArg)
  .option("-w, --window <k>", "Window size for the windowed strategy (default: 50)", integerArg)
  .option("-r, --repeats <n>", "Timing repeats per trial (default: 3)", integerArg)
  .addOption(
    new Option("-p, --probe <probe>", "Memory probe (default: auto)").choices(["auto", "heap", "rss"])
  )
  .option("--strategies <list>", "Comma-separated strategies to run (default: all)", strategiesArg)
  .option("-o, --out <dir>", "Output directory (default: reports)")
  .option("--seed <n>", "Seed for synthetic ticks (default: 42)", integerArg)
  .option("--no-profile", "Skip the CPU profile capture at the largest size")
  .action(async (options: RunOptions) => {
    await runCommand(options);
  });

program
  .command("generate")
  .description("Write a synthetic market data CSV")
  .option("-o, --out <path>", "Output file (default: market_data.csv)")
  .option("-n, --count <n>", "Number of ticks (default: 100000)", integerArg)
  .option("--symbol <symbol>", "Symbol column value (default: SIM)")
  .option("--start-price <price>", "Starting price (default: 100)", numberArg)
  .option("--drift <d>", "Drift added per tick (default: 0)", numberArg)
  .option("--volatility <v>", "Standard deviation of per-tick noise (default: 0.2)", numberArg)
  .option("--seed <n>", "Random seed (default: 42)", integerArg)
  .action((options: GenerateOptions) => {
    generateCommand(options);
  });

program
  .command("config")
  .description("Show current configuration")
  .action(() => {
    let config: Config;
    try {
      config = resolveConfig();
    } catch (error) {
      printError(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
    console.log("");
    console.log(chalk.bold("Current Configuration:"));
    console.log("");
    for (const [key, value] of Object.entries(config)) {
      const shown = Array.isArray(value) ? value.join(", ") : String(value);
      console.log(`  ${chalk.dim(key)}: ${chalk.white(shown)}`);
    }
    console.log("");
    console.log(chalk.dim(`Config file: ${getConfigPath()}`));
    console.log(
      chalk.dim("Precedence: CLI flags > Environment variables > Config file > Defaults")
    );
    console.log("");
  });

await program.parseAsync();
