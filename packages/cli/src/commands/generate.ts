import { resolve } from "path";
import ora from "ora";
import { generateMarketData, writeMarketDataCsv } from "../market-data.js";
import { formatCount, printError, printHeader, printKeyValue } from "../utils/formatting.js";

export interface GenerateOptions {
  out?: string;
  count?: number;
  symbol?: string;
  startPrice?: number;
  drift?: number;
  volatility?: number;
  seed?: number;
}

export function generateCommand(options: GenerateOptions = {}): void {
  printHeader("Synthetic Market Data");

  const out = options.out ?? "market_data.csv";
  const spinner = ora("Generating random walk...").start();

  try {
    const ticks = generateMarketData({
      count: options.count ?? 100_000,
      symbol: options.symbol,
      startPrice: options.startPrice,
      drift: options.drift,
      volatility: options.volatility,
      seed: options.seed
    });
    writeMarketDataCsv(out, ticks);
    spinner.succeed(`Wrote ${formatCount(ticks.length)} ticks`);

    console.log("");
    printKeyValue("File", resolve(out));
    printKeyValue("Symbol", ticks[0].symbol);
    printKeyValue("First price", ticks[0].price.toFixed(6));
    printKeyValue("Last price", ticks[ticks.length - 1].price.toFixed(6));
    console.log("");
  } catch (error) {
    spinner.fail("Generation failed");
    console.log("");
    printError(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
