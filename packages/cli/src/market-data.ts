import { writeFileSync } from "fs";
import type { MarketTick } from "@tickbench/types";
import { assertPositiveInteger, InvalidConfigurationError } from "@tickbench/core";
import type { MarketDataOptions } from "./types.js";

const MIN_PRICE = 0.01;

/** mulberry32: small seeded PRNG returning values in [0, 1). */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function standardNormal(random: () => number): number {
  // Box-Muller
  const u1 = Math.max(random(), 1e-12);
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Random-walk price series: p[t+1] = max(0.01, p[t] + drift + N(0, volatility)).
 * Prices are rounded to six decimals, matching the CSV the generator writes.
 */
export function generateMarketData(options: MarketDataOptions): MarketTick[] {
  const {
    count,
    symbol = "SIM",
    startPrice = 100,
    startTime = new Date("2026-01-01T00:00:00Z"),
    stepSeconds = 1,
    drift = 0,
    volatility = 0.2,
    seed = 42
  } = options;

  assertPositiveInteger(count, "count");
  if (!Number.isFinite(startPrice) || startPrice < MIN_PRICE) {
    throw new InvalidConfigurationError(`startPrice must be at least ${MIN_PRICE}, got ${startPrice}`);
  }
  if (!Number.isFinite(volatility) || volatility < 0) {
    throw new InvalidConfigurationError(`volatility must be a non-negative number, got ${volatility}`);
  }
  if (!Number.isFinite(drift)) {
    throw new InvalidConfigurationError(`drift must be a finite number, got ${drift}`);
  }

  const random = createRandom(seed);
  const ticks: MarketTick[] = [];
  let price = startPrice;
  let time = startTime.getTime();

  for (let i = 0; i < count; i++) {
    ticks.push({ timestamp: new Date(time), symbol, price: Number(price.toFixed(6)) });
    price = Math.max(MIN_PRICE, price + drift + standardNormal(random) * volatility);
    time += stepSeconds * 1000;
  }

  return ticks;
}

export function renderMarketDataCsv(ticks: readonly MarketTick[]): string {
  const rows = ticks.map(
    (tick) => `${tick.timestamp.toISOString()},${tick.symbol},${tick.price.toFixed(6)}`
  );
  return ["timestamp,symbol,price", ...rows].join("\n") + "\n";
}

export function writeMarketDataCsv(path: string, ticks: readonly MarketTick[]): void {
  writeFileSync(path, renderMarketDataCsv(ticks), { encoding: "utf-8" });
}
