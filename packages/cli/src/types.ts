import { z } from "zod";

export const StrategyNameSchema = z.enum(["naive", "cumulative", "windowed"]);

export const ConfigSchema = z.object({
  sizes: z.array(z.number().int().positive()).min(1).default([1_000, 10_000, 100_000]),
  windowSize: z.number().int().positive().default(50),
  repeats: z.number().int().positive().default(3),
  sampleEvery: z.number().int().positive().default(256),
  memoryProbe: z.enum(["auto", "heap", "rss"]).default("auto"),
  strategies: z.array(StrategyNameSchema).min(1).default(["naive", "cumulative", "windowed"]),
  outputDir: z.string().min(1).default("reports"),
  cpuProfile: z.boolean().default(true),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export type Config = z.infer<typeof ConfigSchema>;

export interface MarketDataOptions {
  count: number;
  symbol?: string;
  startPrice?: number;
  startTime?: Date;
  stepSeconds?: number;
  drift?: number;
  volatility?: number;
  seed?: number;
}
