import { existsSync, readFileSync } from "fs";
import { InvalidConfigurationError } from "@tickbench/core";
import type { Config } from "./types.js";
import { ConfigSchema } from "./types.js";
import { getConfigPath } from "./paths.js";

type EnvKind = "integer" | "integerList" | "list" | "string" | "boolean";

const ENV_MAPPINGS: Record<string, { key: keyof Config; kind: EnvKind }> = {
  TICKBENCH_SIZES: { key: "sizes", kind: "integerList" },
  TICKBENCH_WINDOW_SIZE: { key: "windowSize", kind: "integer" },
  TICKBENCH_REPEATS: { key: "repeats", kind: "integer" },
  TICKBENCH_SAMPLE_EVERY: { key: "sampleEvery", kind: "integer" },
  TICKBENCH_MEMORY_PROBE: { key: "memoryProbe", kind: "string" },
  TICKBENCH_STRATEGIES: { key: "strategies", kind: "list" },
  TICKBENCH_OUTPUT_DIR: { key: "outputDir", kind: "string" },
  TICKBENCH_CPU_PROFILE: { key: "cpuProfile", kind: "boolean" },
  TICKBENCH_LOG_LEVEL: { key: "logLevel", kind: "string" }
};

export function parseInteger(value: string): number | undefined {
  const trimmed = value.trim().replace(/_/g, "");
  if (!/^-?\d+$/.test(trimmed)) {
    return undefined;
  }
  return parseInt(trimmed, 10);
}

export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseBoolean(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      return undefined;
  }
}

export function parseIntegerList(value: string): number[] | undefined {
  const items = parseList(value);
  const parsed: number[] = [];
  for (const item of items) {
    const n = parseInteger(item);
    if (n === undefined) {
      return undefined;
    }
    parsed.push(n);
  }
  return parsed.length > 0 ? parsed : undefined;
}

function parseEnvValue(raw: string, kind: EnvKind): unknown {
  switch (kind) {
    case "integer":
      return parseInteger(raw);
    case "integerList":
      return parseIntegerList(raw);
    case "list":
      return parseList(raw);
    case "string":
      return raw;
    case "boolean":
      return parseBoolean(raw);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadConfigFile(): Record<string, unknown> | null {
  const path = getConfigPath();
  if (!existsSync(path)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigurationError(`Config file ${path} is not valid JSON: ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new InvalidConfigurationError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function loadEnvConfig(): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envKey, { key, kind }] of Object.entries(ENV_MAPPINGS)) {
    const value = process.env[envKey];
    if (value !== undefined) {
      // Values that do not parse, or fail their field's schema, are skipped.
      const parsed = parseEnvValue(value, kind);
      if (parsed !== undefined && ConfigSchema.shape[key].safeParse(parsed).success) {
        config[key] = parsed;
      }
    }
  }

  return config;
}

/**
 * Precedence: CLI flags > environment variables > config file > defaults.
 */
export function resolveConfig(cliOverrides: Partial<Config> = {}): Config {
  const merged: Record<string, unknown> = {};

  for (const layer of [loadConfigFile() ?? {}, loadEnvConfig(), cliOverrides]) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigurationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
