import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { InvalidConfigurationError } from "@tickbench/core";
import { resolveConfig, parseIntegerList } from "../src/config.js";

describe("Config Module", () => {
  const envKeys = [
    "TICKBENCH_HOME",
    "TICKBENCH_SIZES",
    "TICKBENCH_WINDOW_SIZE",
    "TICKBENCH_REPEATS",
    "TICKBENCH_SAMPLE_EVERY",
    "TICKBENCH_MEMORY_PROBE",
    "TICKBENCH_STRATEGIES",
    "TICKBENCH_OUTPUT_DIR",
    "TICKBENCH_CPU_PROFILE",
    "TICKBENCH_LOG_LEVEL"
  ];
  const originalEnv: Record<string, string | undefined> = {};
  let home: string;

  beforeEach(() => {
    for (const key of envKeys) {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    }
    home = mkdtempSync(join(tmpdir(), "tickbench-config-"));
    process.env.TICKBENCH_HOME = home;
  });

  afterEach(() => {
    for (const [key, value] of Object.entries(originalEnv)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    rmSync(home, { recursive: true, force: true });
  });

  function writeConfigFile(content: string): void {
    writeFileSync(join(home, "config.json"), content);
  }

  it("should return default config values", () => {
    const config = resolveConfig();

    assert.deepEqual(config, {
      sizes: [1000, 10000, 100000],
      windowSize: 50,
      repeats: 3,
      sampleEvery: 256,
      memoryProbe: "auto",
      strategies: ["naive", "cumulative", "windowed"],
      outputDir: "reports",
      cpuProfile: true,
      logLevel: "info"
    });
  });

  it("should use CLI overrides over all else", () => {
    writeConfigFile(JSON.stringify({ windowSize: 10 }));
    process.env.TICKBENCH_WINDOW_SIZE = "20";

    const config = resolveConfig({ windowSize: 30 });

    assert.equal(config.windowSize, 30);
  });

  it("should use env var over config file", () => {
    writeConfigFile(JSON.stringify({ windowSize: 10, repeats: 5 }));
    process.env.TICKBENCH_WINDOW_SIZE = "20";

    const config = resolveConfig();

    assert.equal(config.windowSize, 20);
    assert.equal(config.repeats, 5);
  });

  it("should ignore undefined CLI overrides", () => {
    process.env.TICKBENCH_REPEATS = "7";

    const config = resolveConfig({ repeats: undefined });

    assert.equal(config.repeats, 7);
  });

  it("should parse list values from env", () => {
    process.env.TICKBENCH_SIZES = "500, 5_000";
    process.env.TICKBENCH_STRATEGIES = "windowed,cumulative";

    const config = resolveConfig();

    assert.deepEqual(config.sizes, [500, 5000]);
    assert.deepEqual(config.strategies, ["windowed", "cumulative"]);
  });

  it("should handle invalid env values gracefully", () => {
    process.env.TICKBENCH_REPEATS = "invalid";
    process.env.TICKBENCH_SIZES = "10,ten";

    const config = resolveConfig();

    assert.equal(config.repeats, 3);
    assert.deepEqual(config.sizes, [1000, 10000, 100000]);
  });

  it("should skip env values that fail their field's schema", () => {
    process.env.TICKBENCH_MEMORY_PROBE = "bogus";
    process.env.TICKBENCH_STRATEGIES = "naive,quantum";
    process.env.TICKBENCH_LOG_LEVEL = "loud";
    process.env.TICKBENCH_WINDOW_SIZE = "0";
    process.env.TICKBENCH_REPEATS = "4";

    const config = resolveConfig();

    assert.equal(config.memoryProbe, "auto");
    assert.deepEqual(config.strategies, ["naive", "cumulative", "windowed"]);
    assert.equal(config.logLevel, "info");
    assert.equal(config.windowSize, 50);
    assert.equal(config.repeats, 4);
  });

  it("should parse boolean env values", () => {
    process.env.TICKBENCH_CPU_PROFILE = "false";
    assert.equal(resolveConfig().cpuProfile, false);

    process.env.TICKBENCH_CPU_PROFILE = "maybe";
    assert.equal(resolveConfig().cpuProfile, true);
  });

  it("should reject config file values outside the schema", () => {
    writeConfigFile(JSON.stringify({ memoryProbe: "gpu" }));

    assert.throws(() => resolveConfig(), (error: unknown) => {
      assert.ok(error instanceof InvalidConfigurationError);
      assert.match(error.message, /^Invalid configuration: memoryProbe: /);
      return true;
    });
  });

  it("should reject a non-positive window size", () => {
    assert.throws(() => resolveConfig({ windowSize: 0 }), InvalidConfigurationError);
  });

  it("should reject a config file that is not JSON", () => {
    writeConfigFile("{ not json");

    assert.throws(() => resolveConfig(), InvalidConfigurationError);
  });

  it("should parse integer lists", () => {
    assert.deepEqual(parseIntegerList("1,2, 3"), [1, 2, 3]);
    assert.equal(parseIntegerList("1,2.5"), undefined);
    assert.equal(parseIntegerList(" , "), undefined);
  });
});
