import type { StrategyName } from "@tickbench/types";
import type { StrategyFactory } from "./base.js";
import { NaiveStrategy } from "./naive.js";
import { CumulativeStrategy } from "./cumulative.js";
import { WindowedStrategy, assertWindowSize } from "./windowed.js";

export interface StrategyOptions {
  windowSize: number;
}

export function createStrategyFactory(name: StrategyName, options: StrategyOptions): StrategyFactory {
  switch (name) {
    case "naive":
      return () => new NaiveStrategy();
    case "cumulative":
      return () => new CumulativeStrategy();
    case "windowed": {
      const { windowSize } = options;
      assertWindowSize(windowSize);
      return () => new WindowedStrategy(windowSize);
    }
  }
}
