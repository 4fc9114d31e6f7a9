export type { MovingAverageStrategy, StrategyFactory } from "./base.js";
export { assertFinitePrice } from "./base.js";
export { NaiveStrategy } from "./naive.js";
export { CumulativeStrategy } from "./cumulative.js";
export { WindowedStrategy, assertWindowSize } from "./windowed.js";
export { createStrategyFactory, type StrategyOptions } from "./factory.js";
