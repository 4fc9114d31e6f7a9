import type { StrategyName } from "@tickbench/types";
import { MalformedInputError } from "../errors.js";

export interface MovingAverageStrategy {
  readonly name: StrategyName;
  /** Incorporates one price and returns the moving average including it. */
  ingest(price: number): number;
}

export type StrategyFactory = () => MovingAverageStrategy;

export function assertFinitePrice(price: number): void {
  if (typeof price !== "number" || !Number.isFinite(price)) {
    throw new MalformedInputError(`Tick price must be a finite number, got ${String(price)}`);
  }
}
