import type { MovingAverageStrategy } from "./base.js";
import { assertFinitePrice } from "./base.js";

/**
 * Full-history mean recomputed from scratch on every tick.
 *
 * Time per tick O(n), total O(N^2); space O(N).
 */
export class NaiveStrategy implements MovingAverageStrategy {
  readonly name = "naive" as const;
  private readonly prices: number[] = [];

  ingest(price: number): number {
    assertFinitePrice(price);
    this.prices.push(price);

    let sum = 0;
    for (let i = 0; i < this.prices.length; i++) {
      sum += this.prices[i];
    }
    return sum / this.prices.length;
  }
}
