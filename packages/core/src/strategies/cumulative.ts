import type { MovingAverageStrategy } from "./base.js";
import { assertFinitePrice } from "./base.js";

/**
 * Full-history mean from a running sum and count.
 *
 * Time per tick O(1), total O(N); space O(1).
 */
export class CumulativeStrategy implements MovingAverageStrategy {
  readonly name = "cumulative" as const;
  private sum = 0;
  private count = 0;

  ingest(price: number): number {
    assertFinitePrice(price);
    this.sum += price;
    this.count += 1;
    return this.sum / this.count;
  }
}
