import type { MovingAverageStrategy } from "./base.js";
import { assertFinitePrice } from "./base.js";
import { Deque } from "../collections/deque.js";
import { InvalidConfigurationError } from "../errors.js";

export function assertWindowSize(windowSize: number): void {
  if (!Number.isInteger(windowSize) || windowSize <= 0) {
    throw new InvalidConfigurationError(`Window size must be a positive integer, got ${windowSize}`);
  }
}

/**
 * Mean of the last k prices.
 *
 * Time per tick O(1) amortized, total O(N); space O(k). Until k prices have
 * arrived the mean covers the partial window.
 */
export class WindowedStrategy implements MovingAverageStrategy {
  readonly name = "windowed" as const;
  readonly windowSize: number;
  private readonly window: Deque<number>;
  private sum = 0;

  constructor(windowSize: number) {
    assertWindowSize(windowSize);
    this.windowSize = windowSize;
    // One slot of headroom: a push briefly holds k + 1 prices before eviction.
    this.window = new Deque<number>(windowSize + 1);
  }

  get windowLength(): number {
    return this.window.size;
  }

  ingest(price: number): number {
    assertFinitePrice(price);
    this.window.pushBack(price);
    this.sum += price;

    if (this.window.size > this.windowSize) {
      const evicted = this.window.popFront();
      if (evicted !== undefined) {
        this.sum -= evicted;
      }
    }

    return this.sum / this.window.size;
  }
}
