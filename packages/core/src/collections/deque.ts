/**
 * Growable circular-buffer deque.
 *
 * pushBack and popFront are O(1); the backing array doubles when full, so
 * pushBack is amortized O(1). Callers that know their bound up front pass it
 * as the initial capacity and never trigger a resize.
 */
export class Deque<T> {
  private buffer: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(initialCapacity: number = 16) {
    if (!Number.isInteger(initialCapacity) || initialCapacity <= 0) {
      throw new RangeError(`Deque capacity must be a positive integer, got ${initialCapacity}`);
    }
    this.buffer = new Array<T | undefined>(initialCapacity);
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.buffer.length;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  pushBack(item: T): void {
    if (this.count === this.buffer.length) {
      this.grow();
    }
    this.buffer[(this.head + this.count) % this.buffer.length] = item;
    this.count++;
  }

  popFront(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.buffer.length;
    this.count--;
    return item;
  }

  peekFront(): T | undefined {
    return this.count === 0 ? undefined : this.buffer[this.head];
  }

  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(this.head + i) % this.buffer.length];
      if (item !== undefined) {
        result.push(item);
      }
    }
    return result;
  }

  private grow(): void {
    const next = new Array<T | undefined>(this.buffer.length * 2);
    for (let i = 0; i < this.count; i++) {
      next[i] = this.buffer[(this.head + i) % this.buffer.length];
    }
    this.buffer = next;
    this.head = 0;
  }
}
