/** Monotonic nanosecond clock. */
export type Clock = () => bigint;

export const monotonicClock: Clock = () => process.hrtime.bigint();

export function elapsedSeconds(start: bigint, end: bigint): number {
  return Number(end - start) / 1e9;
}
