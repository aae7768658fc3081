import { NANOS_PER_SECOND } from "./constants.js";
import { assertInt64, checkedInt64 } from "./int64.js";

function assertTimescale(timescale: number): bigint {
  if (!Number.isInteger(timescale) || timescale < 1 || timescale > Number(NANOS_PER_SECOND)) {
    throw new RangeError(`Timescale must be an integer between 1 and ${NANOS_PER_SECOND}, got ${timescale}`);
  }
  return BigInt(timescale);
}

/**
 * Convert a nanosecond count into `timescale` ticks per second, truncating
 * toward zero.
 *
 * The value is split into whole seconds and a sub-second remainder before
 * scaling, so the remainder product stays below `timescale * 1e9` and the
 * result never exceeds the input in magnitude. Multiplying first would
 * overflow 64 bits for anything past a few weeks at 90 kHz.
 *
 * @example
 * rescale(1_000_000_000_000_000n, 90_000) // 90_000_000_000n
 */
export function rescale(nanos: bigint, timescale: number): bigint {
  const scale = assertTimescale(timescale);
  assertInt64(nanos, "Nanosecond count");

  const seconds = nanos / NANOS_PER_SECOND;
  const remainder = nanos % NANOS_PER_SECOND;
  return seconds * scale + (remainder * scale) / NANOS_PER_SECOND;
}

/**
 * Inverse of {@link rescale}: `timescale` ticks to nanoseconds. The result
 * grows in magnitude, so it is undefined when it leaves the 64-bit range.
 */
export function rescaleToNanos(ticks: bigint, timescale: number): bigint | undefined {
  const scale = assertTimescale(timescale);
  assertInt64(ticks, "Tick count");

  const seconds = ticks / scale;
  const remainder = ticks % scale;
  return checkedInt64(seconds * NANOS_PER_SECOND + (remainder * NANOS_PER_SECOND) / scale);
}
