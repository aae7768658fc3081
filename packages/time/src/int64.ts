import { I64_MAX, I64_MIN, U32_MAX } from "./constants.js";
import { Int64RangeError } from "./errors.js";

export function isInt64(value: bigint): boolean {
  return value >= I64_MIN && value <= I64_MAX;
}

/**
 * The value itself when it fits 64 signed bits, otherwise undefined.
 * bigint arithmetic never wraps, so checking the exact result afterwards
 * is equivalent to a checked machine operation.
 */
export function checkedInt64(value: bigint): bigint | undefined {
  return isInt64(value) ? value : undefined;
}

export function assertInt64(value: bigint, label: string): bigint {
  if (!isInt64(value)) {
    throw new Int64RangeError(label, value);
  }
  return value;
}

export function assertUint32(value: number, label: string): bigint {
  if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
    throw new RangeError(`${label} must be an unsigned 32-bit integer, got ${value}`);
  }
  return BigInt(value);
}
