import { H264_TIMESCALE, I32_MAX, I32_MIN, I64_MIN, MILLISECOND, NANOS_PER_SECOND, U32_MAX } from "./constants.js";
import { NarrowingError } from "./errors.js";
import { assertInt64, checkedInt64 } from "./int64.js";
import { rescaleToNanos } from "./rescale.js";
import { err, ok } from "./types.js";
import type { Result } from "./types.js";

const CLOCK_RATE = BigInt(H264_TIMESCALE);

/**
 * A signed duration in 90 kHz codec ticks. Frame durations and PTS/DTS
 * offsets are computed in this unit.
 */
export class CodecSpan {
  private readonly ticks: bigint;

  private constructor(ticks: bigint) {
    this.ticks = ticks;
  }

  static readonly ZERO = new CodecSpan(0n);

  static fromTicks(ticks: bigint): CodecSpan {
    return new CodecSpan(assertInt64(ticks, "CodecSpan"));
  }

  /** Read a signed 32-bit wire field */
  static fromInt32(value: number): CodecSpan {
    if (!Number.isInteger(value) || value < I32_MIN || value > I32_MAX) {
      throw new RangeError(`Expected a signed 32-bit integer, got ${value}`);
    }
    return new CodecSpan(BigInt(value));
  }

  /** Read an unsigned 32-bit wire field */
  static fromUint32(value: number): CodecSpan {
    if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
      throw new RangeError(`Expected an unsigned 32-bit integer, got ${value}`);
    }
    return new CodecSpan(BigInt(value));
  }

  private static checked(ticks: bigint): CodecSpan | undefined {
    const value = checkedInt64(ticks);
    return value === undefined ? undefined : new CodecSpan(value);
  }

  isZero(): boolean {
    return this.ticks === 0n;
  }

  checkedAdd(rhs: CodecSpan): CodecSpan | undefined {
    return CodecSpan.checked(this.ticks + rhs.ticks);
  }

  checkedSub(rhs: CodecSpan): CodecSpan | undefined {
    return CodecSpan.checked(this.ticks - rhs.ticks);
  }

  checkedMul(rhs: CodecSpan): CodecSpan | undefined {
    return CodecSpan.checked(this.ticks * rhs.ticks);
  }

  /** Truncating division; undefined for a zero divisor or MIN / -1 */
  checkedDiv(rhs: CodecSpan): CodecSpan | undefined {
    if (rhs.ticks === 0n) return undefined;
    return CodecSpan.checked(this.ticks / rhs.ticks);
  }

  /**
   * Remainder with the sign of the dividend. MIN % -1 is mathematically 0
   * but overflows the machine operation it stands in for, so it is
   * undefined as well.
   */
  checkedRem(rhs: CodecSpan): CodecSpan | undefined {
    if (rhs.ticks === 0n) return undefined;
    if (this.ticks === I64_MIN && rhs.ticks === -1n) return undefined;
    return new CodecSpan(this.ticks % rhs.ticks);
  }

  equals(other: CodecSpan): boolean {
    return this.ticks === other.ticks;
  }

  compare(other: CodecSpan): -1 | 0 | 1 {
    if (this.ticks < other.ticks) return -1;
    if (this.ticks > other.ticks) return 1;
    return 0;
  }

  /** Lossy; for logging and metrics only */
  asSecondsFloat(): number {
    const seconds = this.ticks / CLOCK_RATE;
    const remainder = this.ticks % CLOCK_RATE;
    return Number(seconds) + Number(remainder) / H264_TIMESCALE;
  }

  /** Whole milliseconds, truncated toward zero. Always in range. */
  asMilliseconds(): bigint {
    const seconds = this.ticks / CLOCK_RATE;
    const remainder = this.ticks % CLOCK_RATE;
    const ns = seconds * NANOS_PER_SECOND + (remainder * NANOS_PER_SECOND) / CLOCK_RATE;
    return ns / MILLISECOND;
  }

  asNanoseconds(): bigint | undefined {
    return rescaleToNanos(this.ticks, H264_TIMESCALE);
  }

  asInt32(): Result<NarrowingError, number> {
    if (this.ticks < BigInt(I32_MIN) || this.ticks > BigInt(I32_MAX)) {
      return err(new NarrowingError("i32", this.ticks));
    }
    return ok(Number(this.ticks));
  }

  asUint32(): Result<NarrowingError, number> {
    if (this.ticks < 0n || this.ticks > BigInt(U32_MAX)) {
      return err(new NarrowingError("u32", this.ticks));
    }
    return ok(Number(this.ticks));
  }

  toTicks(): bigint {
    return this.ticks;
  }

  toString(): string {
    return `${this.ticks} ticks`;
  }

  toJSON(): string {
    return this.ticks.toString();
  }
}
