import type { Clock } from "@mediatime/clock";
import { Temporal } from "temporal-polyfill";
import { CodecSpan } from "./codec-span.js";
import { H264_TIMESCALE, HOUR, I64_MAX, I64_MIN, MICROSECOND, MILLISECOND, MINUTE, SECOND } from "./constants.js";
import { defaultClock } from "./default-clock.js";
import { Instant } from "./instant.js";
import { assertInt64, assertUint32, checkedInt64 } from "./int64.js";
import { rescale } from "./rescale.js";

/**
 * A signed wall-clock duration in nanoseconds.
 */
export class Span {
  private readonly ns: bigint;

  private constructor(ns: bigint) {
    this.ns = ns;
  }

  static readonly ZERO = new Span(0n);

  static fromNanos(ns: bigint): Span {
    return new Span(assertInt64(ns, "Span"));
  }

  static fromMillis(millis: number): Span {
    return new Span(assertUint32(millis, "Milliseconds") * MILLISECOND);
  }

  static fromSeconds(seconds: number): Span {
    return new Span(assertUint32(seconds, "Seconds") * SECOND);
  }

  /** Undefined when the product leaves the 64-bit range (above ~153,722,867 minutes) */
  static fromMinutes(minutes: number): Span | undefined {
    return Span.checked(assertUint32(minutes, "Minutes") * MINUTE);
  }

  /** Undefined when the product leaves the 64-bit range (above 2,562,047 hours) */
  static fromHours(hours: number): Span | undefined {
    return Span.checked(assertUint32(hours, "Hours") * HOUR);
  }

  /**
   * Truncate a float nanosecond count toward zero, saturating at the 64-bit
   * bounds. NaN maps to zero.
   */
  static fromNanosFloat(ns: number): Span {
    if (Number.isNaN(ns)) return Span.ZERO;
    if (ns >= Number(I64_MAX)) return new Span(I64_MAX);
    if (ns <= Number(I64_MIN)) return new Span(I64_MIN);
    return new Span(BigInt(Math.trunc(ns)));
  }

  /** Time remaining from now until `instant`; negative once it has passed */
  static until(instant: Instant, clock: Clock = defaultClock): Span | undefined {
    return instant.difference(Instant.now(clock));
  }

  private static checked(ns: bigint): Span | undefined {
    const value = checkedInt64(ns);
    return value === undefined ? undefined : new Span(value);
  }

  checkedAdd(rhs: Span): Span | undefined {
    return Span.checked(this.ns + rhs.ns);
  }

  checkedSub(rhs: Span): Span | undefined {
    return Span.checked(this.ns - rhs.ns);
  }

  checkedNeg(): Span | undefined {
    return Span.checked(-this.ns);
  }

  isZero(): boolean {
    return this.ns === 0n;
  }

  isNegative(): boolean {
    return this.ns < 0n;
  }

  equals(other: Span): boolean {
    return this.ns === other.ns;
  }

  compare(other: Span): -1 | 0 | 1 {
    if (this.ns < other.ns) return -1;
    if (this.ns > other.ns) return 1;
    return 0;
  }

  asCodecSpan(): CodecSpan {
    return CodecSpan.fromTicks(rescale(this.ns, H264_TIMESCALE));
  }

  /**
   * As an unsigned Temporal.Duration. Undefined for negative spans, which
   * the standard duration type is not meant to carry here.
   */
  asDuration(): Temporal.Duration | undefined {
    if (this.ns < 0n) return undefined;

    return Temporal.Duration.from({
      seconds: Number(this.ns / SECOND),
      milliseconds: Number((this.ns % SECOND) / MILLISECOND),
      microseconds: Number((this.ns % MILLISECOND) / MICROSECOND),
      nanoseconds: Number(this.ns % MICROSECOND),
    });
  }

  toNanos(): bigint {
    return this.ns;
  }

  toString(): string {
    return `${this.ns}ns`;
  }

  toJSON(): string {
    return this.ns.toString();
  }
}
