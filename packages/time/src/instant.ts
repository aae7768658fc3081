import { checkReading } from "@mediatime/clock";
import type { Clock } from "@mediatime/clock";
import type { Temporal } from "temporal-polyfill";
import { toCalendarTime, toPlainDateTime } from "./calendar.js";
import { CodecInstant } from "./codec-instant.js";
import { H264_TIMESCALE, I64_MAX } from "./constants.js";
import { defaultClock } from "./default-clock.js";
import { assertInt64, checkedInt64 } from "./int64.js";
import { rescale } from "./rescale.js";
import { Span } from "./span.js";
import type { CalendarTime } from "./types.js";

/**
 * An absolute wall-clock point in time: signed 64-bit nanoseconds since the
 * Unix epoch.
 */
export class Instant {
  private readonly ns: bigint;

  private constructor(ns: bigint) {
    this.ns = ns;
  }

  /** The Unix epoch */
  static readonly EPOCH = new Instant(0n);

  /** The latest representable instant, for "never expires" */
  static readonly MAX = new Instant(I64_MAX);

  /**
   * Read the current wall time. Throws ClockFaultError when the clock is
   * broken; that is not a condition to recover from. Injected clocks are
   * held to the same check as the built-in ones.
   */
  static now(clock: Clock = defaultClock): Instant {
    return new Instant(checkReading(clock.now()));
  }

  static fromNanos(ns: bigint): Instant {
    return new Instant(assertInt64(ns, "Instant"));
  }

  add(span: Span): Instant | undefined {
    const ns = checkedInt64(this.ns + span.toNanos());
    return ns === undefined ? undefined : new Instant(ns);
  }

  sub(span: Span): Instant | undefined {
    const ns = checkedInt64(this.ns - span.toNanos());
    return ns === undefined ? undefined : new Instant(ns);
  }

  /** Reports whether this instant is strictly after `other` */
  after(other: Instant): boolean {
    return this.ns > other.ns;
  }

  /** Reports whether this instant is strictly before `other` */
  before(other: Instant): boolean {
    return this.ns < other.ns;
  }

  /** The span `this - other` */
  difference(other: Instant): Span | undefined {
    const ns = checkedInt64(this.ns - other.ns);
    return ns === undefined ? undefined : Span.fromNanos(ns);
  }

  equals(other: Instant): boolean {
    return this.ns === other.ns;
  }

  compare(other: Instant): -1 | 0 | 1 {
    if (this.ns < other.ns) return -1;
    if (this.ns > other.ns) return 1;
    return 0;
  }

  asCodecInstant(): CodecInstant {
    return CodecInstant.fromTicks(rescale(this.ns, H264_TIMESCALE));
  }

  toCalendar(): CalendarTime | undefined {
    return toCalendarTime(this.ns);
  }

  /** UTC date-time, for display and logging */
  toPlainDateTime(): Temporal.PlainDateTime | undefined {
    return toPlainDateTime(this.ns);
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
