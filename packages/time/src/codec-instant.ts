import { checkReading } from "@mediatime/clock";
import type { Clock } from "@mediatime/clock";
import type { Temporal } from "temporal-polyfill";
import { toCalendarTime, toPlainDateTime } from "./calendar.js";
import { CodecSpan } from "./codec-span.js";
import { H264_TIMESCALE } from "./constants.js";
import { defaultClock } from "./default-clock.js";
import { Instant } from "./instant.js";
import { assertInt64, checkedInt64 } from "./int64.js";
import { rescale, rescaleToNanos } from "./rescale.js";
import type { CalendarTime } from "./types.js";

/**
 * An absolute point in time in 90 kHz ticks since the Unix epoch, used to
 * timestamp codec samples.
 */
export class CodecInstant {
  private readonly ticks: bigint;

  private constructor(ticks: bigint) {
    this.ticks = ticks;
  }

  /** Current wall time, rescaled from a single clock reading */
  static now(clock: Clock = defaultClock): CodecInstant {
    return new CodecInstant(rescale(checkReading(clock.now()), H264_TIMESCALE));
  }

  static fromTicks(ticks: bigint): CodecInstant {
    return new CodecInstant(assertInt64(ticks, "CodecInstant"));
  }

  static fromInstant(instant: Instant): CodecInstant {
    return instant.asCodecInstant();
  }

  private static checked(ticks: bigint): CodecInstant | undefined {
    const value = checkedInt64(ticks);
    return value === undefined ? undefined : new CodecInstant(value);
  }

  checkedAdd(span: CodecSpan): CodecInstant | undefined {
    return CodecInstant.checked(this.ticks + span.toTicks());
  }

  checkedSub(span: CodecSpan): CodecInstant | undefined {
    return CodecInstant.checked(this.ticks - span.toTicks());
  }

  /** The span `this - other` */
  checkedSubInstant(other: CodecInstant): CodecSpan | undefined {
    const ticks = checkedInt64(this.ticks - other.ticks);
    return ticks === undefined ? undefined : CodecSpan.fromTicks(ticks);
  }

  /** Offset from the epoch as a span */
  sinceEpoch(): CodecSpan {
    return CodecSpan.fromTicks(this.ticks);
  }

  /** Reports whether this instant is strictly after `other` */
  after(other: CodecInstant): boolean {
    return this.ticks > other.ticks;
  }

  /** Reports whether this instant is strictly before `other` */
  before(other: CodecInstant): boolean {
    return this.ticks < other.ticks;
  }

  equals(other: CodecInstant): boolean {
    return this.ticks === other.ticks;
  }

  compare(other: CodecInstant): -1 | 0 | 1 {
    if (this.ticks < other.ticks) return -1;
    if (this.ticks > other.ticks) return 1;
    return 0;
  }

  /** Undefined past ~292 years from the epoch, where nanoseconds overflow */
  asInstant(): Instant | undefined {
    const ns = rescaleToNanos(this.ticks, H264_TIMESCALE);
    return ns === undefined ? undefined : Instant.fromNanos(ns);
  }

  toCalendar(): CalendarTime | undefined {
    const ns = rescaleToNanos(this.ticks, H264_TIMESCALE);
    return ns === undefined ? undefined : toCalendarTime(ns);
  }

  toPlainDateTime(): Temporal.PlainDateTime | undefined {
    const ns = rescaleToNanos(this.ticks, H264_TIMESCALE);
    return ns === undefined ? undefined : toPlainDateTime(ns);
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
