import { Temporal } from "temporal-polyfill";
import { SECOND } from "./constants.js";
import type { CalendarTime } from "./types.js";

/** Temporal.Instant accepts at most 1e8 days either side of the epoch */
export const MAX_CALENDAR_NANOS = 8_640_000_000_000_000_000_000n;

function inCalendarRange(nanos: bigint): boolean {
  return nanos >= -MAX_CALENDAR_NANOS && nanos <= MAX_CALENDAR_NANOS;
}

export function toCalendarTime(nanos: bigint): CalendarTime | undefined {
  if (!inCalendarRange(nanos)) return undefined;

  let seconds = nanos / SECOND;
  let remainder = nanos % SECOND;
  // Floor, so a pre-epoch instant keeps a non-negative remainder
  if (remainder < 0n) {
    seconds -= 1n;
    remainder += SECOND;
  }
  return { seconds, nanoseconds: Number(remainder) };
}

export function toPlainDateTime(nanos: bigint): Temporal.PlainDateTime | undefined {
  if (!inCalendarRange(nanos)) return undefined;
  return Temporal.Instant.fromEpochNanoseconds(nanos).toZonedDateTimeISO("UTC").toPlainDateTime();
}
