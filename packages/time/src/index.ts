export { Instant } from "./instant.js";
export { Span } from "./span.js";
export { CodecInstant } from "./codec-instant.js";
export { CodecSpan } from "./codec-span.js";
export { rescale, rescaleToNanos } from "./rescale.js";
export { toCalendarTime, toPlainDateTime, MAX_CALENDAR_NANOS } from "./calendar.js";
export { isInt64, checkedInt64, assertInt64 } from "./int64.js";
export {
  instantSerializer,
  spanSerializer,
  encodeInstant,
  decodeInstant,
  encodeSpan,
  decodeSpan,
} from "./serializer.js";
export {
  NANOSECOND,
  MICROSECOND,
  MILLISECOND,
  SECOND,
  MINUTE,
  HOUR,
  NANOS_PER_SECOND,
  H264_TIMESCALE,
  H264_SECOND,
  H264_MILLISECOND,
  I64_MIN,
  I64_MAX,
  I32_MIN,
  I32_MAX,
  U32_MAX,
} from "./constants.js";
export { Int64RangeError, NarrowingError, SerializationError } from "./errors.js";
export { ok, err } from "./types.js";
export type { CalendarTime, Result, Serializer } from "./types.js";
