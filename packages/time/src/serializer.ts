import { SerializationError } from "./errors.js";
import { isInt64 } from "./int64.js";
import { Instant } from "./instant.js";
import { Span } from "./span.js";
import type { Serializer } from "./types.js";

const INTEGER_PATTERN = /^-?\d+$/;
const ENCODED_LENGTH = 8;

function readInt64(data: unknown, what: string): bigint {
  let value: bigint;
  if (typeof data === "bigint") {
    value = data;
  } else if (typeof data === "number" && Number.isSafeInteger(data)) {
    value = BigInt(data);
  } else if (typeof data === "string" && INTEGER_PATTERN.test(data)) {
    value = BigInt(data);
  } else {
    throw new SerializationError(`Cannot deserialize ${what} from ${typeof data}: ${String(data)}`);
  }

  if (!isInt64(value)) {
    throw new SerializationError(`${what} out of 64-bit range: ${value}`);
  }
  return value;
}

/** Instants as decimal nanosecond strings; JSON numbers cannot hold 64 bits */
export const instantSerializer: Serializer<Instant> = {
  serialize: (instant) => instant.toNanos().toString(),
  deserialize: (data) => Instant.fromNanos(readInt64(data, "Instant")),
};

export const spanSerializer: Serializer<Span> = {
  serialize: (span) => span.toNanos().toString(),
  deserialize: (data) => Span.fromNanos(readInt64(data, "Span")),
};

function encodeInt64(value: bigint): Uint8Array {
  const bytes = new Uint8Array(ENCODED_LENGTH);
  new DataView(bytes.buffer).setBigInt64(0, value, false);
  return bytes;
}

function decodeInt64(bytes: Uint8Array, what: string): bigint {
  if (bytes.byteLength !== ENCODED_LENGTH) {
    throw new SerializationError(`${what} must be ${ENCODED_LENGTH} bytes, got ${bytes.byteLength}`);
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigInt64(0, false);
}

/** 8-byte big-endian two's complement */
export function encodeInstant(instant: Instant): Uint8Array {
  return encodeInt64(instant.toNanos());
}

export function decodeInstant(bytes: Uint8Array): Instant {
  return Instant.fromNanos(decodeInt64(bytes, "Instant"));
}

export function encodeSpan(span: Span): Uint8Array {
  return encodeInt64(span.toNanos());
}

export function decodeSpan(bytes: Uint8Array): Span {
  return Span.fromNanos(decodeInt64(bytes, "Span"));
}
