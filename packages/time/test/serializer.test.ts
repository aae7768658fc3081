import { describe, it, expect } from "vitest";
import {
  decodeInstant,
  decodeSpan,
  encodeInstant,
  encodeSpan,
  instantSerializer,
  spanSerializer,
} from "../src/serializer.js";
import { Instant } from "../src/instant.js";
import { Span } from "../src/span.js";
import { SerializationError } from "../src/errors.js";

describe("Serialization", () => {
  describe("instantSerializer", () => {
    it("should serialize to a decimal string", () => {
      expect(instantSerializer.serialize(Instant.fromNanos(-42n))).toBe("-42");
      expect(instantSerializer.serialize(Instant.MAX)).toBe("9223372036854775807");
    });

    it("should deserialize strings, bigints and safe integers", () => {
      expect(instantSerializer.deserialize("9223372036854775807").equals(Instant.MAX)).toBe(true);
      expect(instantSerializer.deserialize(5n).toNanos()).toBe(5n);
      expect(instantSerializer.deserialize(-5).toNanos()).toBe(-5n);
    });

    it("should reject malformed input", () => {
      expect(() => instantSerializer.deserialize("1.5")).toThrow(SerializationError);
      expect(() => instantSerializer.deserialize(1.5)).toThrow(SerializationError);
      expect(() => instantSerializer.deserialize(null)).toThrow("Cannot deserialize Instant from object: null");
    });

    it("should reject values outside 64 bits", () => {
      expect(() => instantSerializer.deserialize("9223372036854775808")).toThrow(
        "Instant out of 64-bit range: 9223372036854775808",
      );
    });
  });

  describe("spanSerializer", () => {
    it("should read back what it writes", () => {
      const span = Span.fromNanos(-1_234_567_891n);
      expect(spanSerializer.deserialize(spanSerializer.serialize(span)).equals(span)).toBe(true);
    });

    it("should read values embedded in JSON", () => {
      const parsed: unknown = JSON.parse(JSON.stringify({ timeout: Span.fromSeconds(30) }));
      const timeout = typeof parsed === "object" && parsed !== null && "timeout" in parsed ? parsed.timeout : undefined;
      expect(spanSerializer.deserialize(timeout).toNanos()).toBe(30_000_000_000n);
    });
  });

  describe("binary encoding", () => {
    it("should write 8-byte big-endian two's complement", () => {
      expect(Array.from(encodeInstant(Instant.fromNanos(1n)))).toEqual([0, 0, 0, 0, 0, 0, 0, 1]);
      expect(Array.from(encodeInstant(Instant.fromNanos(-1n)))).toEqual([255, 255, 255, 255, 255, 255, 255, 255]);
      expect(Array.from(encodeInstant(Instant.MAX))).toEqual([127, 255, 255, 255, 255, 255, 255, 255]);
      expect(Array.from(encodeSpan(Span.fromNanos(256n)))).toEqual([0, 0, 0, 0, 0, 0, 1, 0]);
    });

    it("should decode the bytes it encodes", () => {
      expect(decodeInstant(encodeInstant(Instant.MAX)).equals(Instant.MAX)).toBe(true);
      expect(decodeSpan(encodeSpan(Span.fromNanos(-300n))).toNanos()).toBe(-300n);
    });

    it("should decode from a view into a larger buffer", () => {
      const buffer = new Uint8Array(12);
      buffer.set(encodeInstant(Instant.fromNanos(1_700_000_000_000_000_000n)), 2);
      expect(decodeInstant(buffer.subarray(2, 10)).toNanos()).toBe(1_700_000_000_000_000_000n);
    });

    it("should reject buffers of the wrong length", () => {
      expect(() => decodeInstant(new Uint8Array(7))).toThrow("Instant must be 8 bytes, got 7");
      expect(() => decodeSpan(new Uint8Array(9))).toThrow(SerializationError);
    });
  });
});
