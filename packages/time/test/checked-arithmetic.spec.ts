import { describe, it, expect } from "vitest";
import { CodecInstant } from "../src/codec-instant.js";
import { CodecSpan } from "../src/codec-span.js";
import { Instant } from "../src/instant.js";
import { Span } from "../src/span.js";
import { I64_MAX, I64_MIN } from "../src/constants.js";

// Values around every edge the 64-bit operations can cross
const EDGES = [I64_MIN, I64_MIN + 1n, -3_037_000_500n, -1n, 0n, 1n, 3_037_000_499n, I64_MAX - 1n, I64_MAX];

function expected(exact: bigint): bigint | undefined {
  return exact >= I64_MIN && exact <= I64_MAX ? exact : undefined;
}

function pairs(): Array<[bigint, bigint]> {
  return EDGES.flatMap((a) => EDGES.map((b): [bigint, bigint] => [a, b]));
}

describe("Checked arithmetic closure", () => {
  it("should match exact CodecSpan sums, differences and products", () => {
    for (const [a, b] of pairs()) {
      const x = CodecSpan.fromTicks(a);
      const y = CodecSpan.fromTicks(b);
      expect(x.checkedAdd(y)?.toTicks()).toBe(expected(a + b));
      expect(x.checkedSub(y)?.toTicks()).toBe(expected(a - b));
      expect(x.checkedMul(y)?.toTicks()).toBe(expected(a * b));
    }
  });

  it("should match exact CodecSpan quotients", () => {
    for (const [a, b] of pairs()) {
      const quotient = CodecSpan.fromTicks(a).checkedDiv(CodecSpan.fromTicks(b));
      expect(quotient?.toTicks()).toBe(b === 0n ? undefined : expected(a / b));
    }
  });

  it("should match exact Span sums and differences", () => {
    for (const [a, b] of pairs()) {
      const x = Span.fromNanos(a);
      const y = Span.fromNanos(b);
      expect(x.checkedAdd(y)?.toNanos()).toBe(expected(a + b));
      expect(x.checkedSub(y)?.toNanos()).toBe(expected(a - b));
    }
  });

  it("should match exact Instant shifts and differences", () => {
    for (const [a, b] of pairs()) {
      const instant = Instant.fromNanos(a);
      expect(instant.add(Span.fromNanos(b))?.toNanos()).toBe(expected(a + b));
      expect(instant.sub(Span.fromNanos(b))?.toNanos()).toBe(expected(a - b));
      expect(instant.difference(Instant.fromNanos(b))?.toNanos()).toBe(expected(a - b));
    }
  });

  it("should match exact CodecInstant shifts and differences", () => {
    for (const [a, b] of pairs()) {
      const instant = CodecInstant.fromTicks(a);
      expect(instant.checkedAdd(CodecSpan.fromTicks(b))?.toTicks()).toBe(expected(a + b));
      expect(instant.checkedSub(CodecSpan.fromTicks(b))?.toTicks()).toBe(expected(a - b));
      expect(instant.checkedSubInstant(CodecInstant.fromTicks(b))?.toTicks()).toBe(expected(a - b));
    }
  });
});
