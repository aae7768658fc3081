import { describe, it, expect } from "vitest";
import { createControlledClock } from "@mediatime/clock";
import { CodecInstant, H264_MILLISECOND, H264_SECOND, H264_TIMESCALE, HOUR, Instant, rescale, Span } from "../src/index.js";

describe("Timestamping scenarios", () => {
  it("should convert a 5-minute span to ticks and back exactly", () => {
    const fiveMinutes = Span.fromMinutes(5);
    expect(fiveMinutes?.toNanos()).toBe(300_000_000_000n);

    const codec = fiveMinutes?.asCodecSpan();
    expect(codec?.toTicks()).toBe(27_000_000n);
    expect(codec?.asNanoseconds()).toBe(300_000_000_000n);
  });

  it("should expose the unit constants", () => {
    expect(H264_SECOND).toBe(90_000n);
    expect(H264_MILLISECOND).toBe(90n);
    expect(HOUR).toBe(3_600_000_000_000n);
  });

  it("should rescale 30 days of nanoseconds", () => {
    expect(rescale(1_000_000_000_000_000n, H264_TIMESCALE)).toBe(90_000_000_000n);
  });

  it("should stamp frames relative to a recording start", () => {
    const clock = createControlledClock({ initialNanos: 1_700_000_000_000_000_000n });
    const start = CodecInstant.now(clock);
    const frame = Span.fromMillis(40).asCodecSpan(); // 25 fps

    let pts = start;
    for (let i = 0; i < 25; i++) {
      const next = pts.checkedAdd(frame);
      if (next === undefined) throw new Error("timestamp overflow");
      pts = next;
    }

    expect(frame.toTicks()).toBe(3_600n);
    expect(pts.checkedSubInstant(start)?.asMilliseconds()).toBe(1_000n);
    expect(pts.asInstant()?.equals(Instant.fromNanos(1_700_000_001_000_000_000n))).toBe(true);
  });

  it("should expire nothing at the maximum instant", () => {
    const clock = createControlledClock({ initialNanos: 1_700_000_000_000_000_000n });
    const remaining = Span.until(Instant.MAX, clock);
    expect(remaining?.isNegative()).toBe(false);
    expect(Instant.now(clock).before(Instant.MAX)).toBe(true);
  });
});
