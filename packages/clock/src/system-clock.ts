import { checkReading } from "./sanity.js";
import type { Clock, ClockOptions, EmitFn, EpochNanos } from "./types.js";

const NS_PER_MS = 1_000_000n;

/**
 * Real system clock. Wall time comes from `Date.now()`, so readings follow
 * the host clock through NTP steps and suspend/resume, at millisecond
 * resolution.
 */
class SystemClock implements Clock {
  private readonly emit: EmitFn | undefined;

  constructor(options?: ClockOptions) {
    this.emit = options?.emit;
  }

  now(): EpochNanos {
    return checkReading(BigInt(Date.now()) * NS_PER_MS, this.emit);
  }
}

/**
 * Create a clock backed by the host's wall time
 */
export function createSystemClock(options?: ClockOptions): Clock {
  return new SystemClock(options);
}
