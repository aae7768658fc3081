/**
 * Branded type for nanoseconds since the Unix epoch, as read from a clock
 */
export type EpochNanos = bigint & { readonly __brand: "epoch-nanos" };

/**
 * Brand a raw bigint as epoch nanoseconds
 */
export function nanos(value: bigint): EpochNanos {
  return value as EpochNanos;
}

/**
 * Common interface for all wall-clock sources
 */
export interface Clock {
  /**
   * Current wall time in nanoseconds since the Unix epoch.
   * Throws ClockFaultError when the reading is unusable.
   */
  now(): EpochNanos;
}

// Events - discriminated union for type safety
export type ClockEvent =
  | {
      type: "clock:fault";
      reason: "before_epoch" | "too_wide";
      readingNs: bigint;
    }
  | {
      type: "clock:set";
      fromNs: bigint;
      toNs: bigint;
    }
  | {
      type: "clock:advance";
      byNs: bigint;
      fromNs: bigint;
      toNs: bigint;
    };

export type EmitFn = (event: ClockEvent) => void;

export interface ClockOptions {
  emit?: EmitFn;
}

export interface ControlledClockOptions extends ClockOptions {
  /** Starting wall time in nanoseconds (default 0, the epoch) */
  initialNanos?: bigint;
}

// Errors
export class ClockFaultError extends Error {
  readonly reading: bigint;

  constructor(reason: "before_epoch" | "too_wide", reading: bigint) {
    super(
      reason === "before_epoch"
        ? `Clock reported a time before the Unix epoch: ${reading}ns`
        : `Clock reading does not fit a signed 64-bit integer: ${reading}ns`,
    );
    this.name = "ClockFaultError";
    this.reading = reading;
  }
}
