import { checkReading } from "./sanity.js";
import type { Clock, ControlledClockOptions, EmitFn, EpochNanos } from "./types.js";

/**
 * Controlled clock for deterministic testing
 */
export class ControlledClock implements Clock {
  private wallNs: bigint;
  private readonly emit: EmitFn | undefined;

  constructor(options?: ControlledClockOptions) {
    // Default to the epoch for deterministic tests
    this.wallNs = options?.initialNanos ?? 0n;
    this.emit = options?.emit;
  }

  now(): EpochNanos {
    return checkReading(this.wallNs, this.emit);
  }

  /**
   * Jump wall time to an arbitrary reading. Out-of-range readings are
   * accepted here and rejected by the next now().
   */
  set(wallNs: bigint): void {
    this.emit?.({
      type: "clock:set",
      fromNs: this.wallNs,
      toNs: wallNs,
    });
    this.wallNs = wallNs;
  }

  /**
   * Move wall time forward (or backward, for a negative step)
   */
  advanceBy(stepNs: bigint): void {
    if (stepNs === 0n) return;

    const target = this.wallNs + stepNs;
    this.emit?.({
      type: "clock:advance",
      byNs: stepNs,
      fromNs: this.wallNs,
      toNs: target,
    });
    this.wallNs = target;
  }
}

/**
 * Create a new controlled clock instance
 */
export function createControlledClock(options?: ControlledClockOptions): ControlledClock {
  return new ControlledClock(options);
}
