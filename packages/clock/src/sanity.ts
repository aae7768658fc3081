import { ClockFaultError, nanos } from "./types.js";
import type { EmitFn, EpochNanos } from "./types.js";

const MAX_READING = 2n ** 63n - 1n;

/**
 * Validate a raw clock reading. A reading before the epoch or wider than
 * 64 signed bits means the environment is broken; there is no value to
 * fall back to.
 */
export function checkReading(reading: bigint, emit?: EmitFn): EpochNanos {
  if (reading < 0n) {
    emit?.({ type: "clock:fault", reason: "before_epoch", readingNs: reading });
    throw new ClockFaultError("before_epoch", reading);
  }

  if (reading > MAX_READING) {
    emit?.({ type: "clock:fault", reason: "too_wide", readingNs: reading });
    throw new ClockFaultError("too_wide", reading);
  }

  return nanos(reading);
}
