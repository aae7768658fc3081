export type { Clock, EpochNanos, ClockEvent, EmitFn, ClockOptions, ControlledClockOptions } from "./types.js";
export { nanos, ClockFaultError } from "./types.js";
export { checkReading } from "./sanity.js";
export { createSystemClock } from "./system-clock.js";
export { createControlledClock, ControlledClock } from "./controlled-clock.js";
