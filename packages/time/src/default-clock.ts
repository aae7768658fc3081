import { createSystemClock } from "@mediatime/clock";
import type { Clock } from "@mediatime/clock";

/** Process-wide wall clock used when no clock is injected */
export const defaultClock: Clock = createSystemClock();
