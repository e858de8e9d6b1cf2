export type { Clock, Instant, EmitFn, ClockEvent } from "./types.js";
export type { Millis } from "./types.js";
export { ms } from "./types.js";
export { createSystemClock, SystemClock } from "./system-clock.js";
export type { SystemClockOptions } from "./system-clock.js";
export { createControlledClock, ControlledClock } from "./controlled-clock.js";
export type { ControlledClockOptions } from "./controlled-clock.js";
