import { performance } from "node:perf_hooks";
import type { Clock, EmitFn, Instant, Millis } from "./types.js";

export interface SystemClockOptions {
  emit?: EmitFn;
}

/**
 * Clock backed by performance.now() for monotonic time and timers for sleep
 */
export class SystemClock implements Clock {
  private readonly emit: EmitFn | undefined;

  constructor(options?: SystemClockOptions) {
    this.emit = options?.emit;
  }

  now(): Instant {
    return { monoMs: performance.now() };
  }

  async sleep(ms: Millis): Promise<void> {
    if (ms <= 0) return;

    const startTime = this.now();
    this.emit?.({
      type: "time:sleep:start",
      durationMs: ms,
      at: startTime,
    });

    await new Promise<void>((resolve) => {
      setTimeout(resolve, ms);
    });

    const endTime = this.now();
    this.emit?.({
      type: "time:sleep:end",
      durationMs: ms,
      actualMs: endTime.monoMs - startTime.monoMs,
      at: endTime,
    });
  }
}

/**
 * Create a clock backed by the host's monotonic timer
 */
export function createSystemClock(options?: SystemClockOptions): SystemClock {
  return new SystemClock(options);
}
