import type { Clock, EmitFn, Instant, Millis } from "./types.js";

interface PendingSleep {
  fireAt: number;
  seq: number;
  durationMs: number;
  wake: () => void;
}

export interface ControlledClockOptions {
  initialTime?: number;
  emit?: EmitFn;
  /**
   * When set, `sleep` moves virtual time forward by itself instead of
   * waiting for `advanceBy`. Lets a driver loop run against virtual time.
   */
  autoAdvance?: boolean;
}

/**
 * Controlled clock for deterministic testing
 */
export class ControlledClock implements Clock {
  private monoMs: number;
  private readonly emit: EmitFn | undefined;
  private readonly autoAdvance: boolean;
  private readonly sleepers: PendingSleep[] = [];
  private nextSeq = 0;

  constructor(options?: ControlledClockOptions) {
    // Default to 0 for deterministic tests
    this.monoMs = options?.initialTime ?? 0;
    this.emit = options?.emit;
    this.autoAdvance = options?.autoAdvance ?? false;
  }

  now(): Instant {
    return { monoMs: this.monoMs };
  }

  async sleep(ms: Millis): Promise<void> {
    if (ms <= 0) return;

    this.emit?.({
      type: "time:sleep:start",
      durationMs: ms,
      at: this.now(),
    });

    const done = new Promise<void>((resolve) => {
      this.sleepers.push({
        fireAt: this.monoMs + ms,
        seq: this.nextSeq++,
        durationMs: ms,
        wake: () => {
          this.emit?.({
            type: "time:sleep:end",
            durationMs: ms,
            actualMs: ms,
            at: this.now(),
          });
          resolve();
        },
      });
    });

    if (this.autoAdvance) {
      this.advanceBy(ms);
      // Resume on a macrotask so a driver loop cannot starve the host
      await this.flush();
    }

    return done;
  }

  /**
   * Advance monotonic time by a specific duration, waking all due sleepers
   */
  advanceBy(ms: Millis): void {
    if (ms <= 0) return;

    const targetMono = this.monoMs + ms;
    this.emit?.({
      type: "time:advance",
      byMs: ms,
      fromMono: this.monoMs,
      toMono: targetMono,
    });

    this.advanceTo(targetMono);
  }

  /**
   * Advance monotonic time to a specific time, waking all due sleepers
   */
  advanceTo(targetMono: number): void {
    if (targetMono <= this.monoMs) return;

    while (true) {
      const next = this.getNextDue(targetMono);
      if (!next) break;

      // Jump time to the wake-up point
      this.monoMs = next.fireAt;

      this.sleepers.splice(this.sleepers.indexOf(next), 1);
      next.wake();
    }

    if (this.monoMs < targetMono) {
      this.monoMs = targetMono;
    }
  }

  /**
   * Earliest sleeper due at or before targetMono; ties wake in sleep order
   */
  private getNextDue(targetMono: number): PendingSleep | null {
    let earliest: PendingSleep | null = null;

    for (const sleeper of this.sleepers) {
      if (sleeper.fireAt > targetMono) continue;
      if (!earliest || sleeper.fireAt < earliest.fireAt || (sleeper.fireAt === earliest.fireAt && sleeper.seq < earliest.seq)) {
        earliest = sleeper;
      }
    }

    return earliest;
  }

  /**
   * Advance to the next pending wake-up, if any
   */
  tick(): void {
    const next = this.getNextDue(Infinity);
    if (next) {
      this.advanceTo(next.fireAt);
    }
  }

  getPendingTimerCount(): number {
    return this.sleepers.length;
  }

  /**
   * Await completion of callbacks fired so far (microtasks/promises queued)
   */
  async flush(): Promise<void> {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

/**
 * Create a new controlled clock instance
 */
export function createControlledClock(options?: ControlledClockOptions): ControlledClock {
  return new ControlledClock(options);
}
