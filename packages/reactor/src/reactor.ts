import type { Clock, Millis } from "@tickloop/clock";
import { createSystemClock, ms } from "@tickloop/clock";
import type {
  CallbackContext,
  DeferCallback,
  EmitFn,
  ErrorReporter,
  EventLoop,
  PendingCounts,
  ReactorOptions,
  Readiness,
  ReadinessCallback,
  ReadinessMultiplexer,
  RepeatCallback,
  TimerCallback,
  WatcherId,
  WatcherKind,
} from "./types.js";
import { AlreadyRunningError, InvalidInputError } from "./errors.js";
import { createWatcherId } from "./watcher-id.js";
import { createDefaultReporter } from "./reporter.js";
import { emitRunStart, emitRunStop } from "./events.js";

interface DeferredTask {
  id: WatcherId;
  callback: DeferCallback;
}

interface TimerEntry {
  id: WatcherId;
  callback: TimerCallback;
  deadline: number;
}

interface RepeatEntry {
  id: WatcherId;
  callback: RepeatCallback;
  interval: number;
  nextDeadline: number;
}

interface StreamWatcher<H> {
  id: WatcherId;
  handle: H;
  callback: ReadinessCallback<H>;
}

function assertDuration(value: number, label: string): void {
  // Rejects NaN as well as negatives
  if (!(value >= 0)) {
    throw new InvalidInputError(`${label} must be non-negative`);
  }
}

/**
 * Readiness-based tick loop. Each tick runs deferred callbacks, then due
 * timers, then due repeats, then waits on the multiplexer (or sleeps) and
 * dispatches ready stream watchers.
 */
export class Reactor<H> implements EventLoop<H> {
  private readonly multiplexer: ReadinessMultiplexer<H>;
  private readonly clock: Clock;
  private readonly reporter: ErrorReporter;
  private readonly emit: EmitFn | undefined;
  private readonly maxWaitMs: number;
  private readonly idleSleepMs: Millis;

  private readonly deferred = new Map<WatcherId, DeferredTask>();
  private readonly timers = new Map<WatcherId, TimerEntry>();
  private readonly repeats = new Map<WatcherId, RepeatEntry>();
  private readonly readable = new Map<WatcherId, StreamWatcher<H>>();
  private readonly writable = new Map<WatcherId, StreamWatcher<H>>();

  private nextSeq = 0;
  private running = false;
  private stopRequested = false;
  private ticks = 0;

  constructor(options: ReactorOptions<H>) {
    this.multiplexer = options.multiplexer;
    this.clock = options.clock ?? createSystemClock();
    this.emit = options.emit;
    this.reporter = options.reporter ?? createDefaultReporter(options.emit);
    this.maxWaitMs = options.maxWaitMs ?? 1000;
    this.idleSleepMs = options.idleSleepMs ?? ms(1);
  }

  defer(callback: DeferCallback): WatcherId {
    const id = this.nextId("defer");
    this.deferred.set(id, { id, callback });
    return id;
  }

  delay(delayMs: Millis, callback: TimerCallback): WatcherId {
    assertDuration(delayMs, "Delay");

    const id = this.nextId("delay");
    this.timers.set(id, {
      id,
      callback,
      deadline: this.clock.now().monoMs + delayMs,
    });
    return id;
  }

  repeat(intervalMs: Millis, callback: RepeatCallback): WatcherId {
    assertDuration(intervalMs, "Interval");

    const id = this.nextId("repeat");
    this.repeats.set(id, {
      id,
      callback,
      interval: intervalMs,
      nextDeadline: this.clock.now().monoMs + intervalMs,
    });
    return id;
  }

  onReadable(handle: H, callback: ReadinessCallback<H>): WatcherId {
    this.assertHandle(handle);

    const id = this.nextId("readable");
    this.readable.set(id, { id, handle, callback });
    return id;
  }

  onWritable(handle: H, callback: ReadinessCallback<H>): WatcherId {
    this.assertHandle(handle);

    const id = this.nextId("writable");
    this.writable.set(id, { id, handle, callback });
    return id;
  }

  /**
   * Tables are keyed by the id object itself, so an id issued by another
   * reactor (or forged with the same kind and seq) matches nothing here.
   */
  cancel(id: WatcherId): void {
    switch (id.kind) {
      case "defer":
        this.deferred.delete(id);
        break;
      case "delay":
        this.timers.delete(id);
        break;
      case "repeat":
        this.repeats.delete(id);
        break;
      case "readable":
        this.readable.delete(id);
        break;
      case "writable":
        this.writable.delete(id);
        break;
    }
  }

  /**
   * Drive ticks until `stop()` is observed. Throws synchronously when the
   * loop is already running; the returned promise settles on exit.
   */
  run(): Promise<void> {
    if (this.running) {
      throw new AlreadyRunningError();
    }

    this.running = true;
    this.stopRequested = false;
    this.ticks = 0;
    emitRunStart(this.emit, this.clock.now().monoMs);

    return this.drive();
  }

  /**
   * Request loop exit at the top of the next tick
   */
  stop(): void {
    this.stopRequested = true;
  }

  isRunning(): boolean {
    return this.running;
  }

  pending(): PendingCounts {
    return {
      defer: this.deferred.size,
      delay: this.timers.size,
      repeat: this.repeats.size,
      readable: this.readable.size,
      writable: this.writable.size,
    };
  }

  private async drive(): Promise<void> {
    try {
      while (!this.stopRequested) {
        this.ticks++;
        await this.tick();
      }
    } finally {
      this.running = false;
      emitRunStop(this.emit, this.ticks, this.clock.now().monoMs);
    }
  }

  private async tick(): Promise<void> {
    this.runDeferred();

    const now = this.clock.now().monoMs;
    this.runTimers(now);
    this.runRepeats(now);

    // Measured from the tick's start: an overrunning repeat waits a full interval after it returns
    const timeout = this.computeTimeout(now);

    if (this.readable.size > 0 || this.writable.size > 0) {
      await this.dispatchStreams(ms(timeout));
      return;
    }

    await this.clock.sleep(timeout > 0 ? ms(timeout) : this.idleSleepMs);
  }

  private runDeferred(): void {
    const tasks = [...this.deferred.values()];
    this.deferred.clear();

    for (const task of tasks) {
      this.invoke("defer", () => task.callback());
    }
  }

  private runTimers(now: number): void {
    const due = [...this.timers.values()]
      .filter((timer) => timer.deadline <= now)
      .sort((a, b) => a.deadline - b.deadline || a.id.seq - b.id.seq);

    for (const timer of due) {
      // Skip timers canceled by an earlier callback in this tick
      if (!this.timers.delete(timer.id)) continue;
      this.invoke("delay", () => timer.callback(timer.id));
    }
  }

  private runRepeats(now: number): void {
    for (const repeat of [...this.repeats.values()]) {
      if (repeat.nextDeadline > now || !this.repeats.has(repeat.id)) continue;

      // Rescheduled from the firing instant: overruns lengthen the period, no catch-up
      repeat.nextDeadline = now + repeat.interval;
      this.invoke("repeat", () => repeat.callback(repeat.id));
    }
  }

  /**
   * Wait bound for this tick, capped so the stop flag is rechecked
   */
  private computeTimeout(now: number): number {
    if (this.deferred.size > 0) return 0;

    let timeout: number | undefined;

    for (const timer of this.timers.values()) {
      const remaining = Math.max(0, timer.deadline - now);
      if (timeout === undefined || remaining < timeout) timeout = remaining;
    }

    for (const repeat of this.repeats.values()) {
      const remaining = Math.max(0, repeat.nextDeadline - now);
      if (timeout === undefined || remaining < timeout) timeout = remaining;
    }

    if (timeout === undefined) {
      return this.readable.size > 0 || this.writable.size > 0 ? this.maxWaitMs : 0;
    }

    return Math.min(timeout, this.maxWaitMs);
  }

  private async dispatchStreams(timeout: Millis): Promise<void> {
    const read = uniqueHandles(this.readable.values());
    const write = uniqueHandles(this.writable.values());

    let ready: Readiness<H>;
    try {
      ready = await this.multiplexer.select(read, write, timeout);
    } catch (error) {
      this.reporter.report("select", error);
      return;
    }

    const readyToRead = new Set(ready.readable);
    const readyToWrite = new Set(ready.writable);

    for (const watcher of [...this.readable.values()]) {
      if (!readyToRead.has(watcher.handle) || !this.readable.has(watcher.id)) continue;
      this.invoke("readable", () => watcher.callback(watcher.handle, watcher.id));
    }

    for (const watcher of [...this.writable.values()]) {
      if (!readyToWrite.has(watcher.handle) || !this.writable.has(watcher.id)) continue;
      this.invoke("writable", () => watcher.callback(watcher.handle, watcher.id));
    }
  }

  private invoke(context: CallbackContext, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.reporter.report(context, error);
    }
  }

  private assertHandle(handle: H): void {
    if (!this.multiplexer.isHandle(handle)) {
      throw new InvalidInputError("Handle is not a watchable I/O handle");
    }
  }

  private nextId(kind: WatcherKind): WatcherId {
    return createWatcherId(kind, ++this.nextSeq);
  }
}

function uniqueHandles<H>(watchers: Iterable<StreamWatcher<H>>): H[] {
  const handles = new Set<H>();
  for (const watcher of watchers) handles.add(watcher.handle);
  return [...handles];
}

export function createReactor<H>(options: ReactorOptions<H>): Reactor<H> {
  return new Reactor(options);
}
