import type { Millis } from "@tickloop/clock";
import type {
  DeferCallback,
  EventLoop,
  PendingCounts,
  ReactorOptions,
  ReadinessCallback,
  RepeatCallback,
  TimerCallback,
  WatcherId,
} from "./types.js";
import { Reactor } from "./reactor.js";
import { LoopConfigurationError } from "./errors.js";
import { createStreamMultiplexer } from "./stream-multiplexer.js";
import type { StreamHandle } from "./stream-multiplexer.js";

export type LoopOptions = ReactorOptions<StreamHandle>;

/**
 * Process-wide event loop. One instance per process, created on first
 * access; it builds its reactor lazily on the first forwarded call.
 */
export class Loop implements EventLoop<StreamHandle> {
  private static instance: Loop | undefined;

  private reactor: Reactor<StreamHandle> | undefined;

  private constructor(private options: LoopOptions | undefined) {}

  static getInstance(): Loop {
    if (!Loop.instance) {
      Loop.instance = new Loop(undefined);
    }
    return Loop.instance;
  }

  /**
   * Set reactor options for the process-wide loop. Only allowed before
   * anything has been scheduled through it.
   */
  static configure(options: LoopOptions): Loop {
    const loop = Loop.getInstance();
    if (loop.reactor) {
      throw new LoopConfigurationError("Loop is already initialized");
    }
    loop.options = options;
    return loop;
  }

  /**
   * Drop the process-wide instance and everything scheduled on it.
   * Futures, deferreds and tasks created before the reset keep the old
   * instance as their scheduler, so their handlers never run.
   */
  static reset(): void {
    if (Loop.instance?.isRunning()) {
      throw new LoopConfigurationError("Cannot reset a running loop");
    }
    Loop.instance = undefined;
  }

  defer(callback: DeferCallback): WatcherId {
    return this.getReactor().defer(callback);
  }

  delay(delayMs: Millis, callback: TimerCallback): WatcherId {
    return this.getReactor().delay(delayMs, callback);
  }

  repeat(intervalMs: Millis, callback: RepeatCallback): WatcherId {
    return this.getReactor().repeat(intervalMs, callback);
  }

  onReadable(handle: StreamHandle, callback: ReadinessCallback<StreamHandle>): WatcherId {
    return this.getReactor().onReadable(handle, callback);
  }

  onWritable(handle: StreamHandle, callback: ReadinessCallback<StreamHandle>): WatcherId {
    return this.getReactor().onWritable(handle, callback);
  }

  cancel(id: WatcherId): void {
    this.getReactor().cancel(id);
  }

  run(): Promise<void> {
    return this.getReactor().run();
  }

  stop(): void {
    this.getReactor().stop();
  }

  isRunning(): boolean {
    return this.reactor?.isRunning() ?? false;
  }

  pending(): PendingCounts {
    return this.getReactor().pending();
  }

  private getReactor(): Reactor<StreamHandle> {
    if (!this.reactor) {
      this.reactor = new Reactor(this.options ?? { multiplexer: createStreamMultiplexer() });
    }
    return this.reactor;
  }
}
