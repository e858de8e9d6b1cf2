import type { Clock, Millis } from "@tickloop/clock";

export type WatcherKind = "defer" | "delay" | "repeat" | "readable" | "writable";

/**
 * Opaque handle for a scheduled unit of work. A reactor recognizes only the
 * frozen objects it issued; `seq` orders timers that share a deadline.
 */
export interface WatcherId {
  readonly kind: WatcherKind;
  readonly seq: number;
}

// One callback type per watcher category
export type DeferCallback = () => void;
export type TimerCallback = (id: WatcherId) => void;
export type RepeatCallback = (id: WatcherId) => void;
export type ReadinessCallback<H> = (handle: H, id: WatcherId) => void;

export type CallbackContext = WatcherKind | "select";

export interface Readiness<H> {
  readonly readable: readonly H[];
  readonly writable: readonly H[];
}

/**
 * Blocking readiness wait over sets of I/O handles
 */
export interface ReadinessMultiplexer<H> {
  /** Whether a value can be watched by this multiplexer */
  isHandle(value: unknown): value is H;
  /**
   * Resolve with the handles that are ready, or with empty sets once
   * `timeoutMs` elapses. Rejection abandons the current tick's I/O phase.
   */
  select(read: readonly H[], write: readonly H[], timeoutMs: Millis): Promise<Readiness<H>>;
}

/**
 * Sink for exceptions escaping reactor callbacks
 */
export interface ErrorReporter {
  report(context: CallbackContext, error: unknown): void;
}

/**
 * The deferral primitive futures are scheduled through
 */
export interface Scheduler {
  defer(callback: DeferCallback): WatcherId;
}

export interface EventLoop<H> extends Scheduler {
  delay(ms: Millis, callback: TimerCallback): WatcherId;
  repeat(ms: Millis, callback: RepeatCallback): WatcherId;
  onReadable(handle: H, callback: ReadinessCallback<H>): WatcherId;
  onWritable(handle: H, callback: ReadinessCallback<H>): WatcherId;
  cancel(id: WatcherId): void;
  run(): Promise<void>;
  stop(): void;
  isRunning(): boolean;
}

export interface ReactorOptions<H> {
  multiplexer: ReadinessMultiplexer<H>;
  clock?: Clock;
  reporter?: ErrorReporter;
  emit?: EmitFn;
  maxWaitMs?: Millis; // default 1000
  idleSleepMs?: Millis; // default 1
}

export interface PendingCounts {
  defer: number;
  delay: number;
  repeat: number;
  readable: number;
  writable: number;
}

export interface LoopEvent {
  type: string;
  context?: CallbackContext;
  error?: unknown;
  ticks?: number;
  at?: number;
}

export type EmitFn = (event: LoopEvent) => void;
