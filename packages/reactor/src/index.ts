export type {
  WatcherId,
  WatcherKind,
  DeferCallback,
  TimerCallback,
  RepeatCallback,
  ReadinessCallback,
  CallbackContext,
  Readiness,
  ReadinessMultiplexer,
  ErrorReporter,
  Scheduler,
  EventLoop,
  ReactorOptions,
  PendingCounts,
  LoopEvent,
  EmitFn,
} from "./types.js";
export { Reactor, createReactor } from "./reactor.js";
export { Loop } from "./loop.js";
export type { LoopOptions } from "./loop.js";
export { StreamMultiplexer, createStreamMultiplexer } from "./stream-multiplexer.js";
export type { StreamHandle } from "./stream-multiplexer.js";
export { createDefaultReporter } from "./reporter.js";
export { InvalidInputError, AlreadyRunningError, LoopConfigurationError } from "./errors.js";
