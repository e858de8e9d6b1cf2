import type { CallbackContext, EmitFn, ErrorReporter } from "./types.js";
import { emitCallbackError } from "./events.js";

class EmitReporter implements ErrorReporter {
  constructor(private readonly emit: EmitFn) {}

  report(context: CallbackContext, error: unknown): void {
    emitCallbackError(this.emit, context, error);
  }
}

class ConsoleReporter implements ErrorReporter {
  report(context: CallbackContext, error: unknown): void {
    console.error(`Uncaught exception in ${context} callback:`, error);
  }
}

/**
 * Reporter used when none is configured: structured events when an emit
 * function exists, stderr otherwise.
 */
export function createDefaultReporter(emit?: EmitFn): ErrorReporter {
  return emit ? new EmitReporter(emit) : new ConsoleReporter();
}
