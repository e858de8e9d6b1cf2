import type { CallbackContext, EmitFn } from "./types.js";

export function emitRunStart(emit: EmitFn | undefined, at: number): void {
  emit?.({
    type: "loop:run:start",
    at,
  });
}

export function emitRunStop(emit: EmitFn | undefined, ticks: number, at: number): void {
  emit?.({
    type: "loop:run:stop",
    ticks,
    at,
  });
}

export function emitCallbackError(emit: EmitFn | undefined, context: CallbackContext, error: unknown): void {
  emit?.({
    type: "loop:callback:error",
    context,
    error,
  });
}
