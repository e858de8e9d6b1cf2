/**
 * Milliseconds, branded so durations are never confused with counts or seconds
 */
export type Millis = number & { readonly __brand: "millis" };

export function ms(value: number): Millis {
  return value as Millis;
}

/**
 * A monotonic reading: milliseconds from an arbitrary origin, never decreasing
 */
export interface Instant {
  readonly monoMs: number;
}

/**
 * Time source used by the reactor to read deadlines and to idle
 */
export interface Clock {
  now(): Instant;
  sleep(ms: Millis): Promise<void>;
}

export interface ClockEvent {
  type: string;
  durationMs?: number;
  actualMs?: number;
  byMs?: number;
  fromMono?: number;
  toMono?: number;
  at?: Instant;
}

export type EmitFn = (event: ClockEvent) => void;
