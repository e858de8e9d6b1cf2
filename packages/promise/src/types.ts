/**
 * Anything exposing a promise-style `then`. Futures, native promises and
 * foreign promise implementations all qualify.
 */
export interface Thenable<T> {
  then(onFulfilled?: (value: T) => unknown, onRejected?: (reason: unknown) => unknown): unknown;
}

export type Settlement<T> =
  | { readonly _tag: "Pending" }
  | { readonly _tag: "Fulfilled"; readonly value: T }
  | { readonly _tag: "Rejected"; readonly reason: unknown };

export type Resolve<T> = (value: T | Thenable<T>) => void;
export type Reject = (reason?: unknown) => void;
export type Executor<T> = (resolve: Resolve<T>, reject: Reject) => void;

export type OnFulfilled<T, R> = (value: T) => R | Thenable<R>;
export type OnRejected<R> = (reason: unknown) => R | Thenable<R>;

function hasThen(value: unknown): boolean {
  if (typeof value !== "object" && typeof value !== "function") return false;
  if (value === null) return false;
  return "then" in value && typeof value.then === "function";
}

export function isThenable<T>(value: T | Thenable<T>): value is Thenable<T> {
  return hasThen(value);
}
