import type { Scheduler } from "@tickloop/reactor";
import type { Reject, Resolve, Thenable } from "./types.js";
import { Future } from "./future.js";
import { AlreadySettledError } from "./errors.js";

/**
 * Resolve/reject control over one future, usable from outside its executor.
 * The first call to either method consumes both.
 */
export class Deferred<T> {
  private readonly future: Future<T>;
  private resolveFn: Resolve<T> | undefined = undefined;
  private rejectFn: Reject | undefined = undefined;

  constructor(scheduler?: Scheduler) {
    this.future = new Future<T>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    }, scheduler);
  }

  promise(): Future<T> {
    return this.future;
  }

  resolve(value: T | Thenable<T>): void {
    const resolve = this.resolveFn;
    if (!resolve) {
      throw new AlreadySettledError();
    }

    this.consume();
    resolve(value);
  }

  reject(reason: unknown): void {
    const reject = this.rejectFn;
    if (!reject) {
      throw new AlreadySettledError();
    }

    this.consume();
    reject(reason);
  }

  private consume(): void {
    this.resolveFn = undefined;
    this.rejectFn = undefined;
  }
}

export function createDeferred<T>(scheduler?: Scheduler): Deferred<T> {
  return new Deferred<T>(scheduler);
}
