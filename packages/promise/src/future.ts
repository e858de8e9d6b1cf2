import { Loop } from "@tickloop/reactor";
import type { Scheduler } from "@tickloop/reactor";
import type { Executor, OnFulfilled, OnRejected, Settlement, Thenable } from "./types.js";
import { isThenable } from "./types.js";
import { AllRejectedError, NoPromisesError } from "./errors.js";

interface Handler<T> {
  onFulfilled?(value: T): unknown;
  onRejected?(reason: unknown): unknown;
  next: Future<unknown>;
}

const noop = (): void => {};

/**
 * One-shot settleable value with handler chaining. Handlers always run
 * from a callback deferred on the scheduler, never inside the call that
 * registered them or the call that settled the future.
 */
export class Future<T> implements PromiseLike<T>, Thenable<T> {
  private state: Settlement<T> = { _tag: "Pending" };
  private handlers: Handler<T>[] = [];
  // Set by the first resolve/reject; adoption of a thenable keeps it pending
  private committed = false;
  private readonly scheduler: Scheduler;

  constructor(executor: Executor<T>, scheduler: Scheduler = Loop.getInstance()) {
    this.scheduler = scheduler;

    try {
      executor(
        (value) => this.resolveOnce(value),
        (reason) => this.rejectOnce(reason),
      );
    } catch (error) {
      this.rejectOnce(error);
    }
  }

  then<R1 = T, R2 = never>(
    onFulfilled?: OnFulfilled<T, R1> | null,
    onRejected?: OnRejected<R2> | null,
  ): Future<R1 | R2>;
  then(onFulfilled?: ((value: T) => unknown) | null, onRejected?: ((reason: unknown) => unknown) | null): Future<unknown> {
    const next = new Future<unknown>(noop, this.scheduler);

    this.handlers.push({
      onFulfilled: onFulfilled ?? undefined,
      onRejected: onRejected ?? undefined,
      next,
    });

    if (this.state._tag !== "Pending") {
      this.flush();
    }

    return next;
  }

  catch<R = never>(onRejected?: OnRejected<R> | null): Future<T | R> {
    return this.then<T, R>(undefined, onRejected);
  }

  /**
   * Run `onFinally` on either outcome, then pass the original outcome on.
   * A thenable returned by `onFinally` is waited for first.
   */
  finally(onFinally: () => unknown): Future<T> {
    return this.then<T, never>(
      (value) => Future.resolve(onFinally(), this.scheduler).then(() => value),
      (reason) =>
        Future.resolve(onFinally(), this.scheduler).then(() => {
          throw reason;
        }),
    );
  }

  inspect(): Settlement<T> {
    return this.state;
  }

  private resolveOnce(value: T | Thenable<T>): void {
    if (this.committed) return;
    this.committed = true;
    this.adopt(value);
  }

  private rejectOnce(reason: unknown): void {
    if (this.committed) return;
    this.committed = true;
    this.settle({ _tag: "Rejected", reason });
  }

  /**
   * Follow thenables until a plain value is reached
   */
  private adopt(value: T | Thenable<T>): void {
    if (value === this) {
      this.settle({ _tag: "Rejected", reason: new TypeError("Chaining cycle detected for future") });
      return;
    }

    if (!isThenable(value)) {
      this.settle({ _tag: "Fulfilled", value });
      return;
    }

    // Foreign thenables may call back more than once
    let called = false;
    try {
      value.then(
        (inner) => {
          if (called) return;
          called = true;
          this.adopt(inner);
        },
        (reason) => {
          if (called) return;
          called = true;
          this.settle({ _tag: "Rejected", reason });
        },
      );
    } catch (error) {
      if (!called) {
        called = true;
        this.settle({ _tag: "Rejected", reason: error });
      }
    }
  }

  private settle(state: Settlement<T>): void {
    if (this.state._tag !== "Pending") return;
    this.state = state;
    this.flush();
  }

  private flush(): void {
    if (this.handlers.length === 0) return;

    const handlers = this.handlers;
    this.handlers = [];

    this.scheduler.defer(() => {
      for (const handler of handlers) {
        this.runHandler(handler);
      }
    });
  }

  private runHandler(handler: Handler<T>): void {
    const state = this.state;
    const { next } = handler;

    try {
      if (state._tag === "Fulfilled") {
        next.resolveOnce(handler.onFulfilled ? handler.onFulfilled(state.value) : state.value);
      } else if (state._tag === "Rejected") {
        if (handler.onRejected) {
          next.resolveOnce(handler.onRejected(state.reason));
        } else {
          next.rejectOnce(state.reason);
        }
      }
    } catch (error) {
      next.rejectOnce(error);
    }
  }

  /**
   * Coerce a value into a future; futures are returned as they are
   */
  static resolve<T>(value: T | Thenable<T>, scheduler?: Scheduler): Future<T> {
    if (value instanceof Future) {
      return value;
    }
    return new Future<T>((resolve) => resolve(value), scheduler);
  }

  static reject<T = never>(reason: unknown, scheduler?: Scheduler): Future<T> {
    return new Future<T>((_resolve, reject) => reject(reason), scheduler);
  }

  /**
   * Fulfill with every value in input order, or reject with the first
   * rejection. Inputs still in flight after a rejection are ignored.
   */
  static all<T>(values: Iterable<T | Thenable<T>>, scheduler?: Scheduler): Future<T[]> {
    const items = [...values];

    return new Future<T[]>((resolve, reject) => {
      const results = new Array<T>(items.length);
      let remaining = items.length;

      if (remaining === 0) {
        resolve(results);
        return;
      }

      items.forEach((item, index) => {
        Future.resolve(item, scheduler).then((value) => {
          results[index] = value;
          remaining--;
          if (remaining === 0) resolve(results);
        }, reject);
      });
    }, scheduler);
  }

  /**
   * Fulfill with the first input to fulfill; reject with AllRejectedError
   * once every input has rejected.
   */
  static any<T>(values: Iterable<T | Thenable<T>>, scheduler?: Scheduler): Future<T> {
    const items = [...values];

    return new Future<T>((resolve, reject) => {
      if (items.length === 0) {
        reject(new NoPromisesError());
        return;
      }

      const reasons = new Array<unknown>(items.length);
      let remaining = items.length;
      let firstReason: unknown;

      items.forEach((item, index) => {
        Future.resolve(item, scheduler).then(resolve, (reason) => {
          if (remaining === items.length) firstReason = reason;
          reasons[index] = reason;
          remaining--;
          if (remaining === 0) reject(new AllRejectedError(reasons, firstReason));
        });
      });
    }, scheduler);
  }

  /**
   * Settle like whichever input settles first
   */
  static race<T>(values: Iterable<T | Thenable<T>>, scheduler?: Scheduler): Future<T> {
    const items = [...values];

    return new Future<T>((resolve, reject) => {
      if (items.length === 0) {
        reject(new NoPromisesError());
        return;
      }

      for (const item of items) {
        Future.resolve(item, scheduler).then(resolve, reject);
      }
    }, scheduler);
  }
}
