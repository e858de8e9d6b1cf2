import { Loop } from "@tickloop/reactor";
import type { Scheduler } from "@tickloop/reactor";
import { Future } from "./future.js";

export type TaskBody<R> = () => Generator<unknown, R, unknown>;

/**
 * Run a generator as a cooperative task. Every yielded value is awaited as
 * a future; the generator resumes from a deferred callback with the value,
 * or has the rejection reason thrown into it.
 */
export function spawn<R>(body: TaskBody<R>, scheduler: Scheduler = Loop.getInstance()): Future<R> {
  return new Future<R>((resolve, reject) => {
    const iterator = body();

    const resume = (step: () => IteratorResult<unknown, R>): void => {
      scheduler.defer(() => {
        let result: IteratorResult<unknown, R>;
        try {
          result = step();
        } catch (error) {
          reject(error);
          return;
        }

        if (result.done) {
          resolve(result.value);
          return;
        }

        Future.resolve(result.value, scheduler).then(
          (value) => resume(() => iterator.next(value)),
          (reason) => resume(() => iterator.throw(reason)),
        );
      });
    };

    resume(() => iterator.next());
  }, scheduler);
}
