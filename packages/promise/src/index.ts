export type { Thenable, Settlement, Resolve, Reject, Executor, OnFulfilled, OnRejected } from "./types.js";
export { isThenable } from "./types.js";
export { Future } from "./future.js";
export { Deferred, createDeferred } from "./deferred.js";
export { spawn } from "./task.js";
export type { TaskBody } from "./task.js";
export { AlreadySettledError, NoPromisesError, AllRejectedError } from "./errors.js";
