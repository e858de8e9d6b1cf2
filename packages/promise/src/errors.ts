export class AlreadySettledError extends Error {
  constructor(message = "Promise has already been resolved or rejected") {
    super(message);
    this.name = "AlreadySettledError";
  }
}

export class NoPromisesError extends Error {
  constructor() {
    super("No promises provided");
    this.name = "NoPromisesError";
  }
}

/**
 * Rejection of `Future.any` once every input rejected. `cause` holds the
 * first rejection observed, `reasons` every reason in input order.
 */
export class AllRejectedError extends Error {
  readonly reasons: readonly unknown[];

  constructor(reasons: readonly unknown[], firstReason: unknown) {
    super("All promises rejected", { cause: firstReason });
    this.name = "AllRejectedError";
    this.reasons = reasons;
  }
}
