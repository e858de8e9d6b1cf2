export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class AlreadyRunningError extends Error {
  constructor(message = "Event loop is already running") {
    super(message);
    this.name = "AlreadyRunningError";
  }
}

export class LoopConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LoopConfigurationError";
  }
}
