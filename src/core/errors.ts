import type { Failure, FailureKind } from "./types";

/** Host-side misuse of the engine API. Never produced by contract logic. */
export class EngineError extends Error {
  constructor(message: string, public readonly code: string = "ENGINE") {
    super(message);
    this.name = "EngineError";
  }
}

/**
 * A fault raised while a frame executes. The engine turns it into a revert of
 * the current frame; `propagated` marks a failure re-raised from a child.
 */
export class ExecutionFailure extends EngineError {
  constructor(
    public readonly kind: FailureKind,
    public readonly reason?: string,
    public readonly propagated: boolean = false,
  ) {
    super(reason ? `${kind}: ${reason}` : kind, kind);
    this.name = "ExecutionFailure";
  }

  static propagate(failure: Failure): ExecutionFailure {
    return new ExecutionFailure(failure.kind, failure.reason, true);
  }

  toFailure(): Failure {
    return this.reason === undefined
      ? { kind: this.kind }
      : { kind: this.kind, reason: this.reason };
  }
}

export class DeploymentError extends EngineError {
  constructor(
    message: string,
    public readonly failure?: Failure,
  ) {
    super(message, "DeploymentError");
    this.name = "DeploymentError";
  }
}

export class EventFilterError extends EngineError {
  constructor(message: string) {
    super(message, "EVENT_FILTER");
    this.name = "EventFilterError";
  }
}

export class ConfigError extends EngineError {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message, "CONFIG");
    this.name = "ConfigError";
  }
}
