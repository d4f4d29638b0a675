// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for Tollgate. */

export class TollgateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TollgateError";
  }
}

export class ConfigurationError extends TollgateError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class InvalidRequestError extends TollgateError {
  constructor(public readonly issues: string[]) {
    super(`Invalid routing request: ${issues.join("; ")}`);
    this.name = "InvalidRequestError";
  }
}

/** Unexpected fault while building a routing decision. */
export class RoutingError extends TollgateError {
  constructor(
    public readonly requestId: string,
    cause: string,
  ) {
    super(`Routing failed for request '${requestId}': ${cause}`);
    this.name = "RoutingError";
  }
}

/** Internal classifier fault. Never escapes: the classifier fails closed to HIGH. */
export class ClassificationError extends TollgateError {
  constructor(message: string) {
    super(message);
    this.name = "ClassificationError";
  }
}

/** Missing capability data for a task type. Recovered with documented defaults. */
export class EstimationError extends TollgateError {
  constructor(public readonly taskType: string) {
    super(`No capability data for task type '${taskType}'`);
    this.name = "EstimationError";
  }
}

/** Missing pricing for a model. Recovered with the default price table. */
export class CostDataMissingError extends TollgateError {
  constructor(public readonly model: string) {
    super(`No pricing data for model '${model}'`);
    this.name = "CostDataMissingError";
  }
}

export class ExecutionBackendError extends TollgateError {
  constructor(
    public readonly backend: string,
    cause?: string,
  ) {
    super(`Backend '${backend}' failed${cause ? `: ${cause}` : ""}`);
    this.name = "ExecutionBackendError";
  }
}

export class ExecutionTimeoutError extends TollgateError {
  constructor(
    public readonly backend: string,
    public readonly timeoutMs: number,
  ) {
    super(`Backend '${backend}' timed out after ${timeoutMs}ms`);
    this.name = "ExecutionTimeoutError";
  }
}

export class ExecutionCancelledError extends TollgateError {
  constructor(public readonly backend: string) {
    super(`Call to backend '${backend}' was cancelled by the caller`);
    this.name = "ExecutionCancelledError";
  }
}
