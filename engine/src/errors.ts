/**
 * flakedesk Engine — Fatal Step Failures
 *
 * Thrown where a fatal condition is detected; unwinds the whole run. The
 * engine converts it into an ExecutionError on the way out.
 */

import { ErrorCategory, ExecutionError, StepId } from "./types";

export class StepFailure extends Error {
  readonly category: ErrorCategory;
  readonly step?: StepId;
  readonly details?: Record<string, unknown>;

  constructor(
    category: ErrorCategory,
    message: string,
    options: { step?: StepId; details?: Record<string, unknown> } = {},
  ) {
    super(message);
    this.name = "StepFailure";
    this.category = category;
    this.step = options.step;
    this.details = options.details;
  }

  toExecutionError(): ExecutionError {
    return {
      category: this.category,
      message: this.message,
      step: this.step,
      details: this.details,
    };
  }
}

/**
 * Normalise anything thrown into an ExecutionError.
 */
export function toExecutionError(err: unknown, step?: StepId): ExecutionError {
  if (err instanceof StepFailure) {
    const error = err.toExecutionError();
    return error.step || !step ? error : { ...error, step };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { category: "INTEGRATION_ERROR", message, step };
}
