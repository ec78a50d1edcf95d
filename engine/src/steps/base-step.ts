/**
 * flakedesk Engine — Base Step
 *
 * Every installation action (packages, Nix, the application, desktop
 * files) implements this class. A step knows how to tell whether its
 * effect is already present and how to produce it; ordering, events and
 * failure policy live in the runner.
 */

import { EngineContext } from "../context";
import { ErrorCategory, StepId, StepProbe, StepSeverity } from "../types";

export interface StepReport {
  /** Summary shown next to the finished step */
  message?: string;
  /** Sub-actions that failed without failing the step */
  warnings?: string[];
}

export abstract class BaseStep {
  abstract readonly id: StepId;
  abstract readonly title: string;

  /**
   * fatal: a failed perform() aborts the run.
   * warn: it is logged and the run continues.
   */
  readonly severity: StepSeverity = "fatal";

  /** Category used when perform() throws something other than a StepFailure */
  readonly category: ErrorCategory = "INTEGRATION_ERROR";

  /**
   * Inspect the live system. Must not change it.
   */
  abstract probe(ctx: EngineContext): Promise<StepProbe>;

  /**
   * Produce the step's effect. Only called when probe() reported the step
   * unsatisfied.
   */
  abstract perform(ctx: EngineContext): Promise<StepReport | void>;
}
