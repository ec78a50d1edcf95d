/**
 * flakedesk Engine — Step Runner
 *
 * probe → (satisfied? stop) → perform → classify.
 *
 * Steps run strictly in order. A probe that throws skips its step; a
 * fatal step whose perform() fails stops the run with a StepFailure.
 */

import { EngineContext } from "../context";
import { StepFailure } from "../errors";
import { StepOutcome, StepProbe } from "../types";
import { BaseStep, StepReport } from "./base-step";

export interface StepsResult {
  outcomes: StepOutcome[];
  /** Set when a fatal step failed; later steps did not run */
  failure?: StepFailure;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run one step.
 *
 * @throws StepFailure when a fatal step fails
 */
export async function runStep(step: BaseStep, ctx: EngineContext): Promise<StepOutcome> {
  const base = { step: step.id, title: step.title };
  const log = ctx.logger.child({ step: step.id });

  let probe: StepProbe;
  try {
    probe = await step.probe(ctx);
  } catch (err: unknown) {
    const message = `Check failed: ${errorMessage(err)}`;
    log.warn({ error: errorMessage(err) }, "Probe threw, skipping step");
    return { ...base, status: "skipped", message };
  }

  if (probe.skip) {
    log.info({ reason: probe.skip }, "Step skipped");
    return { ...base, status: "skipped", message: probe.skip };
  }

  if (probe.satisfied) {
    log.info({ detail: probe.detail }, "Already satisfied");
    return { ...base, status: "already_satisfied", message: probe.detail };
  }

  log.info({ detail: probe.detail }, "Performing step");

  let report: StepReport | void;
  try {
    report = await step.perform(ctx);
  } catch (err: unknown) {
    if (step.severity === "fatal") {
      if (err instanceof StepFailure) {
        throw err.step ? err : new StepFailure(err.category, err.message, {
          step: step.id,
          details: err.details,
        });
      }
      throw new StepFailure(step.category, errorMessage(err), { step: step.id });
    }
    log.warn({ error: errorMessage(err) }, "Step failed, continuing");
    return { ...base, status: "warned", message: errorMessage(err) };
  }

  const warnings = report?.warnings ?? [];
  for (const warning of warnings) log.warn({ warning }, "Step warning");

  if (warnings.length > 0) {
    return { ...base, status: "warned", message: warnings.join("; ") };
  }
  log.info("Step done");
  return { ...base, status: "done", message: report?.message };
}

/**
 * Run steps in order, emitting step_start / step_finish events.
 */
export async function runSteps(
  steps: BaseStep[],
  ctx: EngineContext,
): Promise<StepsResult> {
  const outcomes: StepOutcome[] = [];

  for (const step of steps) {
    ctx.emit({ type: "step_start", step: step.id, title: step.title });
    try {
      const outcome = await runStep(step, ctx);
      outcomes.push(outcome);
      ctx.emit({ type: "step_finish", outcome });
    } catch (err: unknown) {
      const failure =
        err instanceof StepFailure
          ? err
          : new StepFailure(step.category, errorMessage(err), { step: step.id });
      ctx.logger.error(
        { step: step.id, category: failure.category, error: failure.message },
        "Fatal step failure",
      );
      return { outcomes, failure };
    }
  }

  return { outcomes };
}
