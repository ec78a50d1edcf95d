/**
 * flakedesk Engine — Pipeline Helper
 *
 * Vendor installers are distributed as `curl ... | sh` pipelines; these run
 * through `sh -c` and are fatal on a non-zero exit.
 */

import { EngineContext, outputForwarder } from "../context";
import { StepFailure } from "../errors";
import { ErrorCategory, StepId } from "../types";
import { CommandResult, describeFailure } from "../utils/command";

export async function runPipeline(
  ctx: EngineContext,
  step: StepId,
  script: string,
  failure: { category: ErrorCategory; message: string },
): Promise<CommandResult> {
  ctx.logger.debug({ step, script }, "Running pipeline");
  const result = await ctx.runner.run("sh", ["-c", script], {
    env: ctx.env,
    onLine: outputForwarder(ctx, step),
  });
  if (result.exitCode !== 0) {
    throw new StepFailure(
      failure.category,
      `${failure.message}: ${describeFailure("sh", ["-c", script], result)}`,
      { step, details: { exitCode: result.exitCode } },
    );
  }
  return result;
}
