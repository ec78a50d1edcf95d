/**
 * flakedesk Engine — Application Step
 *
 * Builds the flake, finds the Electron sandbox helper, gives it setuid
 * root, then optionally starts the application once to confirm it comes
 * up. The launch check never fails the step.
 */

import * as fs from "fs";
import { EngineContext } from "../context";
import { isApplicationRunning, stopApplication } from "../linux/processes";
import { combinedOutput, runNix } from "../provision/nix";
import {
  isPatched,
  locateBuiltSandbox,
  locateSandboxBinary,
  patchSandboxBinary,
} from "../sandbox";
import { StepProbe } from "../types";
import { commandExists } from "../utils/command";
import { BaseStep, StepReport } from "./base-step";

/** Extra time the launch check allows `nix run` before `timeout` kills it */
const LAUNCH_GRACE_SECONDS = 30;

/**
 * Start the application, wait, and check for its process.
 *
 * @returns true when a matching process was seen
 */
export async function verifyLaunch(ctx: EngineContext): Promise<boolean> {
  const seconds = ctx.profile.launch_check_seconds;
  const run = runNix(ctx, "run", {
    step: "application",
    label: "Launch check",
    timeoutSeconds: seconds + LAUNCH_GRACE_SECONDS,
  });

  await ctx.sleep(seconds * 1000);
  const running = await isApplicationRunning(ctx);
  if (running) await stopApplication(ctx);

  const result = await run;
  ctx.logger.debug(
    { running, exitCode: result.exitCode, output: running ? undefined : combinedOutput(result) },
    "Launch check finished",
  );
  return running;
}

export class ApplicationStep extends BaseStep {
  readonly id = "application";
  readonly category = "PROVISION_ERROR";

  constructor(readonly title: string) {
    super();
  }

  /** Satisfied only when the helper of the current build is patched */
  async probe(ctx: EngineContext): Promise<StepProbe> {
    if (!(await commandExists(ctx.runner, "nix", ctx.env))) {
      return { satisfied: false, detail: "Nix is not available yet" };
    }

    const { location } = await locateBuiltSandbox(ctx);
    if (!location) {
      return { satisfied: false, detail: "No sandbox binary in the current build" };
    }
    return isPatched(fs.statSync(location.path), ctx.sandboxOwnerUid)
      ? { satisfied: true, detail: `Sandbox ready: ${location.path}` }
      : { satisfied: false, detail: `Sandbox not patched: ${location.path}` };
  }

  async perform(ctx: EngineContext): Promise<StepReport> {
    const location = await locateSandboxBinary(ctx);
    ctx.logger.info(location, "Found sandbox binary");
    await patchSandboxBinary(ctx, location.path);

    if (ctx.profile.launch_check_seconds <= 0) {
      return { message: `Sandbox patched: ${location.path}` };
    }

    if (await verifyLaunch(ctx)) {
      return { message: `${ctx.profile.name} launched successfully` };
    }
    return {
      warnings: [`${ctx.profile.name} may not have launched visibly (this can be normal)`],
    };
  }
}
