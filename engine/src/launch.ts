/**
 * flakedesk Engine — Application Launch
 *
 * The contract of the installed launcher script, for `flakedesk launch`:
 * activate a running instance, otherwise run the flake and, when it fails,
 * point the user at the sandbox helper that needs fixing.
 */

import { EngineContext } from "./context";
import { sandboxRemediation } from "./desktop";
import { ensureNixEnvironment } from "./linux/nix-env";
import { activateWindow, isApplicationRunning } from "./linux/processes";
import { combinedOutput, runNix } from "./provision/nix";
import { extractPrivilegedPath } from "./sandbox";

export interface LaunchResult {
  status: "already_running" | "exited" | "failed";
  exit_code: number;
  /** Whether an existing window was brought to the front */
  activated?: boolean;
  sandbox_path?: string | null;
  /** Commands to print when the launch failed */
  remediation?: string[];
}

export async function launchApplication(ctx: EngineContext): Promise<LaunchResult> {
  if (await isApplicationRunning(ctx)) {
    const activated = await activateWindow(ctx);
    ctx.logger.info({ activated }, "Application already running");
    return { status: "already_running", exit_code: 0, activated };
  }

  await ensureNixEnvironment(ctx);
  const result = await runNix(ctx, "run", { step: "application", label: ctx.profile.name });

  if (result.exitCode === 0) {
    return { status: "exited", exit_code: 0 };
  }

  const sandboxPath = extractPrivilegedPath(
    combinedOutput(result),
    ctx.profile.sandbox_output_pattern,
  );
  ctx.logger.error({ exitCode: result.exitCode, sandboxPath }, "Launch failed");
  return {
    status: "failed",
    exit_code: 1,
    sandbox_path: sandboxPath,
    remediation: sandboxRemediation(ctx.profile, ctx.paths, sandboxPath),
  };
}
