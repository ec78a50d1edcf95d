/**
 * flakedesk Engine — apt / dpkg Helpers
 *
 * Package-manager calls are fatal on a non-zero exit when they are part of
 * a required install; removals used by the uninstaller are best-effort and
 * only report.
 */

import { EngineContext, outputForwarder } from "../context";
import { StepId } from "../types";
import { CommandResult } from "../utils/command";
import { sudo, sudoOrFail } from "./privileged";

/**
 * `dpkg -s` reports "Status: install ok installed" for present packages.
 */
export async function isPackageInstalled(
  ctx: EngineContext,
  pkg: string,
): Promise<boolean> {
  const result = await ctx.runner.run("dpkg", ["-s", pkg], { env: ctx.env });
  return result.exitCode === 0 && /^Status: install ok installed$/m.test(result.stdout);
}

export async function missingPackages(
  ctx: EngineContext,
  packages: string[],
): Promise<string[]> {
  const missing: string[] = [];
  for (const pkg of packages) {
    if (!(await isPackageInstalled(ctx, pkg))) missing.push(pkg);
  }
  return missing;
}

export async function aptUpdate(ctx: EngineContext, step: StepId): Promise<void> {
  await sudoOrFail(ctx, ["apt-get", "update"], {
    category: "PACKAGE_ERROR",
    step,
    message: "Updating the package list failed",
  }, { onLine: outputForwarder(ctx, step) });
}

export async function aptInstall(
  ctx: EngineContext,
  packages: string[],
  step: StepId,
): Promise<void> {
  if (packages.length === 0) return;
  ctx.logger.info({ step, packages }, "Installing packages");
  await sudoOrFail(
    ctx,
    ["-E", "apt-get", "install", "-y", ...packages],
    {
      category: "PACKAGE_ERROR",
      step,
      message: `Installing ${packages.join(", ")} failed`,
    },
    { onLine: outputForwarder(ctx, step) },
  );
}

/**
 * Remove packages without failing the run.
 */
export function aptRemove(
  ctx: EngineContext,
  packages: string[],
): Promise<CommandResult> {
  return sudo(ctx, ["-E", "apt-get", "remove", "-y", ...packages]);
}
