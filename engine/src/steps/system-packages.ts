/**
 * flakedesk Engine — Development Tools Step
 */

import { EngineContext } from "../context";
import { aptInstall, aptUpdate, missingPackages } from "../linux/apt";
import { StepProbe } from "../types";
import { BaseStep } from "./base-step";

export const SYSTEM_PACKAGES = [
  "python3-dev",
  "python3-pip",
  "build-essential",
  "git",
  "curl",
  "wget",
  "attr",
];

export class SystemPackagesStep extends BaseStep {
  readonly id = "system-packages";
  readonly title = "Development tools";
  readonly category = "PACKAGE_ERROR";

  async probe(ctx: EngineContext): Promise<StepProbe> {
    const missing = await missingPackages(ctx, SYSTEM_PACKAGES);
    return missing.length === 0
      ? { satisfied: true, detail: "All development packages installed" }
      : { satisfied: false, detail: `Missing: ${missing.join(", ")}` };
  }

  async perform(ctx: EngineContext) {
    const missing = await missingPackages(ctx, SYSTEM_PACKAGES);
    await aptUpdate(ctx, this.id);
    await aptInstall(ctx, missing, this.id);
    return { message: `Installed ${missing.join(", ")}` };
  }
}
