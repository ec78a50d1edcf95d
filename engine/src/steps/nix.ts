/**
 * flakedesk Engine — Nix Step
 *
 * Installs Nix with the Determinate Systems installer and makes it callable
 * for the remaining steps of this run.
 */

import { EngineContext } from "../context";
import { StepFailure } from "../errors";
import { ensureNixEnvironment } from "../linux/nix-env";
import { StepProbe } from "../types";
import { BaseStep } from "./base-step";
import { runPipeline } from "./shell";

export const NIX_INSTALLER_URL = "https://install.determinate.systems/nix";

export class NixStep extends BaseStep {
  readonly id = "nix";
  readonly title = "Nix package manager";
  readonly category = "PACKAGE_ERROR";

  async probe(ctx: EngineContext): Promise<StepProbe> {
    return (await ensureNixEnvironment(ctx))
      ? { satisfied: true, detail: "nix found" }
      : { satisfied: false, detail: "nix missing" };
  }

  async perform(ctx: EngineContext) {
    await runPipeline(
      ctx,
      this.id,
      `curl --proto '=https' --tlsv1.2 -sSf -L ${NIX_INSTALLER_URL} | sh -s -- install --no-confirm`,
      { category: "PACKAGE_ERROR", message: "Nix installation failed" },
    );

    if (!(await ensureNixEnvironment(ctx))) {
      throw new StepFailure("PACKAGE_ERROR", "Nix installation failed or nix is not in PATH", {
        step: this.id,
      });
    }
    return { message: "Installed Nix" };
  }
}
