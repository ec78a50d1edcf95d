/**
 * flakedesk Engine — Node.js Step
 *
 * Installs the current LTS from NodeSource. The companion tool runs
 * through npx, so this step is required.
 */

import { EngineContext } from "../context";
import { StepFailure } from "../errors";
import { aptInstall } from "../linux/apt";
import { StepProbe } from "../types";
import { commandExists } from "../utils/command";
import { BaseStep } from "./base-step";
import { runPipeline } from "./shell";

export const NODESOURCE_SETUP_URL = "https://deb.nodesource.com/setup_lts.x";

/** Written by the NodeSource setup script; used by the full uninstall */
export const NODESOURCE_LIST = "nodesource.list";

export class NodejsStep extends BaseStep {
  readonly id = "nodejs";
  readonly title = "Node.js";
  readonly category = "PACKAGE_ERROR";

  async probe(ctx: EngineContext): Promise<StepProbe> {
    const node = await commandExists(ctx.runner, "node", ctx.env);
    const npm = await commandExists(ctx.runner, "npm", ctx.env);
    if (node && npm) return { satisfied: true, detail: "node and npm found" };
    return { satisfied: false, detail: node ? "npm missing" : "node missing" };
  }

  async perform(ctx: EngineContext) {
    await runPipeline(ctx, this.id, `curl -fsSL ${NODESOURCE_SETUP_URL} | sudo -E bash -`, {
      category: "PACKAGE_ERROR",
      message: "NodeSource setup failed",
    });
    await aptInstall(ctx, ["nodejs"], this.id);

    if (!(await commandExists(ctx.runner, "npm", ctx.env))) {
      throw new StepFailure("PACKAGE_ERROR", "Node.js was installed but npm is not on PATH", {
        step: this.id,
      });
    }
    return { message: "Installed Node.js LTS" };
  }
}
