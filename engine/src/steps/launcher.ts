/**
 * flakedesk Engine — Launcher Step
 */

import * as fs from "fs";
import { EngineContext } from "../context";
import { renderLauncherScript } from "../desktop";
import { writeFileWithFallback } from "../linux/privileged";
import { StepProbe } from "../types";
import { BaseStep } from "./base-step";

function isExecutable(file: string): boolean {
  try {
    return (fs.statSync(file).mode & 0o111) !== 0;
  } catch {
    return false;
  }
}

export class LauncherStep extends BaseStep {
  readonly id = "launcher";
  readonly title = "Launcher script";
  readonly category = "PERMISSION_ERROR";

  async probe(ctx: EngineContext): Promise<StepProbe> {
    const file = ctx.paths.launcher;
    if (!fs.existsSync(file)) return { satisfied: false, detail: "Launcher missing" };

    const expected = renderLauncherScript(ctx.profile, ctx.paths);
    if (fs.readFileSync(file, "utf-8") !== expected) {
      return { satisfied: false, detail: "Launcher is out of date" };
    }
    return isExecutable(file)
      ? { satisfied: true, detail: file }
      : { satisfied: false, detail: "Launcher is not executable" };
  }

  async perform(ctx: EngineContext) {
    const how = await writeFileWithFallback(
      ctx,
      ctx.paths.launcher,
      renderLauncherScript(ctx.profile, ctx.paths),
      0o755,
      this.id,
    );
    return { message: `Wrote ${ctx.paths.launcher}${how === "sudo" ? " (sudo)" : ""}` };
  }
}
