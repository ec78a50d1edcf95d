/**
 * flakedesk Engine — Icon Step
 *
 * Sources, in order: the bundled asset, the profile's icon URL, a
 * generated placeholder.
 */

import * as fs from "fs";
import * as path from "path";
import { EngineContext } from "../context";
import { placeholderIcon } from "../desktop";
import { downloadFile } from "../downloader";
import { StepProbe } from "../types";
import { BaseStep, StepReport } from "./base-step";

export class IconStep extends BaseStep {
  readonly id = "icon";
  readonly title = "Application icon";

  async probe(ctx: EngineContext): Promise<StepProbe> {
    return fs.existsSync(ctx.paths.icon)
      ? { satisfied: true, detail: ctx.paths.icon }
      : { satisfied: false, detail: "Icon missing" };
  }

  async perform(ctx: EngineContext): Promise<StepReport> {
    const target = ctx.paths.icon;
    fs.mkdirSync(ctx.paths.icon_dir, { recursive: true });

    const bundled = path.join(ctx.paths.assets_dir, ctx.profile.icon_file);
    if (fs.existsSync(bundled)) {
      fs.copyFileSync(bundled, target);
      return { message: "Copied bundled icon" };
    }

    const url = ctx.profile.icon_url;
    if (url) {
      try {
        await downloadFile(url, target, ctx.logger);
        return { message: "Downloaded icon" };
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        ctx.logger.warn({ url, error: message }, "Icon download failed");
      }
    }

    fs.writeFileSync(target, placeholderIcon(ctx.profile.name.charAt(0)), "utf-8");
    return { warnings: ["Could not find or download an icon; using a placeholder"] };
  }
}
