/**
 * flakedesk Engine — Desktop Entry Step
 *
 * Writing the menu entry is required. The desktop copy and everything
 * after it (trust marking, database refresh, Nautilus setting) are
 * cosmetic: their failures become warnings. A failed Nautilus restart is
 * only logged.
 */

import * as fs from "fs";
import * as path from "path";
import { EngineContext } from "../context";
import {
  enableExecutableLaunch,
  markTrusted,
  refreshDesktopDatabase,
  renderDesktopEntry,
  restartFileManager,
} from "../desktop";
import { StepProbe } from "../types";
import { BaseStep, StepReport } from "./base-step";

function hasContent(file: string, content: string): boolean {
  try {
    return fs.readFileSync(file, "utf-8") === content;
  } catch {
    return false;
  }
}

export class DesktopEntryStep extends BaseStep {
  readonly id = "desktop-entry";
  readonly title = "Desktop entry";

  async probe(ctx: EngineContext): Promise<StepProbe> {
    const content = renderDesktopEntry(ctx.profile, ctx.paths);
    if (!hasContent(ctx.paths.menu_entry, content)) {
      return { satisfied: false, detail: "Menu entry missing or out of date" };
    }
    const copy = renderDesktopEntry(ctx.profile, ctx.paths, { desktopCopy: true });
    if (fs.existsSync(ctx.paths.desktop_dir) && !hasContent(ctx.paths.desktop_copy, copy)) {
      return { satisfied: false, detail: "Desktop shortcut missing or out of date" };
    }
    return { satisfied: true, detail: ctx.paths.menu_entry };
  }

  async perform(ctx: EngineContext): Promise<StepReport> {
    const content = renderDesktopEntry(ctx.profile, ctx.paths);
    const warnings: string[] = [];

    fs.mkdirSync(path.dirname(ctx.paths.menu_entry), { recursive: true });
    fs.writeFileSync(ctx.paths.menu_entry, content, { encoding: "utf-8", mode: 0o755 });
    fs.chmodSync(ctx.paths.menu_entry, 0o755);

    try {
      this.writeDesktopCopy(ctx, renderDesktopEntry(ctx.profile, ctx.paths, { desktopCopy: true }));
      const trusted = await markTrusted(ctx, ctx.paths.desktop_copy);
      if (!trusted.ok) warnings.push("Could not mark the desktop shortcut as trusted");
      if (!(await restartFileManager(ctx))) {
        ctx.logger.debug("Nautilus restart failed");
      }
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      warnings.push(`Could not create the desktop shortcut: ${message}`);
    }

    if (!(await refreshDesktopDatabase(ctx))) {
      warnings.push("Could not refresh the desktop database");
    }
    if (!(await enableExecutableLaunch(ctx))) {
      warnings.push("Could not enable launching desktop files from Nautilus");
    }

    // update-desktop-database leaves this behind when pointed at ~/Desktop
    fs.rmSync(ctx.paths.desktop_mime_cache, { force: true });

    return warnings.length > 0 ? { warnings } : { message: `Wrote ${ctx.paths.menu_entry}` };
  }

  private writeDesktopCopy(ctx: EngineContext, content: string): void {
    fs.mkdirSync(ctx.paths.desktop_dir, { recursive: true });
    fs.writeFileSync(ctx.paths.desktop_copy, content, { encoding: "utf-8", mode: 0o755 });
    fs.chmodSync(ctx.paths.desktop_copy, 0o755);
  }
}
