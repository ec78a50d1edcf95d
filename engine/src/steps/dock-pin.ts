/**
 * flakedesk Engine — Dock Pin Step
 *
 * Appends the application to GNOME's favourites. Failure never stops the
 * run: pinning can be done by hand from the Activities view.
 */

import { EngineContext } from "../context";
import { addFavorite, readFavorites, refreshDash, writeFavorites } from "../desktop";
import { desktopEntryId } from "../profile";
import { StepProbe } from "../types";
import { commandExists } from "../utils/command";
import { BaseStep, StepReport } from "./base-step";

/** Time for the setting to reach the Shell before asking it to redraw */
const PROPAGATION_DELAY_MS = 1000;

export class DockPinStep extends BaseStep {
  readonly id = "dock-pin";
  readonly title = "Dash favourite";
  readonly severity = "warn";

  async probe(ctx: EngineContext): Promise<StepProbe> {
    if (!(await commandExists(ctx.runner, "gsettings", ctx.env))) {
      return {
        satisfied: false,
        skip: "gsettings not available; pin manually from the Activities view",
      };
    }
    const favorites = await readFavorites(ctx);
    return favorites.includes(desktopEntryId(ctx.profile))
      ? { satisfied: true, detail: "Already in Dash favorites" }
      : { satisfied: false, detail: `Current favorites: ${favorites.length}` };
  }

  async perform(ctx: EngineContext): Promise<StepReport> {
    const id = desktopEntryId(ctx.profile);
    const favorites = addFavorite(await readFavorites(ctx), id);
    if (!(await writeFavorites(ctx, favorites))) {
      throw new Error(
        "Could not pin to Dash automatically. Right-click the app in Activities and select 'Pin to Dash'.",
      );
    }

    await ctx.sleep(PROPAGATION_DELAY_MS);
    if (await commandExists(ctx.runner, "gdbus", ctx.env)) {
      const refreshed = await refreshDash(ctx);
      if (!refreshed.ok) {
        return {
          message: "Pinned. Press Super to open Activities if the Dash has not refreshed.",
        };
      }
    }
    return { message: "Added to Dash favorites" };
  }
}
