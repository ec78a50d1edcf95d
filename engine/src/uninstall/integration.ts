/**
 * flakedesk Engine — Integration Removal
 *
 * Undoes the launcher, sandbox patch, desktop files and dock pin. Every
 * action is attempted; a missing target is reported as absent, a failed
 * one as failed, and neither stops the others.
 */

import { EngineContext } from "../context";
import { readFavorites, refreshDesktopDatabase, removeFavorite, writeFavorites } from "../desktop";
import { removeFileWithFallback } from "../linux/privileged";
import { desktopEntryId } from "../profile";
import { resetSandboxPermissions } from "../sandbox";
import { UninstallAction } from "../types";
import { commandExists } from "../utils/command";

async function removeFile(ctx: EngineContext, target: string): Promise<UninstallAction> {
  const status = await removeFileWithFallback(ctx, target);
  ctx.logger.info({ path: target, status }, "Remove file");
  return status === "failed" ? { target, status, message: "Could not remove" } : { target, status };
}

async function unpin(ctx: EngineContext): Promise<UninstallAction> {
  const target = "dash favorites";
  if (!(await commandExists(ctx.runner, "gsettings", ctx.env))) {
    return { target, status: "absent", message: "gsettings not available" };
  }
  try {
    const id = desktopEntryId(ctx.profile);
    const favorites = await readFavorites(ctx);
    if (!favorites.includes(id)) return { target, status: "absent" };
    return (await writeFavorites(ctx, removeFavorite(favorites, id)))
      ? { target, status: "removed" }
      : { target, status: "failed", message: "gsettings set failed" };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    ctx.logger.warn({ error: message }, "Could not read favorites");
    return { target, status: "failed", message };
  }
}

export async function removeIntegration(ctx: EngineContext): Promise<UninstallAction[]> {
  const actions: UninstallAction[] = [];

  actions.push(await removeFile(ctx, ctx.paths.launcher));

  for (const reset of await resetSandboxPermissions(ctx)) {
    actions.push(
      reset.reset
        ? { target: reset.path, status: "reset" }
        : { target: reset.path, status: "failed", message: "Could not reset permissions" },
    );
  }

  actions.push(await removeFile(ctx, ctx.paths.menu_entry));
  actions.push(await removeFile(ctx, ctx.paths.desktop_copy));
  actions.push(await removeFile(ctx, ctx.paths.icon));
  actions.push(await removeFile(ctx, ctx.paths.desktop_mime_cache));
  actions.push(await unpin(ctx));

  const refreshed = await refreshDesktopDatabase(ctx);
  ctx.logger.debug({ refreshed }, "Desktop database refresh");

  return actions;
}
