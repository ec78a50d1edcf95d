/**
 * flakedesk Engine — Desktop Shell Integration
 *
 * Best-effort calls into GNOME tooling. Nothing here throws for a failed
 * command; callers turn a false result into a warning.
 */

import { EngineContext } from "../context";
import { commandExists } from "../utils/command";
import { FallbackResult, runAlternatives } from "../utils/fallback";
import { FAVORITES_KEY, FAVORITES_SCHEMA, formatFavorites, parseFavorites } from "./favorites";

const SHELL_EVAL = [
  "call",
  "--session",
  "--dest",
  "org.gnome.Shell",
  "--object-path",
  "/org/gnome/Shell",
  "--method",
  "org.gnome.Shell.Eval",
];

/** Dash redisplay expressions; the Shell's internal layout differs by version */
export const DASH_REFRESH_SCRIPTS = [
  "Main.overview._dash._redisplay();",
  "Main.overview.dash._redisplay();",
  "Main.overview.viewSelector._dash._redisplay();",
  "Main.overview._overview._dash._redisplay();",
  "Main.layoutManager._updateHotCorners(); Main.overview._dash._queueRedisplay();",
];

/**
 * Mark a desktop file as trusted so GNOME launches it on double-click.
 * Each alternative also sets a secondary attribute whose result is ignored.
 */
export async function markTrusted(ctx: EngineContext, file: string): Promise<FallbackResult> {
  const env = ctx.env;
  return runAlternatives(
    [
      {
        label: "gio",
        run: async () => {
          const trusted = await ctx.runner.run("gio", ["set", file, "metadata::trusted", "true"], {
            env,
          });
          if (trusted.exitCode === 0) {
            // clears a stale icon position so Nautilus redraws the icon as trusted
            await ctx.runner.run("gio", ["set", file, "metadata::nautilus-icon-position", ""], {
              env,
            });
          }
          return trusted;
        },
      },
      {
        label: "setfattr",
        run: async () => {
          const origin = await ctx.runner.run(
            "setfattr",
            ["-n", "user.xdg.origin.url", "-v", `file://${file}`, file],
            { env },
          );
          if (origin.exitCode === 0) {
            await ctx.runner.run(
              "setfattr",
              ["-n", "user.mime_type", "-v", "application/x-desktop", file],
              { env },
            );
          }
          return origin;
        },
      },
    ],
    { label: "trust desktop file", logger: ctx.logger },
  );
}

/**
 * Quit Nautilus so the desktop is redrawn with the trusted shortcut.
 * True when Nautilus is not installed.
 */
export async function restartFileManager(ctx: EngineContext): Promise<boolean> {
  if (!(await commandExists(ctx.runner, "nautilus", ctx.env))) return true;
  const result = await ctx.runner.run("nautilus", ["-q"], { env: ctx.env });
  return result.exitCode === 0;
}

/**
 * Run update-desktop-database on the applications directory.
 * Never on ~/Desktop: it leaves a mimeinfo.cache there.
 */
export async function refreshDesktopDatabase(ctx: EngineContext): Promise<boolean> {
  if (!(await commandExists(ctx.runner, "update-desktop-database", ctx.env))) return false;
  const result = await ctx.runner.run(
    "update-desktop-database",
    [ctx.paths.applications_dir],
    { env: ctx.env },
  );
  return result.exitCode === 0;
}

/**
 * Let Nautilus launch trusted executable text files directly.
 */
export async function enableExecutableLaunch(ctx: EngineContext): Promise<boolean> {
  const result = await ctx.runner.run(
    "gsettings",
    ["set", "org.gnome.nautilus.preferences", "executable-text-activation", "launch"],
    { env: ctx.env },
  );
  return result.exitCode === 0;
}

export async function readFavorites(ctx: EngineContext): Promise<string[]> {
  const result = await ctx.runner.run("gsettings", ["get", FAVORITES_SCHEMA, FAVORITES_KEY], {
    env: ctx.env,
  });
  if (result.exitCode !== 0) {
    throw new Error(`gsettings get ${FAVORITES_SCHEMA} ${FAVORITES_KEY} exited with ${result.exitCode}`);
  }
  return parseFavorites(result.stdout);
}

export async function writeFavorites(ctx: EngineContext, items: string[]): Promise<boolean> {
  const result = await ctx.runner.run(
    "gsettings",
    ["set", FAVORITES_SCHEMA, FAVORITES_KEY, formatFavorites(items)],
    { env: ctx.env },
  );
  return result.exitCode === 0;
}

/**
 * Ask GNOME Shell to redraw the dash. Eval answers `(true, '...')` when the
 * expression ran; `(false, '')` otherwise, with exit code 0 either way.
 */
export async function refreshDash(ctx: EngineContext): Promise<FallbackResult> {
  return runAlternatives(
    DASH_REFRESH_SCRIPTS.map((script) => ({
      label: script,
      run: () => ctx.runner.run("gdbus", [...SHELL_EVAL, script], { env: ctx.env }),
      succeeded: (result) => result.exitCode === 0 && result.stdout.trim().startsWith("(true"),
    })),
    { label: "refresh dash", logger: ctx.logger },
  );
}
