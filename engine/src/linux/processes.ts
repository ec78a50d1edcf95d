/**
 * flakedesk Engine — Application Process Helpers
 */

import { EngineContext } from "../context";
import { runAlternatives } from "../utils/fallback";

/**
 * True when any of the profile's `pgrep -f` patterns matches a process.
 */
export async function isApplicationRunning(ctx: EngineContext): Promise<boolean> {
  for (const pattern of ctx.profile.process_patterns) {
    const result = await ctx.runner.run("pgrep", ["-f", pattern], { env: ctx.env });
    if (result.exitCode === 0) return true;
  }
  return false;
}

export async function stopApplication(ctx: EngineContext): Promise<void> {
  for (const pattern of ctx.profile.process_patterns) {
    const result = await ctx.runner.run("pkill", ["-f", pattern], { env: ctx.env });
    ctx.logger.debug({ pattern, exitCode: result.exitCode }, "pkill");
  }
}

/**
 * Bring an existing window to the front. Best-effort.
 */
export async function activateWindow(ctx: EngineContext): Promise<boolean> {
  const windowClass = ctx.profile.window_class;
  const result = await runAlternatives(
    [
      {
        label: "wmctrl",
        run: () => ctx.runner.run("wmctrl", ["-a", windowClass], { env: ctx.env }),
      },
      {
        label: "xdotool",
        run: () =>
          ctx.runner.run(
            "xdotool",
            ["search", "--class", windowClass, "windowactivate"],
            { env: ctx.env },
          ),
      },
    ],
    { label: "activate window", logger: ctx.logger },
  );
  return result.ok;
}
