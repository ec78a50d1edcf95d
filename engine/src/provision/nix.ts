/**
 * flakedesk Engine — Nix Invocations
 *
 * Runs `nix build` / `nix run` for the profile's flake while streaming
 * progress: classified status lines always, raw lines in verbose mode.
 * The full output is returned for path extraction and diagnostics.
 */

import { EngineContext, reportProgress } from "../context";
import { StepId } from "../types";
import { CommandResult } from "../utils/command";
import { nixArgs } from "../profile";
import { BuildStatusTracker } from "./build-status";

export interface NixRunOptions {
  step: StepId;
  /** Label shown next to the spinner, e.g. "Package Build" */
  label: string;
  extra?: string[];
  /** Wrap the call in `timeout <seconds>` */
  timeoutSeconds?: number;
}

export async function runNix(
  ctx: EngineContext,
  verb: "build" | "run",
  options: NixRunOptions,
): Promise<CommandResult> {
  const tracker = new BuildStatusTracker();
  const args = nixArgs(ctx.profile, verb, options.extra);

  reportProgress(ctx, options.step, options.label, "Starting...");

  const onLine = (line: string): void => {
    if (ctx.verbose) {
      ctx.emit({ type: "output", step: options.step, line });
    }
    const status = tracker.update(line);
    if (status) reportProgress(ctx, options.step, options.label, status);
  };

  const result =
    options.timeoutSeconds !== undefined
      ? await ctx.runner.run("timeout", [String(options.timeoutSeconds), "nix", ...args], {
          env: ctx.env,
          onLine,
        })
      : await ctx.runner.run("nix", args, { env: ctx.env, onLine });

  ctx.logger.debug(
    { verb, flake: ctx.profile.flake, exitCode: result.exitCode },
    "nix finished",
  );
  return result;
}

/**
 * Combined console text of a command, as a terminal would have shown it.
 */
export function combinedOutput(result: CommandResult): string {
  return [result.stdout, result.stderr].filter(Boolean).join("\n");
}

/**
 * The last non-empty stdout line (`--print-out-paths` prints the store
 * path last).
 */
export function lastOutputLine(text: string): string | null {
  const lines = text.split("\n").map((l) => l.trim()).filter(Boolean);
  return lines.length > 0 ? lines[lines.length - 1] : null;
}
