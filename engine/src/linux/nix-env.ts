/**
 * flakedesk Engine — Nix Environment Setup
 *
 * A freshly installed Nix is not on PATH for the running process. This
 * imports the variables the Nix profile scripts export and prepends the
 * profile bin directories, so the steps after the Nix step can call `nix`.
 */

import * as fs from "fs";
import * as path from "path";
import { EngineContext } from "../context";
import { commandExists } from "../utils/command";

/**
 * Parse `env` output (KEY=value per line). Lines without "=" continue the
 * previous value, as multi-line values do.
 */
export function parseEnvOutput(text: string): Record<string, string> {
  const vars: Record<string, string> = {};
  let lastKey: string | null = null;

  for (const line of text.split("\n")) {
    const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (match) {
      vars[match[1]] = match[2];
      lastKey = match[1];
    } else if (lastKey !== null && line.length > 0) {
      vars[lastKey] += `\n${line}`;
    }
  }

  return vars;
}

/**
 * Prepend `dir` to PATH unless it is already present.
 */
export function prependPath(env: NodeJS.ProcessEnv, dir: string): void {
  const current = env.PATH ?? "";
  const entries = current.split(":").filter(Boolean);
  if (entries.includes(dir)) return;
  env.PATH = [dir, ...entries].join(":");
}

/**
 * Source a profile script in a subshell and copy what it exports into
 * `ctx.env`.
 */
export async function importProfileScript(
  ctx: EngineContext,
  script: string,
): Promise<boolean> {
  const result = await ctx.runner.run(
    "sh",
    ["-c", '. "$1" >/dev/null 2>&1; env', "sh", script],
    { env: ctx.env },
  );
  if (result.exitCode !== 0) return false;

  const vars = parseEnvOutput(result.stdout);
  for (const [key, value] of Object.entries(vars)) {
    if (key === "PWD" || key === "SHLVL" || key === "_") continue;
    ctx.env[key] = value;
  }
  return true;
}

/**
 * Make `nix` callable for the rest of the run.
 *
 * @returns true when `nix` resolves afterwards
 */
export async function ensureNixEnvironment(ctx: EngineContext): Promise<boolean> {
  if (!(await commandExists(ctx.runner, "nix", ctx.env))) {
    const daemonBin = path.join(ctx.paths.nix_root, "var", "nix", "profiles", "default", "bin");
    const userBin = path.join(ctx.paths.home, ".nix-profile", "bin");

    if (fs.existsSync(ctx.paths.nix_daemon_profile)) {
      ctx.logger.info({ script: ctx.paths.nix_daemon_profile }, "Sourcing Nix daemon environment");
      await importProfileScript(ctx, ctx.paths.nix_daemon_profile);
      prependPath(ctx.env, daemonBin);
    } else if (fs.existsSync(ctx.paths.nix_user_profile)) {
      ctx.logger.info({ script: ctx.paths.nix_user_profile }, "Sourcing Nix profile environment");
      await importProfileScript(ctx, ctx.paths.nix_user_profile);
      prependPath(ctx.env, userBin);
    } else if (fs.existsSync(daemonBin)) {
      prependPath(ctx.env, daemonBin);
    } else if (fs.existsSync(userBin)) {
      prependPath(ctx.env, userBin);
    } else {
      ctx.logger.warn("Could not find a Nix environment script");
    }
  }

  prependPath(ctx.env, path.join(ctx.paths.home, ".local", "bin"));

  const available = await commandExists(ctx.runner, "nix", ctx.env);
  ctx.logger.debug({ available, PATH: ctx.env.PATH }, "Nix environment checked");
  return available;
}
