/**
 * flakedesk Engine — System Dependency Removal
 *
 * Removes Docker, NodeSource Node.js and Nix. The development tools from
 * the first install step are kept: other software depends on them.
 * Best-effort throughout.
 */

import * as fs from "fs";
import * as path from "path";
import { EngineContext } from "../context";
import { aptRemove } from "../linux/apt";
import { removeFileWithFallback, sudo } from "../linux/privileged";
import { DOCKER_KEYRING, DOCKER_LIST, DOCKER_PACKAGES } from "../steps/docker";
import { NODESOURCE_LIST } from "../steps/nodejs";
import { UninstallAction } from "../types";
import { commandExists } from "../utils/command";

/**
 * Drop every line mentioning `nix` (what the Nix installer appended).
 *
 * @returns number of lines removed
 */
export function stripNixLines(text: string): { text: string; removed: number } {
  const lines = text.split("\n");
  const kept = lines.filter((line) => !line.includes("nix"));
  return { text: kept.join("\n"), removed: lines.length - kept.length };
}

function stripShellProfile(file: string): UninstallAction {
  if (!fs.existsSync(file)) return { target: file, status: "absent" };
  try {
    const { text, removed } = stripNixLines(fs.readFileSync(file, "utf-8"));
    if (removed === 0) return { target: file, status: "absent", message: "No Nix lines" };
    fs.writeFileSync(file, text, "utf-8");
    return { target: file, status: "removed", message: `Removed ${removed} line(s)` };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { target: file, status: "failed", message };
  }
}

async function removeTree(ctx: EngineContext, target: string, privileged: boolean): Promise<UninstallAction> {
  if (!fs.existsSync(target)) return { target, status: "absent" };
  if (privileged) {
    const result = await sudo(ctx, ["rm", "-rf", target]);
    return result.exitCode === 0
      ? { target, status: "removed" }
      : { target, status: "failed", message: `rm exited with ${result.exitCode}` };
  }
  try {
    fs.rmSync(target, { recursive: true, force: true });
    return { target, status: "removed" };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { target, status: "failed", message };
  }
}

async function removeFile(ctx: EngineContext, target: string): Promise<UninstallAction> {
  const status = await removeFileWithFallback(ctx, target);
  return { target, status };
}

async function removePackages(ctx: EngineContext, label: string, packages: string[]): Promise<UninstallAction> {
  const result = await aptRemove(ctx, packages);
  ctx.logger.info({ packages, exitCode: result.exitCode }, "apt-get remove");
  return result.exitCode === 0
    ? { target: label, status: "removed" }
    : { target: label, status: "failed", message: `apt-get remove exited with ${result.exitCode}` };
}

export async function removeDependencies(ctx: EngineContext): Promise<UninstallAction[]> {
  const actions: UninstallAction[] = [];
  const { paths } = ctx;

  if (await commandExists(ctx.runner, "docker", ctx.env)) {
    actions.push(await removePackages(ctx, "docker", DOCKER_PACKAGES));
    actions.push(await removeFile(ctx, path.join(paths.apt_sources_dir, DOCKER_LIST)));
    actions.push(await removeFile(ctx, path.join(paths.apt_keyrings_dir, DOCKER_KEYRING)));
  } else {
    actions.push({ target: "docker", status: "absent" });
  }

  const nodesource = path.join(paths.apt_sources_dir, NODESOURCE_LIST);
  if (fs.existsSync(nodesource)) {
    actions.push(await removePackages(ctx, "nodejs", ["nodejs"]));
    actions.push(await removeFile(ctx, nodesource));
  } else {
    actions.push({ target: "nodejs", status: "absent", message: "Not installed from NodeSource" });
  }

  if (fs.existsSync(paths.nix_root)) {
    actions.push(await removeTree(ctx, paths.nix_root, true));
    for (const file of paths.nix_system_files) actions.push(await removeFile(ctx, file));
    for (const file of paths.shell_profiles) actions.push(stripShellProfile(file));
    for (const dir of paths.nix_user_dirs) actions.push(await removeTree(ctx, dir, false));
  } else {
    actions.push({ target: paths.nix_root, status: "absent" });
  }

  const group = await sudo(ctx, ["gpasswd", "-d", ctx.user, "docker"]);
  actions.push(
    group.exitCode === 0
      ? { target: "docker group", status: "removed" }
      : { target: "docker group", status: "absent", message: `${ctx.user} not in group` },
  );

  return actions;
}
