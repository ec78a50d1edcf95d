/**
 * flakedesk Engine — Sandbox Permission Patching
 *
 * The Electron sandbox helper must be owned by root with mode 4755
 * (setuid). Patching failures are fatal; the uninstaller's reset is
 * best-effort per file.
 */

import * as fs from "fs";
import { EngineContext } from "../context";
import { sudo, sudoOrFail } from "../linux/privileged";
import { findBinary } from "./locate";

export const PATCHED_MODE = 0o4755;
export const DEFAULT_MODE = 0o755;

/** Permission bits including setuid/setgid/sticky */
export function permissionBits(stats: fs.Stats): number {
  return stats.mode & 0o7777;
}

export function isSetuid(stats: fs.Stats): boolean {
  return (stats.mode & 0o4000) !== 0;
}

export function isPatched(stats: fs.Stats, ownerUid: number = 0): boolean {
  return stats.uid === ownerUid && permissionBits(stats) === PATCHED_MODE;
}

export async function patchSandboxBinary(
  ctx: EngineContext,
  binaryPath: string,
): Promise<void> {
  ctx.logger.info({ path: binaryPath }, "Setting sandbox ownership and mode");
  const failure = {
    category: "SANDBOX_ERROR" as const,
    step: "application" as const,
    message: `Failed to set proper permissions on ${binaryPath}`,
  };
  await sudoOrFail(ctx, ["chown", "root:root", binaryPath], failure);
  await sudoOrFail(ctx, ["chmod", PATCHED_MODE.toString(8), binaryPath], failure);
}

/**
 * Helpers under the store root that currently carry the setuid bit.
 * Store layout is <root>/<hash>/libexec/electron/<name>, hence depth 4.
 */
export function findSetuidSandboxes(
  root: string,
  name: string,
  maxDepth: number = 4,
): string[] {
  return findBinary(root, name, { maxDepth, filter: isSetuid });
}

/**
 * Reset every setuid helper under the store root to mode 755.
 *
 * @returns per-file result; individual failures are swallowed
 */
export async function resetSandboxPermissions(
  ctx: EngineContext,
): Promise<{ path: string; reset: boolean }[]> {
  const results: { path: string; reset: boolean }[] = [];

  for (const file of findSetuidSandboxes(ctx.paths.nix_store, ctx.profile.sandbox_binary)) {
    const result = await sudo(ctx, ["chmod", DEFAULT_MODE.toString(8), file]);
    const reset = result.exitCode === 0;
    if (reset) {
      ctx.logger.info({ path: file }, "Reset sandbox permissions");
    } else {
      ctx.logger.warn({ path: file, exitCode: result.exitCode }, "Could not reset sandbox permissions");
    }
    results.push({ path: file, reset });
  }

  return results;
}
