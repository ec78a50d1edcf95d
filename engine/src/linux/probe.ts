/**
 * flakedesk Engine — Environment Prober
 *
 * Inspects the host on every call; nothing here is cached. The result
 * feeds the preflight gate and the `status` command.
 */

import * as fs from "fs";
import * as os from "os";
import { EngineContext } from "../context";
import {
  AppProfile,
  PreflightProblem,
  ProbedTool,
  SystemProbe,
} from "../types";
import { commandExists } from "../utils/command";
import { isAtLeast } from "../utils/version";
import { OS_RELEASE_PATH, readOsRelease } from "./os-release";

/** Display order for status output */
export const PROBED_TOOLS: ProbedTool[] = [
  "apt",
  "dpkg",
  "node",
  "npm",
  "docker",
  "nix",
  "gsettings",
  "gio",
  "gdbus",
  "setfattr",
  "update-desktop-database",
  "wmctrl",
  "xdotool",
];

const BYTES_PER_GIB = 1024 * 1024 * 1024;

/**
 * Free space available to the current user at `dir`, in whole GiB.
 */
export async function freeSpaceGb(dir: string): Promise<number | null> {
  try {
    const stats = await fs.promises.statfs(dir);
    return Math.floor((stats.bavail * stats.bsize) / BYTES_PER_GIB);
  } catch {
    return null;
  }
}

export interface ProbeOptions {
  osReleasePath?: string;
  /** Overrides the effective uid check (tests) */
  isRoot?: boolean;
}

export async function probeSystem(
  ctx: EngineContext,
  options: ProbeOptions = {},
): Promise<SystemProbe> {
  const has = (tool: ProbedTool) => commandExists(ctx.runner, tool, ctx.env);
  const tools: Record<ProbedTool, boolean> = {
    apt: await has("apt"),
    dpkg: await has("dpkg"),
    node: await has("node"),
    npm: await has("npm"),
    docker: await has("docker"),
    nix: await has("nix"),
    gsettings: await has("gsettings"),
    gio: await has("gio"),
    gdbus: await has("gdbus"),
    setfattr: await has("setfattr"),
    "update-desktop-database": await has("update-desktop-database"),
    wmctrl: await has("wmctrl"),
    xdotool: await has("xdotool"),
  };

  const isRoot =
    options.isRoot ??
    (typeof process.getuid === "function" ? process.getuid() === 0 : false);

  const probe: SystemProbe = {
    os: readOsRelease(options.osReleasePath ?? OS_RELEASE_PATH),
    is_root: isRoot,
    user: ctx.user,
    free_space_gb: await freeSpaceGb(ctx.paths.home),
    tools,
  };

  ctx.logger.debug({ probe }, "System probed");
  return probe;
}

/**
 * Decide whether installation may proceed. Every returned problem is
 * fatal.
 */
export function evaluatePreflight(
  probe: SystemProbe,
  profile: AppProfile,
): PreflightProblem[] {
  const problems: PreflightProblem[] = [];

  if (probe.is_root) {
    problems.push({
      code: "running_as_root",
      message: "This installer should not be run as root.",
      hint: "Run it as a regular user. sudo is used when needed.",
    });
  }

  if (!probe.tools.apt) {
    problems.push({
      code: "missing_apt",
      message:
        "This installer is designed for Ubuntu/Debian systems with the apt package manager.",
    });
  }

  if (!probe.os) {
    problems.push({
      code: "unknown_os",
      message: "Cannot determine the OS version.",
    });
  } else if (
    probe.os.name.includes("Ubuntu") &&
    !isAtLeast(probe.os.version_id, profile.min_ubuntu_version)
  ) {
    problems.push({
      code: "unsupported_version",
      message: `Ubuntu ${probe.os.version_id} is not supported. Minimum version: ${profile.min_ubuntu_version}`,
    });
  }

  if (probe.free_space_gb !== null && probe.free_space_gb < profile.required_space_gb) {
    problems.push({
      code: "insufficient_space",
      message: `Insufficient disk space. Required: ${profile.required_space_gb}GB, Available: ${probe.free_space_gb}GB`,
    });
  }

  return problems;
}

/**
 * Name of the invoking user, as used for group membership changes.
 */
export function currentUser(): string {
  return process.env.USER || process.env.LOGNAME || os.userInfo().username;
}
