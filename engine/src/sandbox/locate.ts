/**
 * flakedesk Engine — Sandbox Binary Discovery
 *
 * Two strategies, in this order:
 *   1. structured: build the package, search its output tree for the helper
 *   2. scraping:   run the package and pick the helper path out of its
 *                  error text (Electron names it when the sandbox is unset)
 *
 * Structured search wins only with exactly one candidate. If neither
 * yields an existing file the run is aborted: the application cannot start
 * sandboxed.
 */

import * as fs from "fs";
import * as path from "path";
import { EngineContext } from "../context";
import { StepFailure } from "../errors";
import { combinedOutput, lastOutputLine, runNix } from "../provision/nix";
import { extractPrivilegedPath } from "./extract";

export interface SandboxLocation {
  path: string;
  source: "build-output" | "run-output";
}

export interface FindOptions {
  /** Directory levels below `root` to descend (default 8) */
  maxDepth?: number;
  /** Additional predicate on the file's stats */
  filter?: (stats: fs.Stats) => boolean;
}

/**
 * Recursively find regular files named `name` under `root`. Symlinks are
 * not followed; unreadable directories are skipped.
 */
export function findBinary(
  root: string,
  name: string,
  options: FindOptions = {},
): string[] {
  const maxDepth = options.maxDepth ?? 8;
  const found: string[] = [];

  const walk = (dir: string, depth: number): void => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      return;
    }

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (depth < maxDepth) walk(full, depth + 1);
      } else if (entry.isFile() && entry.name === name) {
        if (!options.filter) {
          found.push(full);
          continue;
        }
        try {
          if (options.filter(fs.statSync(full))) found.push(full);
        } catch {
          // vanished between readdir and stat
          continue;
        }
      }
    }
  };

  walk(root, 1);
  return found.sort();
}

/**
 * Build the package and search its output for the helper. Only the
 * current build counts; helpers left in the store by older builds are
 * ignored.
 */
export async function locateBuiltSandbox(ctx: EngineContext): Promise<{
  location: SandboxLocation | null;
  output: string;
}> {
  const result = await runNix(ctx, "build", {
    step: "application",
    label: "Package Build",
    extra: ["--print-out-paths", "--no-link"],
  });
  const output = combinedOutput(result);

  if (result.exitCode !== 0) {
    ctx.logger.warn({ exitCode: result.exitCode, output }, "nix build failed");
    return { location: null, output };
  }

  const storePath = lastOutputLine(result.stdout);
  if (!storePath || !fs.existsSync(storePath)) {
    ctx.logger.warn({ storePath }, "nix build printed no usable store path");
    return { location: null, output };
  }

  const candidates = findBinary(storePath, ctx.profile.sandbox_binary);
  if (candidates.length === 1) {
    return { location: { path: candidates[0], source: "build-output" }, output };
  }

  ctx.logger.info(
    { storePath, candidates },
    candidates.length === 0
      ? "Sandbox binary not found in build output"
      : "Multiple sandbox binaries in build output",
  );
  return { location: null, output };
}

/**
 * Run the package and scrape the helper path from its output.
 */
async function scrapeRunOutput(ctx: EngineContext): Promise<{
  location: SandboxLocation | null;
  output: string;
}> {
  const result = await runNix(ctx, "run", {
    step: "application",
    label: ctx.profile.name,
  });
  const output = combinedOutput(result);
  const found = extractPrivilegedPath(output, ctx.profile.sandbox_output_pattern);

  if (found && fs.existsSync(found)) {
    return { location: { path: found, source: "run-output" }, output };
  }

  ctx.logger.warn({ found, output }, "No sandbox path in run output");
  return { location: null, output };
}

export async function locateSandboxBinary(ctx: EngineContext): Promise<SandboxLocation> {
  const built = await locateBuiltSandbox(ctx);
  if (built.location) return built.location;

  const scraped = await scrapeRunOutput(ctx);
  if (scraped.location) return scraped.location;

  throw new StepFailure(
    "SANDBOX_ERROR",
    `Could not find the ${ctx.profile.sandbox_binary} binary in the Nix output. ` +
      `${ctx.profile.name} may not have been built properly.`,
    {
      step: "application",
      details: { build_output: built.output, run_output: scraped.output },
    },
  );
}
