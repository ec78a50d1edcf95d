/**
 * flakedesk CLI -- Build Command
 *
 * Packages the self-extracting installer and a release directory.
 * Expects the CLI bundle (npm run bundle) to exist.
 *
 * Usage:
 *   flakedesk build [--root <dir>] [--out <dir>] [--release-version <v>]
 */

import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import {
  ReleaseFile,
  StepFailure,
  buildRelease,
  createLogger,
} from "@flakedesk/engine";
import { GlobalOptions } from "../context";
import {
  colors,
  formatBytes,
  printBlank,
  printError,
  printHeader,
  printInfo,
  printStageSuccess,
  printSuccess,
  setDebugMode,
} from "../output";

export const RELEASE_NAME = "flakedesk";
export const RELEASE_TITLE = "flakedesk";

/** Payload layout; bin/install is the entry the stub executes */
export const RELEASE_FILES: ReleaseFile[] = [
  { from: "bin/install", to: "bin/install" },
  { from: "bin/uninstall", to: "bin/uninstall" },
  { from: "bin/ensure-node", to: "bin/ensure-node" },
  { from: "dist/flakedesk.cjs", to: "dist/flakedesk.cjs" },
  { from: "assets", to: "assets" },
  { from: "README.md", to: "README.md" },
];

export const RELEASE_ENTRY = "bin/install";

export interface BuildCommandOptions {
  root: string;
  out?: string;
  version?: string;
  iconFile: string;
  debug?: boolean;
}

/**
 * Version from the project's package.json, or null.
 */
export function readProjectVersion(root: string): string | null {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(root, "package.json"), "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    return null;
  }
  return null;
}

export async function runBuild(opts: BuildCommandOptions): Promise<number> {
  const root = path.resolve(opts.root);
  const buildDir = path.resolve(opts.out ?? path.join(root, "build"));
  const version = opts.version ?? readProjectVersion(root);
  if (!version) {
    printError("No version given and none found in package.json. Use --release-version <v>.");
    return 1;
  }

  printHeader(`Building ${RELEASE_TITLE} v${version}`);

  try {
    const result = await buildRelease({
      projectRoot: root,
      buildDir,
      name: RELEASE_NAME,
      version,
      title: RELEASE_TITLE,
      files: RELEASE_FILES,
      entry: RELEASE_ENTRY,
      iconFile: opts.iconFile,
      logger: createLogger({ level: opts.debug ? "debug" : "silent" }),
    });

    printStageSuccess(`Self-extracting installer: ${result.installer}`);
    printStageSuccess(`Release files: ${result.release_dir}`);
    for (const entry of result.checksums) {
      const size = fs.statSync(path.join(result.release_dir, entry.file)).size;
      console.log(`    ${entry.file} ${colors.dim(`(${formatBytes(size)})`)}`);
    }
    printBlank();
    printSuccess("Build completed successfully!");
    printInfo("To test the installer:");
    console.log(`  ${result.installer}`);
    printInfo(`Verify a downloaded release with: flakedesk verify ${result.release_dir}`);
    return 0;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    printError(msg);
    if (err instanceof StepFailure && msg.includes("dist/flakedesk.cjs")) {
      printInfo(`Run ${colors.bold("npm run bundle")} first.`);
    }
    return 1;
  }
}

export function registerBuildCommand(program: Command, iconFile: () => string): void {
  program
    .command("build")
    .description("Build the self-extracting installer and release files")
    .option("--root <dir>", "Project root", process.cwd())
    .option("--out <dir>", "Build directory (default: <root>/build)")
    .option("--release-version <version>", "Release version (default: package.json)")
    .action(async (opts: { root: string; out?: string; releaseVersion?: string }) => {
      const globals = program.opts<GlobalOptions>();
      setDebugMode(globals.debug ?? false);
      process.exitCode = await runBuild({
        root: opts.root,
        out: opts.out,
        version: opts.releaseVersion,
        iconFile: iconFile(),
        debug: globals.debug,
      });
    });
}
