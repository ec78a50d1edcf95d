#!/usr/bin/env node

/**
 * flakedesk CLI — Entry Point
 *
 * Installs a Nix-flake desktop application on Ubuntu/Debian and
 * integrates it with GNOME.
 *
 * Commands:
 *   flakedesk install [-y] [-v]     Install and integrate
 *   flakedesk uninstall [--full]    Remove integration (and dependencies)
 *   flakedesk status                Show readiness and step state
 *   flakedesk launch                Start or focus the application
 *
 * Packaging:
 *   flakedesk build                 Build the self-extracting installer
 *   flakedesk verify <dir>          Check a release's checksums
 *   flakedesk unpack <installer>    Extract an installer's payload
 *
 * Global options: --debug, --config <file>
 */

import { Command } from "commander";
import { registerInstallCommand } from "./commands/install";
import { registerUninstallCommand } from "./commands/uninstall";
import { registerStatusCommand } from "./commands/status";
import { registerLaunchCommand } from "./commands/launch";
import { registerBuildCommand } from "./commands/build";
import { registerVerifyCommand } from "./commands/verify";
import { registerUnpackCommand } from "./commands/unpack";
import { GlobalOptions } from "./context";
import { loadConfig } from "./config";
import { printError } from "./output";

const program = new Command();

program
  .name("flakedesk")
  .description("Install a Nix-flake desktop application and integrate it with GNOME")
  .version("1.0.0")
  .option("--debug", "Print structured engine logs to stderr", false)
  .option("--config <file>", "Configuration file (default: ~/.flakedesk/config.yaml)")
  .allowUnknownOption();

// ─── Installation ───────────────────────────────────────────
registerInstallCommand(program);
registerUninstallCommand(program);
registerStatusCommand(program);
registerLaunchCommand(program);

// ─── Packaging ──────────────────────────────────────────────
registerBuildCommand(program, () => {
  const globals = program.opts<GlobalOptions>();
  return loadConfig({ configPath: globals.config }).profile.icon_file;
});
registerVerifyCommand(program);
registerUnpackCommand(program);

// Parse command line
program.parseAsync(process.argv).catch((err: unknown) => {
  printError(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
