/**
 * flakedesk CLI -- Uninstall Command
 *
 * Usage:
 *   flakedesk uninstall          Remove launcher, desktop files, icon, pin
 *   flakedesk uninstall --full   Also remove Docker, Node.js and Nix
 *                                (asks a second time)
 */

import { Command } from "commander";
import { CliContext, ContextFactory, GlobalOptions, createCliContext } from "../context";
import {
  formatAction,
  printBlank,
  printDebug,
  printHeader,
  printInfo,
  printStageSuccess,
  printStageWarn,
  printSuccess,
  printWarn,
} from "../output";

export interface UninstallCommandOptions {
  full: boolean;
}

/**
 * @returns the process exit code
 */
export async function runUninstall(
  opts: UninstallCommandOptions,
  ctx: CliContext,
): Promise<number> {
  printHeader(`${ctx.config.profile.name} Uninstaller`);

  if (opts.full) {
    printWarn("Full uninstall mode: Will remove integration files AND system dependencies");
  } else {
    printInfo("Standard uninstall: Will remove integration files only");
    printInfo("Use --full flag to also remove system dependencies");
  }
  printBlank();

  if (!(await ctx.confirm("Continue with uninstallation? [y/N] ", false))) {
    printInfo("Uninstallation cancelled");
    return 0;
  }
  printBlank();

  const result = await ctx.engine.uninstall({
    full: opts.full,
    confirmFull: async () => {
      printWarn("This will remove system-wide packages that may be used by other applications!");
      return ctx.confirm("Are you sure you want to remove all system dependencies? [y/N] ", false);
    },
  });

  for (const action of result.actions) {
    const line = formatAction(action);
    if (line === null) {
      printDebug(`Not present: ${action.target}`);
    } else if (action.status === "failed") {
      printStageWarn(line);
    } else {
      printStageSuccess(line);
    }
  }

  printBlank();
  if (opts.full && !result.dependencies_removed) {
    printInfo("Skipping system dependency removal");
  }
  printSuccess("Uninstallation completed!");
  if (result.dependencies_removed) {
    printInfo("You may want to reboot to ensure all changes take effect");
  }
  return 0;
}

export function registerUninstallCommand(
  program: Command,
  createContext: ContextFactory = createCliContext,
): void {
  program
    .command("uninstall")
    .description("Remove the desktop integration (and, with --full, system dependencies)")
    .option("--full", "Also remove Docker, Node.js and Nix", false)
    .allowUnknownOption()
    .action(async (opts: { full: boolean }) => {
      const ctx = createContext(program.opts<GlobalOptions>());
      process.exitCode = await runUninstall({ full: opts.full }, ctx);
    });
}
