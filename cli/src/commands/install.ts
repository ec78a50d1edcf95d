/**
 * flakedesk CLI -- Install Command
 *
 * Usage:
 *   flakedesk install               Ask, then install
 *   flakedesk install -y            Skip the confirmation (also --auto, --yes)
 *   flakedesk install --verbose     Stream full build output
 *
 * Output:
 *
 *   Claude Desktop Installer
 *
 *   ℹ Detected: Ubuntu 22.04
 *   ℹ This installer will:
 *     • Development tools
 *     • Nix package manager
 *     ...
 *   Continue with installation? [Y/n]
 *
 *     ✔ Development tools (already done)
 *     ✔ Node.js: Installed Node.js LTS
 *     ...
 *
 *   ✔ Installation completed in 8m 12s
 */

import { Command } from "commander";
import type { EngineEvent, ExecutionResult } from "@flakedesk/engine";
import { CliContext, ContextFactory, GlobalOptions, createCliContext } from "../context";
import {
  colors,
  createSpinner,
  formatDuration,
  formatErrorCategory,
  isDebugMode,
  printBlank,
  printBullet,
  printDebug,
  printError,
  printHeader,
  printInfo,
  printOutcome,
  printStageInfo,
  printSuccess,
  printWarn,
} from "../output";

export interface InstallCommandOptions {
  yes: boolean;
  verbose: boolean;
}

function printNextSteps(ctx: CliContext): void {
  const { profile, paths } = ctx.config;
  printInfo("Next steps:");
  console.log(`  1. Look for '${profile.name}' in your application menu`);
  console.log(`  2. Check your Dash (left sidebar) - ${profile.name} should be pinned there`);
  console.log(
    `  3. If not in Dash: Open Activities → search '${profile.name}' → right-click → 'Pin to Dash'`,
  );
  console.log(`  4. Or run from terminal: ${paths.launcher}`);
  console.log("  5. Desktop shortcut should be ready to use");
  printBlank();
  printInfo("Troubleshooting:");
  printBullet("If Dash doesn't update: Press Alt+F2, type 'r', press Enter to restart GNOME Shell");
  printBullet(`If Nix commands fail: run 'source ${paths.nix_daemon_profile}'`);
  printBullet(
    `If ${profile.name} shows sandbox errors: run 'flakedesk launch' for the exact path and commands`,
  );
  printBullet("If the desktop shortcut shows 'Untrusted': right-click and select 'Allow Launching'");
  printBullet("If Docker commands fail: you may need to log out and back in once");
}

function printFailure(result: ExecutionResult): void {
  const error = result.error;
  if (!error) return;
  printError(`${formatErrorCategory(error.category)}: ${error.message}`);
  if (error.step) printInfo(`Failed at step: ${colors.bold(error.step)}`);

  const output = error.details?.run_output ?? error.details?.build_output;
  if (typeof output === "string" && output.trim() !== "") {
    printInfo("Last output from nix:");
    for (const line of output.trim().split("\n").slice(-15)) {
      console.log(colors.dim(`  ${line}`));
    }
  }
  printInfo("Fix the problem above and run the installer again; finished steps are skipped.");
}

/**
 * @returns the process exit code
 */
export async function runInstall(
  opts: InstallCommandOptions,
  ctx: CliContext,
): Promise<number> {
  const { profile } = ctx.config;
  const verbose = opts.verbose || isDebugMode();

  printHeader(`${profile.name} Installer`);

  // 1. Preflight
  const { probe, problems } = await ctx.engine.preflight();
  if (probe.os) printInfo(`Detected: ${probe.os.name} ${probe.os.version_id}`);
  if (problems.length > 0) {
    for (const problem of problems) {
      printError(problem.message);
      if (problem.hint) printInfo(problem.hint);
    }
    return 1;
  }
  printSuccess("System compatibility check passed");

  // 2. Plan
  const plan = await ctx.engine.plan();
  const pending = plan.filter((step) => step.state === "pending");
  printBlank();
  if (pending.length === 0) {
    printInfo("Everything is already installed; the run will only re-check each step.");
  } else {
    printInfo("This installer will:");
    for (const step of pending) printBullet(step.title);
  }
  printBlank();

  if (verbose) {
    printInfo("Verbose mode enabled - full compilation output will be shown");
    printBlank();
  }

  // 3. Confirm
  if (opts.yes) {
    printInfo("Auto-install mode enabled, proceeding with installation...");
  } else if (!(await ctx.confirm("Continue with installation? [Y/n] ", true))) {
    printInfo("Installation cancelled");
    return 0;
  }
  printBlank();

  // 4. Progress display
  const spinner = createSpinner("Starting...");
  ctx.engine.on((event: EngineEvent) => {
    switch (event.type) {
      case "step_start":
        if (verbose) {
          printStageInfo(`${event.title}...`);
        } else {
          spinner.start(`${event.title}...`);
        }
        break;
      case "progress":
        if (!verbose) spinner.text = `${event.label}: ${event.status}`;
        break;
      case "output":
        if (verbose) console.log(colors.dim(event.line));
        break;
      case "step_finish":
        spinner.stop();
        printOutcome(event.outcome);
        break;
      case "log":
        printDebug(event.message);
        break;
    }
  });

  // 5. Install
  const startTime = Date.now();
  const result = await ctx.engine.install({ verbose });
  spinner.stop();
  const elapsed = Date.now() - startTime;
  printBlank();

  if (result.final_state === "FAILED") {
    printFailure(result);
    return 1;
  }

  const warned = result.outcomes.filter((o) => o.status === "warned").length;
  printSuccess(`Installation completed in ${formatDuration(elapsed)}`);
  if (warned > 0) printWarn(`${warned} step(s) finished with warnings (see above)`);
  printBlank();
  printNextSteps(ctx);
  return 0;
}

export function registerInstallCommand(
  program: Command,
  createContext: ContextFactory = createCliContext,
): void {
  program
    .command("install")
    .description("Install the application and integrate it with the desktop")
    .option("-y, --yes", "Skip the confirmation prompt", false)
    .option("--auto", "Same as --yes", false)
    .option("-v, --verbose", "Show full build output", false)
    .allowUnknownOption()
    .action(async (opts: { yes: boolean; auto: boolean; verbose: boolean }) => {
      const ctx = createContext(program.opts<GlobalOptions>());
      process.exitCode = await runInstall(
        { yes: opts.yes || opts.auto, verbose: opts.verbose },
        ctx,
      );
    });
}
