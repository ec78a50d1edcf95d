/**
 * flakedesk CLI -- Launch Command
 *
 * Same behaviour as the installed launcher script.
 */

import { Command } from "commander";
import { CliContext, ContextFactory, GlobalOptions, createCliContext } from "../context";
import { printBlank, printError, printInfo } from "../output";

export async function runLaunch(ctx: CliContext): Promise<number> {
  const name = ctx.config.profile.name;
  const result = await ctx.engine.launch();

  switch (result.status) {
    case "already_running":
      printInfo(`${name} is already running. Bringing to front...`);
      return 0;
    case "exited":
      return 0;
    case "failed":
      printError(`${name} failed to launch with the ${ctx.config.profile.sandbox_binary}.`);
      printBlank();
      for (const line of result.remediation ?? []) console.error(line);
      return result.exit_code;
  }
}

export function registerLaunchCommand(
  program: Command,
  createContext: ContextFactory = createCliContext,
): void {
  program
    .command("launch")
    .description("Start the application, or focus it if already running")
    .action(async () => {
      const ctx = createContext(program.opts<GlobalOptions>());
      process.exitCode = await runLaunch(ctx);
    });
}
