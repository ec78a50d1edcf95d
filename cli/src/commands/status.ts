/**
 * flakedesk CLI -- Status Command
 *
 * Shows what the prober sees and what each install step would do.
 * Read-only.
 */

import { Command } from "commander";
import { PROBED_TOOLS } from "@flakedesk/engine";
import { CliContext, ContextFactory, GlobalOptions, createCliContext } from "../context";
import {
  colors,
  formatPlanState,
  printBlank,
  printDetail,
  printError,
  printHeader,
  printSuccess,
  printTable,
} from "../output";

export async function runStatus(ctx: CliContext): Promise<number> {
  const { probe, problems, steps } = await ctx.engine.status();

  printHeader(`${ctx.config.profile.name} Status`);
  printDetail("OS", probe.os ? `${probe.os.name} ${probe.os.version_id}` : "unknown");
  printDetail("User", probe.user);
  printDetail(
    "Free space",
    probe.free_space_gb === null ? "unknown" : `${probe.free_space_gb}GB`,
  );
  if (ctx.config.source) printDetail("Config", ctx.config.source);
  printBlank();

  printTable({
    head: ["Tool", "Available"],
    rows: PROBED_TOOLS.map((tool) => [
      tool,
      probe.tools[tool] ? colors.success("yes") : colors.dim("no"),
    ]),
  });
  printBlank();

  printTable({
    head: ["Step", "State", "Detail"],
    rows: steps.map((step) => [step.title, formatPlanState(step.state), step.detail ?? ""]),
  });
  printBlank();

  if (problems.length > 0) {
    for (const problem of problems) printError(problem.message);
    return 1;
  }
  printSuccess("System compatibility check passed");
  return 0;
}

export function registerStatusCommand(
  program: Command,
  createContext: ContextFactory = createCliContext,
): void {
  program
    .command("status")
    .description("Show system readiness and installation state")
    .action(async () => {
      const ctx = createContext(program.opts<GlobalOptions>());
      process.exitCode = await runStatus(ctx);
    });
}
