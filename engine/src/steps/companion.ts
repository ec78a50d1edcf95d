/**
 * flakedesk Engine — Companion Tool Step
 *
 * Runs the companion's npx setup. Its interactive prompt has changed
 * between releases, so the non-interactive forms are tried in turn.
 * Done once the companion has registered itself in the application's
 * config file.
 */

import * as fs from "fs";
import * as path from "path";
import { EngineContext } from "../context";
import { StepFailure } from "../errors";
import { CompanionSpec, StepProbe } from "../types";
import { commandExists } from "../utils/command";
import { runAlternatives } from "../utils/fallback";
import { BaseStep } from "./base-step";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * True when `mcpServers[serverKey]` exists in the config file.
 * A missing or malformed file counts as not registered.
 */
export function isCompanionRegistered(configPath: string, serverKey: string): boolean {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch {
    return false;
  }
  if (!isRecord(parsed)) return false;
  const servers = parsed.mcpServers;
  return isRecord(servers) && serverKey in servers;
}

export interface CompanionStepOptions {
  /** An earlier step installs Node.js, so a missing npx is expected */
  npxFromEarlierStep?: boolean;
}

export class CompanionStep extends BaseStep {
  readonly id = "companion";
  readonly category = "PACKAGE_ERROR";
  readonly title: string;

  constructor(
    private readonly companion: CompanionSpec | undefined,
    private readonly options: CompanionStepOptions = {},
  ) {
    super();
    this.title = companion ? companion.name : "Companion tool";
  }

  private configPath(ctx: EngineContext, companion: CompanionSpec): string {
    return path.join(ctx.paths.home, companion.config_file);
  }

  async probe(ctx: EngineContext): Promise<StepProbe> {
    const companion = this.companion;
    if (!companion) return { satisfied: false, skip: "No companion tool configured" };

    if (isCompanionRegistered(this.configPath(ctx, companion), companion.server_key)) {
      return { satisfied: true, detail: `${companion.server_key} registered` };
    }
    if (!(await commandExists(ctx.runner, "npx", ctx.env))) {
      if (!this.options.npxFromEarlierStep) throw new Error("npx is not available");
      return { satisfied: false, detail: "npx not available yet; installed with Node.js" };
    }
    return { satisfied: false, detail: `${companion.server_key} not registered` };
  }

  async perform(ctx: EngineContext) {
    const companion = this.companion;
    if (!companion) return;

    if (!(await commandExists(ctx.runner, "npx", ctx.env))) {
      throw new StepFailure("PACKAGE_ERROR", "npx is not available", { step: this.id });
    }

    const args = ["-y", companion.package, companion.command];
    const npx = (extra: string[], input?: string) => () =>
      ctx.runner.run("npx", [...args, ...extra], { env: ctx.env, input });

    const result = await runAlternatives(
      [
        { label: "--no-interaction", run: npx(["--no-interaction"]) },
        { label: "--yes", run: npx(["--yes"]) },
        { label: "answer y", run: npx([], "y\n") },
      ],
      { label: `${companion.name} setup`, logger: ctx.logger },
    );

    if (!result.ok) {
      throw new StepFailure("PACKAGE_ERROR", `${companion.name} setup failed`, {
        step: this.id,
        details: { attempts: result.attempts },
      });
    }
    return { message: `${companion.name} installed` };
  }
}
