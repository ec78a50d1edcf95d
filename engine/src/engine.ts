/**
 * flakedesk Engine — Main Engine Class
 *
 * Orchestrates install, uninstall, status and launch for one application
 * profile:
 * 1. Probes the host and enforces the preflight gate
 * 2. Runs the fixed step sequence, each step gated by its own probe
 * 3. Removes the integration (and, when confirmed, the dependencies)
 *
 * The engine has NO UI logic. It never prompts and never exits the
 * process; it communicates via return values and event callbacks.
 * Nothing is persisted: state is whatever the live system shows.
 */

import * as crypto from "crypto";
import {
  EngineContext,
  NON_INTERACTIVE_ENV,
  realSleep,
} from "./context";
import { StepFailure, toExecutionError } from "./errors";
import { LaunchResult, launchApplication } from "./launch";
import { currentUser, evaluatePreflight, probeSystem } from "./linux/probe";
import { createInstallSteps } from "./steps";
import { runSteps } from "./steps/runner";
import {
  EngineEvent,
  EngineEventHandler,
  EngineOptions,
  ExecutionResult,
  InstallOptions,
  PreflightProblem,
  StepPlan,
  SystemProbe,
  SystemStatus,
  UninstallOptions,
  UninstallResult,
} from "./types";
import { removeDependencies, removeIntegration } from "./uninstall";
import { CommandRunner, createCommandRunner } from "./utils/command";
import { createLogger, Logger } from "./utils/logger";

/**
 * Replaceable collaborators. Tests substitute an in-process runner and a
 * no-op sleep.
 */
export interface EngineDependencies {
  runner?: CommandRunner;
  sleep?: (ms: number) => Promise<void>;
  user?: string;
  /** Base environment for commands (default process.env) */
  env?: NodeJS.ProcessEnv;
  osReleasePath?: string;
  /** Overrides the effective uid check */
  isRoot?: boolean;
  logger?: Logger;
  /** Owner expected on a patched sandbox helper (default 0) */
  sandboxOwnerUid?: number;
}

export class FlakeDeskEngine {
  private readonly logger: Logger;
  private readonly runner: CommandRunner;
  private readonly options: EngineOptions;
  private readonly deps: EngineDependencies;
  private eventHandlers: EngineEventHandler[] = [];

  constructor(options: EngineOptions, deps: EngineDependencies = {}) {
    this.options = options;
    this.deps = deps;
    this.logger = deps.logger ?? createLogger({ level: options.log_level });
    this.runner = deps.runner ?? createCommandRunner(this.logger);
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this for spinners and output.
   */
  on(handler: EngineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        // a broken handler must not abort an install halfway
        this.logger.debug(
          { event: event.type, error: err instanceof Error ? err.message : String(err) },
          "Event handler threw",
        );
      }
    }
  }

  /**
   * A fresh context per operation: the environment is copied so PATH
   * changes made by one run do not leak into the next.
   */
  private createContext(verbose = false): EngineContext {
    return {
      profile: this.options.profile,
      paths: this.options.paths,
      runner: this.runner,
      logger: this.logger,
      env: { ...(this.deps.env ?? process.env), ...NON_INTERACTIVE_ENV },
      user: this.deps.user ?? currentUser(),
      verbose,
      emit: (event) => this.emit(event),
      sandboxOwnerUid: this.deps.sandboxOwnerUid ?? 0,
      sleep: this.deps.sleep ?? realSleep,
    };
  }

  // ─── Queries ─────────────────────────────────────────────────

  async probe(): Promise<SystemProbe> {
    return probeSystem(this.createContext(), {
      osReleasePath: this.deps.osReleasePath,
      isRoot: this.deps.isRoot,
    });
  }

  async preflight(): Promise<{ probe: SystemProbe; problems: PreflightProblem[] }> {
    const probe = await this.probe();
    const problems = evaluatePreflight(probe, this.options.profile);
    for (const problem of problems) {
      this.logger.warn({ code: problem.code }, problem.message);
    }
    return { probe, problems };
  }

  /**
   * Probe every step without changing anything.
   */
  async plan(): Promise<StepPlan[]> {
    const ctx = this.createContext();
    const plan: StepPlan[] = [];

    for (const step of createInstallSteps(this.options.profile)) {
      const base = { step: step.id, title: step.title, severity: step.severity };
      try {
        const probe = await step.probe(ctx);
        plan.push({
          ...base,
          state: probe.skip ? "skipped" : probe.satisfied ? "satisfied" : "pending",
          detail: probe.skip ?? probe.detail,
        });
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        plan.push({ ...base, state: "skipped", detail: `Check failed: ${message}` });
      }
    }

    return plan;
  }

  async status(): Promise<SystemStatus> {
    const { probe, problems } = await this.preflight();
    return { probe, problems, steps: await this.plan() };
  }

  // ─── Core: Install ───────────────────────────────────────────

  /**
   * Run the preflight gate and then every install step in order.
   * Re-running after a failure resumes where it stopped: finished steps
   * report already_satisfied.
   */
  async install(options: InstallOptions = {}): Promise<ExecutionResult> {
    const executionId = crypto.randomUUID();
    const startedAt = new Date().toISOString();
    const finish = (
      result: Omit<ExecutionResult, "execution_id" | "started_at" | "finished_at">,
    ): ExecutionResult => ({
      execution_id: executionId,
      started_at: startedAt,
      finished_at: new Date().toISOString(),
      ...result,
    });

    this.logger.info(
      { app: this.options.profile.id, executionId },
      `Starting installation: ${this.options.profile.name}`,
    );

    const { problems } = await this.preflight();
    if (problems.length > 0) {
      const failure = new StepFailure(
        "PREFLIGHT_ERROR",
        problems.map((p) => p.message).join("; "),
        { details: { problems } },
      );
      return finish({
        final_state: "FAILED",
        outcomes: [],
        error: failure.toExecutionError(),
      });
    }

    const ctx = this.createContext(options.verbose ?? false);
    try {
      const { outcomes, failure } = await runSteps(createInstallSteps(this.options.profile), ctx);
      if (failure) {
        return finish({ final_state: "FAILED", outcomes, error: failure.toExecutionError() });
      }
      this.logger.info({ executionId }, "Installation completed");
      return finish({ final_state: "COMPLETED", outcomes });
    } catch (err: unknown) {
      this.logger.error({ executionId, error: String(err) }, "Installation aborted");
      return finish({ final_state: "FAILED", outcomes: [], error: toExecutionError(err) });
    }
  }

  // ─── Core: Uninstall ─────────────────────────────────────────

  /**
   * Remove the desktop integration; with `full`, also the system
   * dependencies, but only once `confirmFull` resolves true. Omitting
   * `confirmFull` means the caller has already confirmed.
   */
  async uninstall(options: UninstallOptions = {}): Promise<UninstallResult> {
    const executionId = crypto.randomUUID();
    const startedAt = new Date().toISOString();
    const ctx = this.createContext();
    const full = options.full ?? false;

    this.logger.info({ executionId, full }, "Starting uninstallation");
    const actions = await removeIntegration(ctx);

    let dependenciesRemoved = false;
    if (full) {
      const confirmed = options.confirmFull ? await options.confirmFull() : true;
      if (confirmed) {
        actions.push(...(await removeDependencies(ctx)));
        dependenciesRemoved = true;
      } else {
        this.logger.info("System dependency removal declined");
      }
    }

    return {
      execution_id: executionId,
      full,
      dependencies_removed: dependenciesRemoved,
      actions,
      started_at: startedAt,
      finished_at: new Date().toISOString(),
    };
  }

  // ─── Launch ──────────────────────────────────────────────────

  async launch(): Promise<LaunchResult> {
    return launchApplication(this.createContext());
  }
}
