/**
 * flakedesk Engine — Execution Context
 *
 * Everything a step, the uninstaller or the launcher needs, handed down
 * explicitly instead of read from globals.
 */

import { AppProfile, EngineEvent, InstallPaths, StepId } from "./types";
import { CommandRunner } from "./utils/command";
import { Logger } from "./utils/logger";

export interface EngineContext {
  profile: AppProfile;
  paths: InstallPaths;
  runner: CommandRunner;
  logger: Logger;
  /**
   * Environment passed to every command. Steps may extend it (the Nix step
   * prepends the Nix profile to PATH for the steps after it).
   */
  env: NodeJS.ProcessEnv;
  /** Name of the invoking user */
  user: string;
  verbose: boolean;
  emit: (event: EngineEvent) => void;
  /** uid a patched sandbox helper is owned by (root outside tests) */
  sandboxOwnerUid: number;
  /** Pause between actions; replaced by a no-op in tests */
  sleep: (ms: number) => Promise<void>;
}

export const realSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Variables that keep wrapped package managers from prompting.
 */
export const NON_INTERACTIVE_ENV: Record<string, string> = {
  DEBIAN_FRONTEND: "noninteractive",
  NPM_CONFIG_YES: "true",
  CI: "true",
  NIXPKGS_ALLOW_UNFREE: "1",
};

/**
 * Emit a progress event for a step.
 */
export function reportProgress(
  ctx: EngineContext,
  step: StepId,
  label: string,
  status: string,
): void {
  ctx.emit({ type: "progress", step, label, status });
}

/**
 * Line callback that forwards raw command output in verbose mode.
 */
export function outputForwarder(
  ctx: EngineContext,
  step: StepId,
): ((line: string) => void) | undefined {
  if (!ctx.verbose) return undefined;
  return (line) => ctx.emit({ type: "output", step, line });
}
