/**
 * flakedesk CLI — Command Context
 *
 * What a command needs from the outside world. Commands receive it from a
 * factory so tests can substitute the engine and the prompt.
 */

import { FlakeDeskEngine } from "@flakedesk/engine";
import { CliConfig, getEngineOptions, loadConfig } from "./config";
import { setDebugMode } from "./output";
import { ConfirmFn, confirm } from "./prompt";

export type EngineApi = Pick<
  FlakeDeskEngine,
  "on" | "preflight" | "plan" | "install" | "uninstall" | "status" | "launch"
>;

export interface GlobalOptions {
  debug?: boolean;
  config?: string;
}

export interface CliContext {
  config: CliConfig;
  engine: EngineApi;
  confirm: ConfirmFn;
}

export type ContextFactory = (globals: GlobalOptions) => CliContext;

export const createCliContext: ContextFactory = (globals) => {
  setDebugMode(globals.debug ?? false);
  const config = loadConfig({ configPath: globals.config, debug: globals.debug });
  return {
    config,
    engine: new FlakeDeskEngine(getEngineOptions(config)),
    confirm,
  };
};
