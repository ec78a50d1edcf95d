/**
 * flakedesk CLI — Configuration
 *
 * Central location for CLI paths and the user configuration file.
 * All flakedesk data lives under ~/.flakedesk (override: FLAKEDESK_HOME).
 *
 * ~/.flakedesk/config.yaml (optional) overlays the default application
 * profile and install paths:
 *
 *   log_level: info
 *   profile:
 *     flake: github:example/app-flake
 *     launch_check_seconds: 0
 *     companion: false
 *   paths:
 *     bin_dir: /home/me/.local/bin
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  AppProfile,
  DEFAULT_PROFILE,
  EngineOptions,
  InstallPaths,
  LogLevel,
  PathOverrides,
  StepFailure,
  resolveInstallPaths,
} from "@flakedesk/engine";

/** Root data directory: ~/.flakedesk */
export function flakedeskHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.FLAKEDESK_HOME || path.join(os.homedir(), ".flakedesk");
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(flakedeskHome(env), "config.yaml");
}

// ─── Schema ─────────────────────────────────────────────────

const LOG_LEVELS = ["silent", "debug", "info", "warn", "error"] as const;

const companionSchema = z.object({
  name: z.string().min(1),
  package: z.string().min(1),
  command: z.string().min(1),
  config_file: z.string().min(1),
  server_key: z.string().min(1),
});

const profileSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, "lowercase letters, digits, '.', '_' or '-'"),
    name: z.string().min(1),
    flake: z.string().min(1),
    nix_flags: z.array(z.string()),
    sandbox_binary: z.string().min(1),
    sandbox_output_pattern: z.string().min(1),
    process_patterns: z.array(z.string().min(1)).min(1),
    window_class: z.string().min(1),
    icon_file: z.string().min(1),
    icon_url: z.string().url().startsWith("https://"),
    desktop_entry: z.object({
      comment: z.string(),
      generic_name: z.string(),
      categories: z.array(z.string()),
      keywords: z.array(z.string()),
    }),
    companion: z.union([companionSchema, z.literal(false)]),
    launch_check_seconds: z.number().int().min(0),
    min_ubuntu_version: z.string().regex(/^\d+(\.\d+)*$/),
    required_space_gb: z.number().min(0),
  })
  .partial()
  .strict();

const pathsSchema = z
  .object({
    home: z.string().min(1),
    bin_dir: z.string().min(1),
    nix_root: z.string().min(1),
    etc_dir: z.string().min(1),
    assets_dir: z.string().min(1),
  })
  .partial()
  .strict();

export const configFileSchema = z
  .object({
    log_level: z.enum(LOG_LEVELS).optional(),
    profile: profileSchema.optional(),
    paths: pathsSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface CliConfig {
  profile: AppProfile;
  paths: InstallPaths;
  log_level: LogLevel;
  /** Config file that was read, if any */
  source?: string;
}

// ─── Loading ────────────────────────────────────────────────

/**
 * Read and validate a config file.
 *
 * @throws StepFailure (CONFIG_ERROR) for unreadable, malformed or invalid files
 */
export function readConfigFile(file: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(file, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new StepFailure("CONFIG_ERROR", `Could not read ${file}: ${msg}`);
  }

  // an empty file parses to null
  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StepFailure("CONFIG_ERROR", `Invalid config ${file}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Assets shipped beside the CLI bundle (dist/../assets in a release
 * payload, the repository's assets/ when run from source).
 */
export function bundledAssetsDir(): string | undefined {
  const candidates = [
    path.resolve(__dirname, "..", "assets"),
    path.resolve(__dirname, "..", "..", "assets"),
  ];
  return candidates.find((dir) => fs.existsSync(dir));
}

function applyProfile(base: AppProfile, overrides: ConfigFile["profile"]): AppProfile {
  if (!overrides) return base;
  const { companion, desktop_entry, ...rest } = overrides;
  return {
    ...base,
    ...rest,
    desktop_entry: desktop_entry ?? base.desktop_entry,
    companion: companion === false ? undefined : (companion ?? base.companion),
  };
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoadConfigOptions {
  /** Explicit --config file; must exist */
  configPath?: string;
  debug?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve profile, paths and log level from defaults, the config file and
 * the environment (in increasing precedence; --debug wins over all).
 */
export function loadConfig(options: LoadConfigOptions = {}): CliConfig {
  const env = options.env ?? process.env;
  const file = options.configPath ?? defaultConfigPath(env);

  let config: ConfigFile = {};
  let source: string | undefined;
  if (fs.existsSync(file)) {
    config = readConfigFile(file);
    source = file;
  } else if (options.configPath) {
    throw new StepFailure("CONFIG_ERROR", `Config file not found: ${file}`);
  }

  const profile = applyProfile(DEFAULT_PROFILE, config.profile);
  const overrides: PathOverrides = {
    assets_dir: bundledAssetsDir(),
    ...config.paths,
  };

  const envLevel = env.FLAKEDESK_LOG_LEVEL;
  let logLevel: LogLevel = config.log_level ?? "silent";
  if (isLogLevel(envLevel)) logLevel = envLevel;
  if (options.debug) logLevel = "debug";

  return {
    profile,
    paths: resolveInstallPaths(profile, overrides),
    log_level: logLevel,
    source,
  };
}

/**
 * Build EngineOptions from CLI configuration.
 */
export function getEngineOptions(config: CliConfig): EngineOptions {
  return {
    profile: config.profile,
    paths: config.paths,
    log_level: config.log_level,
  };
}
