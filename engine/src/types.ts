/**
 * flakedesk Engine — Core Type Definitions
 *
 * Shared by every engine module and re-exported to the CLI through the
 * package barrel. Nothing in here is persisted: every status value is
 * recomputed from the live system on each run.
 */

// ─── Application Profile ─────────────────────────────────────────

export interface CompanionSpec {
  /** Human-readable name, used in logs and the install plan */
  name: string;
  /** npm package executed through npx */
  package: string;
  /** Sub-command passed to the package (e.g. "setup") */
  command: string;
  /** Application config file the companion registers itself in */
  config_file: string;
  /** Key expected under `mcpServers` once setup succeeded */
  server_key: string;
}

export interface DesktopEntrySpec {
  comment: string;
  generic_name: string;
  categories: string[];
  keywords: string[];
}

export interface AppProfile {
  /** Identifier used for the launcher and the .desktop file name */
  id: string;
  /** Display name */
  name: string;
  /** Flake reference passed to `nix build` / `nix run` */
  flake: string;
  /** Extra flags for every nix invocation */
  nix_flags: string[];
  /** File name of the setuid helper inside the built package */
  sandbox_binary: string;
  /** Regex source matching the helper's store path in console output */
  sandbox_output_pattern: string;
  /** `pgrep -f` patterns identifying a running instance */
  process_patterns: string[];
  /** X11 window class, used for window activation and StartupWMClass */
  window_class: string;
  /** Icon file name under ~/.local/share/icons */
  icon_file: string;
  /** Remote icon used when no bundled asset exists */
  icon_url?: string;
  desktop_entry: DesktopEntrySpec;
  companion?: CompanionSpec;
  /** Seconds to let the application start during install verification (0 disables) */
  launch_check_seconds: number;
  /** Minimum supported Ubuntu release */
  min_ubuntu_version: string;
  /** Free space required in the home directory, in GiB */
  required_space_gb: number;
}

// ─── Install Paths ───────────────────────────────────────────────

export interface InstallPaths {
  home: string;
  /** Launcher wrapper, e.g. /usr/local/bin/<id> */
  launcher: string;
  icon_dir: string;
  icon: string;
  applications_dir: string;
  menu_entry: string;
  desktop_dir: string;
  desktop_copy: string;
  /** Artifact some desktop tools leave on the desktop */
  desktop_mime_cache: string;
  /** Root searched for setuid helpers */
  nix_store: string;
  nix_root: string;
  nix_daemon_profile: string;
  nix_user_profile: string;
  nix_system_files: string[];
  nix_user_dirs: string[];
  shell_profiles: string[];
  apt_sources_dir: string;
  apt_keyrings_dir: string;
  /** Directory holding bundled assets (icon) */
  assets_dir: string;
}

// ─── System Probe ────────────────────────────────────────────────

export interface OsRelease {
  id: string;
  name: string;
  version_id: string;
}

export type ProbedTool =
  | "apt"
  | "dpkg"
  | "node"
  | "npm"
  | "docker"
  | "nix"
  | "gsettings"
  | "gio"
  | "gdbus"
  | "setfattr"
  | "update-desktop-database"
  | "wmctrl"
  | "xdotool";

export interface SystemProbe {
  os: OsRelease | null;
  is_root: boolean;
  user: string;
  /** Free space in the home directory in whole GiB, null when unknown */
  free_space_gb: number | null;
  tools: Record<ProbedTool, boolean>;
}

export interface PreflightProblem {
  code:
    | "running_as_root"
    | "missing_apt"
    | "unknown_os"
    | "unsupported_version"
    | "insufficient_space";
  message: string;
  hint?: string;
}

// ─── Steps ───────────────────────────────────────────────────────

export type StepId =
  | "system-packages"
  | "nodejs"
  | "docker"
  | "nix"
  | "application"
  | "companion"
  | "icon"
  | "launcher"
  | "desktop-entry"
  | "dock-pin";

export type StepSeverity = "fatal" | "warn";

export interface StepProbe {
  satisfied: boolean;
  /** Short description of what was found */
  detail?: string;
  /** When set, the step is skipped with this reason */
  skip?: string;
}

export type StepStatus = "done" | "already_satisfied" | "skipped" | "warned";

export interface StepOutcome {
  step: StepId;
  title: string;
  status: StepStatus;
  message?: string;
}

export interface StepPlan {
  step: StepId;
  title: string;
  severity: StepSeverity;
  /** pending: perform() would run */
  state: "satisfied" | "pending" | "skipped";
  detail?: string;
}

// ─── Errors & Results ────────────────────────────────────────────

export type ErrorCategory =
  | "PREFLIGHT_ERROR"
  | "PERMISSION_ERROR"
  | "PACKAGE_ERROR"
  | "PROVISION_ERROR"
  | "SANDBOX_ERROR"
  | "INTEGRATION_ERROR"
  | "ARCHIVE_ERROR"
  | "CONFIG_ERROR";

export interface ExecutionError {
  category: ErrorCategory;
  message: string;
  step?: StepId;
  details?: Record<string, unknown>;
}

export type FinalState = "COMPLETED" | "FAILED";

export interface ExecutionResult {
  execution_id: string;
  final_state: FinalState;
  started_at: string;
  finished_at: string;
  outcomes: StepOutcome[];
  error?: ExecutionError;
}

export interface SystemStatus {
  probe: SystemProbe;
  problems: PreflightProblem[];
  steps: StepPlan[];
}

export interface UninstallAction {
  target: string;
  /** removed: the target existed and is gone; absent: nothing to do */
  status: "removed" | "absent" | "reset" | "failed";
  message?: string;
}

export interface UninstallResult {
  execution_id: string;
  full: boolean;
  /** False when a full uninstall was requested but not confirmed */
  dependencies_removed: boolean;
  actions: UninstallAction[];
  started_at: string;
  finished_at: string;
}

// ─── Engine Options ──────────────────────────────────────────────

export interface EngineOptions {
  profile: AppProfile;
  paths: InstallPaths;
  /** Minimum log level for the structured logger */
  log_level: "silent" | "debug" | "info" | "warn" | "error";
}

export interface InstallOptions {
  /** Forward raw build output as `output` events */
  verbose?: boolean;
}

export interface UninstallOptions {
  full?: boolean;
  /** Second confirmation, asked before system packages are removed */
  confirmFull?: () => Promise<boolean>;
}

// ─── Engine Events ───────────────────────────────────────────────

export type EngineEvent =
  | { type: "step_start"; step: StepId; title: string }
  | { type: "step_finish"; outcome: StepOutcome }
  | { type: "progress"; step: StepId; label: string; status: string }
  | { type: "output"; step: StepId; line: string }
  | { type: "log"; level: "info" | "warn"; message: string };

export type EngineEventHandler = (event: EngineEvent) => void;
