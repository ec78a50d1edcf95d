/**
 * flakedesk CLI — Tests
 *
 * Output formatting, confirmation replies, configuration loading, and the
 * command flows run against a fake engine.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import {
  DEFAULT_PROFILE,
  StepFailure,
  resolveInstallPaths,
  writeChecksumListing,
  type EngineEvent,
  type EngineEventHandler,
  type ExecutionResult,
  type InstallOptions,
  type LaunchResult,
  type PreflightProblem,
  type StepOutcome,
  type StepPlan,
  type SystemProbe,
  type SystemStatus,
  type UninstallAction,
  type UninstallOptions,
  type UninstallResult,
} from "@flakedesk/engine";
import { loadConfig, readConfigFile } from "../src/config";
import { CliContext, EngineApi } from "../src/context";
import { interpretAnswer } from "../src/prompt";
import { runInstall } from "../src/commands/install";
import { runUninstall } from "../src/commands/uninstall";
import { runLaunch } from "../src/commands/launch";
import { runStatus } from "../src/commands/status";
import { runVerify } from "../src/commands/verify";
import { runUnpack } from "../src/commands/unpack";
import { runBuild } from "../src/commands/build";
import {
  formatAction,
  formatBytes,
  formatDuration,
  formatErrorCategory,
  formatOutcome,
  formatPlanState,
  isDebugMode,
  printDebug,
  setDebugMode,
} from "../src/output";

const ANSI = /\u001b\[[0-9;]*m/g;

function plain(text: string): string {
  return text.replace(ANSI, "");
}

// ─── Console Capture ────────────────────────────────────────

let out: string[];
let err: string[];

beforeEach(() => {
  out = [];
  err = [];
  setDebugMode(false);
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    out.push(plain(args.map(String).join(" ")));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    err.push(plain(args.map(String).join(" ")));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Fake Engine ────────────────────────────────────────────

const PROBE: SystemProbe = {
  os: { id: "ubuntu", name: "Ubuntu", version_id: "22.04" },
  is_root: false,
  user: "tester",
  free_space_gb: 40,
  tools: {
    apt: true,
    dpkg: true,
    node: true,
    npm: true,
    docker: false,
    nix: false,
    gsettings: true,
    gio: true,
    gdbus: true,
    setfattr: false,
    "update-desktop-database": true,
    wmctrl: false,
    xdotool: false,
  },
};

const PLAN: StepPlan[] = [
  { step: "system-packages", title: "Development tools", severity: "fatal", state: "satisfied" },
  { step: "nix", title: "Nix package manager", severity: "fatal", state: "pending" },
  { step: "dock-pin", title: "Dock favorite", severity: "warn", state: "pending" },
];

class FakeEngine implements EngineApi {
  problems: PreflightProblem[] = [];
  events: EngineEvent[] = [];
  result: ExecutionResult = {
    execution_id: "run-1",
    final_state: "COMPLETED",
    started_at: "2026-01-01T00:00:00.000Z",
    finished_at: "2026-01-01T00:00:01.000Z",
    outcomes: [],
  };
  actions: UninstallAction[] = [];
  launchResult: LaunchResult = { status: "exited", exit_code: 0 };

  installCalls: InstallOptions[] = [];
  uninstallCalls: UninstallOptions[] = [];
  private handlers: EngineEventHandler[] = [];

  on(handler: EngineEventHandler): void {
    this.handlers.push(handler);
  }

  async preflight(): Promise<{ probe: SystemProbe; problems: PreflightProblem[] }> {
    return { probe: PROBE, problems: this.problems };
  }

  async plan(): Promise<StepPlan[]> {
    return PLAN;
  }

  async status(): Promise<SystemStatus> {
    return { probe: PROBE, problems: this.problems, steps: PLAN };
  }

  async install(options: InstallOptions = {}): Promise<ExecutionResult> {
    this.installCalls.push(options);
    for (const event of this.events) {
      for (const handler of this.handlers) handler(event);
    }
    return this.result;
  }

  async uninstall(options: UninstallOptions = {}): Promise<UninstallResult> {
    this.uninstallCalls.push(options);
    const full = options.full ?? false;
    const confirmed = full && options.confirmFull ? await options.confirmFull() : full;
    return {
      execution_id: "run-2",
      full,
      dependencies_removed: confirmed,
      actions: this.actions,
      started_at: "2026-01-01T00:00:00.000Z",
      finished_at: "2026-01-01T00:00:01.000Z",
    };
  }

  async launch(): Promise<LaunchResult> {
    return this.launchResult;
  }
}

interface Harness {
  ctx: CliContext;
  engine: FakeEngine;
  questions: string[];
}

/** Context whose prompt answers from `replies` in order */
function harness(replies: boolean[] = []): Harness {
  const engine = new FakeEngine();
  const questions: string[] = [];
  const ctx: CliContext = {
    config: {
      profile: DEFAULT_PROFILE,
      paths: resolveInstallPaths(DEFAULT_PROFILE, { home: "/home/tester" }),
      log_level: "silent",
    },
    engine,
    confirm: async (question) => {
      questions.push(question);
      return replies.shift() ?? false;
    },
  };
  return { ctx, engine, questions };
}

// ─── Output Formatting ──────────────────────────────────────

describe("output formatting", () => {
  const outcome = (status: StepOutcome["status"], message?: string): StepOutcome => ({
    step: "nix",
    title: "Nix package manager",
    status,
    message,
  });

  it("describes step outcomes", () => {
    expect(formatOutcome(outcome("done"))).toBe("Nix package manager");
    expect(formatOutcome(outcome("done", "Installed"))).toBe("Nix package manager: Installed");
    expect(formatOutcome(outcome("already_satisfied"))).toBe("Nix package manager (already done)");
    expect(formatOutcome(outcome("skipped", "no npx"))).toBe("Nix package manager skipped: no npx");
    expect(formatOutcome(outcome("warned"))).toBe("Nix package manager: completed with warnings");
  });

  it("describes uninstall actions and hides absent targets", () => {
    expect(formatAction({ target: "/a", status: "removed" })).toBe("Removed /a");
    expect(formatAction({ target: "/a", status: "removed", message: "Removed 2 line(s)" })).toBe(
      "Removed /a (Removed 2 line(s))",
    );
    expect(formatAction({ target: "/a", status: "reset" })).toBe("Reset permissions on /a");
    expect(formatAction({ target: "/a", status: "failed", message: "busy" })).toBe(
      "Could not remove /a: busy",
    );
    expect(formatAction({ target: "/a", status: "absent" })).toBeNull();
  });

  it("labels plan states", () => {
    expect(plain(formatPlanState("satisfied"))).toBe("done");
    expect(plain(formatPlanState("pending"))).toBe("to do");
    expect(plain(formatPlanState("skipped"))).toBe("skipped");
  });

  it("labels error categories", () => {
    expect(formatErrorCategory("SANDBOX_ERROR")).toBe("Sandbox setup failed");
    expect(formatErrorCategory("CONFIG_ERROR")).toBe("Invalid configuration");
  });

  it("formats sizes and durations", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(512)).toBe("512.0 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(3 * 1024 * 1024)).toBe("3.0 MB");
    expect(formatDuration(500)).toBe("500ms");
    expect(formatDuration(1500)).toBe("1.5s");
    expect(formatDuration(125_000)).toBe("2m 5s");
  });

  it("prints debug lines only in debug mode", () => {
    printDebug("hidden");
    setDebugMode(true);
    expect(isDebugMode()).toBe(true);
    printDebug("shown");
    expect(out).toEqual(["  [debug] shown"]);
  });
});

// ─── Prompt ─────────────────────────────────────────────────

describe("interpretAnswer", () => {
  it("declines only on n when defaulting to yes", () => {
    expect(interpretAnswer("", true)).toBe(true);
    expect(interpretAnswer("yes", true)).toBe(true);
    expect(interpretAnswer("maybe", true)).toBe(true);
    expect(interpretAnswer("n", true)).toBe(false);
    expect(interpretAnswer("No", true)).toBe(false);
  });

  it("accepts only on y when defaulting to no", () => {
    expect(interpretAnswer("", false)).toBe(false);
    expect(interpretAnswer("sure", false)).toBe(false);
    expect(interpretAnswer(" y", false)).toBe(true);
    expect(interpretAnswer("Yes please", false)).toBe(true);
  });
});

// ─── Install ────────────────────────────────────────────────

describe("runInstall", () => {
  it("lists pending steps and stops when the user declines", async () => {
    const { ctx, engine, questions } = harness([false]);

    expect(await runInstall({ yes: false, verbose: false }, ctx)).toBe(0);
    expect(questions).toEqual(["Continue with installation? [Y/n] "]);
    expect(engine.installCalls).toEqual([]);
    expect(out).toContain("ℹ Detected: Ubuntu 22.04");
    expect(out).toContain("  • Nix package manager");
    expect(out).not.toContain("  • Development tools");
    expect(out).toContain("ℹ Installation cancelled");
  });

  it("skips the prompt with --yes", async () => {
    const { ctx, engine, questions } = harness();

    expect(await runInstall({ yes: true, verbose: false }, ctx)).toBe(0);
    expect(questions).toEqual([]);
    expect(engine.installCalls).toEqual([{ verbose: false }]);
    expect(out).toContain("ℹ Auto-install mode enabled, proceeding with installation...");
    expect(out).toContain("  4. Or run from terminal: /usr/local/bin/claude-desktop");
  });

  it("stops on preflight problems", async () => {
    const { ctx, engine } = harness([true]);
    engine.problems = [
      {
        code: "running_as_root",
        message: "This installer should not be run as root.",
        hint: "Run it as a regular user. sudo is used when needed.",
      },
    ];

    expect(await runInstall({ yes: true, verbose: false }, ctx)).toBe(1);
    expect(err).toEqual(["✖ This installer should not be run as root."]);
    expect(out).toContain("ℹ Run it as a regular user. sudo is used when needed.");
    expect(engine.installCalls).toEqual([]);
  });

  it("prints each finished step and counts warnings", async () => {
    const { ctx, engine } = harness([true]);
    const outcomes: StepOutcome[] = [
      { step: "system-packages", title: "Development tools", status: "already_satisfied" },
      { step: "dock-pin", title: "Dock favorite", status: "warned", message: "gsettings failed" },
    ];
    engine.events = outcomes.map((outcome) => ({ type: "step_finish", outcome }));
    engine.result = { ...engine.result, outcomes };

    expect(await runInstall({ yes: false, verbose: false }, ctx)).toBe(0);
    expect(out).toContain("  ✔ Development tools (already done)");
    expect(out).toContain("  ⚠  Dock favorite: gsettings failed");
    expect(out).toContain("⚠  1 step(s) finished with warnings (see above)");
  });

  it("streams raw output in verbose mode", async () => {
    const { ctx, engine } = harness();
    engine.events = [{ type: "output", step: "application", line: "building '/nix/store/x.drv'..." }];

    await runInstall({ yes: true, verbose: true }, ctx);
    expect(engine.installCalls).toEqual([{ verbose: true }]);
    expect(out).toContain("building '/nix/store/x.drv'...");
  });

  it("reports a failed run with the tail of the nix output", async () => {
    const { ctx, engine } = harness();
    engine.result = {
      ...engine.result,
      final_state: "FAILED",
      error: {
        category: "SANDBOX_ERROR",
        message: "Could not find the chrome-sandbox binary in the Nix output.",
        step: "application",
        details: { build_output: "", run_output: "first\nerror: last\n" },
      },
    };

    expect(await runInstall({ yes: true, verbose: false }, ctx)).toBe(1);
    expect(err).toEqual([
      "✖ Sandbox setup failed: Could not find the chrome-sandbox binary in the Nix output.",
    ]);
    expect(out).toContain("ℹ Failed at step: application");
    expect(out.slice(-3)).toEqual([
      "  first",
      "  error: last",
      "ℹ Fix the problem above and run the installer again; finished steps are skipped.",
    ]);
  });
});

// ─── Uninstall ──────────────────────────────────────────────

describe("runUninstall", () => {
  it("does nothing unless the user answers yes", async () => {
    const { ctx, engine, questions } = harness([false]);

    expect(await runUninstall({ full: false }, ctx)).toBe(0);
    expect(questions).toEqual(["Continue with uninstallation? [y/N] "]);
    expect(engine.uninstallCalls).toEqual([]);
    expect(out).toContain("ℹ Uninstallation cancelled");
  });

  it("prints removed targets and hides absent ones", async () => {
    const { ctx, engine } = harness([true]);
    engine.actions = [
      { target: "/usr/local/bin/claude-desktop", status: "removed" },
      { target: "/home/tester/Desktop/mimeinfo.cache", status: "absent" },
      { target: "dash favorites", status: "failed", message: "gsettings failed" },
    ];

    expect(await runUninstall({ full: false }, ctx)).toBe(0);
    expect(out).toContain("  ✔ Removed /usr/local/bin/claude-desktop");
    expect(out).toContain("  ⚠  Could not remove dash favorites: gsettings failed");
    expect(out.some((line) => line.includes("mimeinfo.cache"))).toBe(false);
    expect(out).toContain("✔ Uninstallation completed!");
  });

  it("asks again before removing system dependencies", async () => {
    const { ctx, engine, questions } = harness([true, true]);

    await runUninstall({ full: true }, ctx);
    expect(engine.uninstallCalls[0].full).toBe(true);
    expect(questions).toEqual([
      "Continue with uninstallation? [y/N] ",
      "Are you sure you want to remove all system dependencies? [y/N] ",
    ]);
    expect(out).toContain("ℹ You may want to reboot to ensure all changes take effect");
  });

  it("keeps dependencies when the second answer is no", async () => {
    const { ctx } = harness([true, false]);

    await runUninstall({ full: true }, ctx);
    expect(out).toContain("ℹ Skipping system dependency removal");
    expect(out).not.toContain("ℹ You may want to reboot to ensure all changes take effect");
  });
});

// ─── Status & Launch ────────────────────────────────────────

describe("runStatus", () => {
  it("succeeds when nothing blocks installation", async () => {
    const { ctx } = harness();
    expect(await runStatus(ctx)).toBe(0);
    expect(out).toContain("  OS: Ubuntu 22.04");
    expect(out).toContain("  Free space: 40GB");
    expect(out).toContain("✔ System compatibility check passed");
  });

  it("fails with the preflight problems", async () => {
    const { ctx, engine } = harness();
    engine.problems = [{ code: "unknown_os", message: "Cannot determine the OS version." }];
    expect(await runStatus(ctx)).toBe(1);
    expect(err).toEqual(["✖ Cannot determine the OS version."]);
  });
});

describe("runLaunch", () => {
  it("reports an instance that was brought to the front", async () => {
    const { ctx, engine } = harness();
    engine.launchResult = { status: "already_running", exit_code: 0, activated: true };
    expect(await runLaunch(ctx)).toBe(0);
    expect(out).toEqual(["ℹ Claude Desktop is already running. Bringing to front..."]);
  });

  it("prints the remediation when the launch fails", async () => {
    const { ctx, engine } = harness();
    engine.launchResult = {
      status: "failed",
      exit_code: 1,
      sandbox_path: "/nix/store/x/chrome-sandbox",
      remediation: ["Please ensure chrome-sandbox has proper setuid permissions:", "  sudo chmod 4755 x"],
    };

    expect(await runLaunch(ctx)).toBe(1);
    expect(err).toEqual([
      "✖ Claude Desktop failed to launch with the chrome-sandbox.",
      "Please ensure chrome-sandbox has proper setuid permissions:",
      "  sudo chmod 4755 x",
    ]);
  });
});

// ─── Packaging Commands ─────────────────────────────────────

describe("packaging commands", () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "flakedesk-cli-"));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  function write(file: string, content: string): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }

  function createProject(): string {
    const root = path.join(tmp, "project");
    write(path.join(root, "package.json"), JSON.stringify({ name: "flakedesk", version: "2.0.1" }));
    write(path.join(root, "bin", "install"), "#!/bin/sh\necho install\n");
    write(path.join(root, "bin", "uninstall"), "#!/bin/sh\necho uninstall\n");
    write(path.join(root, "bin", "ensure-node"), "#!/bin/sh\nexit 0\n");
    write(path.join(root, "dist", "flakedesk.cjs"), "console.log('bundle');\n");
    write(path.join(root, "assets", "claude-ai-icon.svg"), "<svg>icon</svg>");
    write(path.join(root, "README.md"), "# flakedesk\n");
    return root;
  }

  it("verifies an intact release directory", async () => {
    write(path.join(tmp, "a.txt"), "alpha");
    write(path.join(tmp, "b.txt"), "beta");
    await writeChecksumListing(tmp);

    expect(await runVerify(tmp)).toBe(0);
    expect(out).toEqual(["  ✔ a.txt: OK", "  ✔ b.txt: OK", "✔ 2 file(s) verified"]);
  });

  it("fails verification on a changed or missing file", async () => {
    write(path.join(tmp, "a.txt"), "alpha");
    write(path.join(tmp, "b.txt"), "beta");
    await writeChecksumListing(tmp);
    write(path.join(tmp, "a.txt"), "tampered");
    fs.rmSync(path.join(tmp, "b.txt"));

    expect(await runVerify(tmp)).toBe(1);
    expect(out).toEqual(["  ✖ a.txt: FAILED", "  ✖ b.txt: missing"]);
    expect(err).toEqual(["✖ 2 of 2 file(s) failed verification"]);
  });

  it("reports a missing listing", async () => {
    expect(await runVerify(tmp)).toBe(1);
    expect(err).toEqual([`✖ Checksum listing not found: ${path.join(tmp, "checksums.sha256")}`]);
  });

  it("builds a release that verifies and unpacks", async () => {
    const root = createProject();

    expect(await runBuild({ root, iconFile: "claude-ai-icon.svg" })).toBe(0);
    expect(out).toContain("✔ Build completed successfully!");

    const releaseDir = path.join(root, "build", "release");
    expect(fs.readdirSync(releaseDir).sort()).toEqual([
      "checksums.sha256",
      "flakedesk-installer",
      "flakedesk-v2.0.1-source.tar.gz",
    ]);

    out = [];
    expect(await runVerify(releaseDir)).toBe(0);

    out = [];
    const dest = path.join(tmp, "payload");
    expect(await runUnpack(path.join(releaseDir, "flakedesk-installer"), dest)).toBe(0);
    expect(out).toEqual([
      `✔ Extracted to ${dest}`,
      "  • README.md",
      "  • assets",
      "  • bin",
      "  • dist",
    ]);
    expect(fs.readFileSync(path.join(dest, "assets", "claude-ai-icon.svg"), "utf-8")).toBe(
      "<svg>icon</svg>",
    );
  });

  it("takes an explicit version and output directory", async () => {
    const root = createProject();
    const outDir = path.join(tmp, "out");

    expect(await runBuild({ root, out: outDir, version: "9.9.9", iconFile: "claude-ai-icon.svg" })).toBe(0);
    expect(fs.existsSync(path.join(outDir, "release", "flakedesk-v9.9.9-source.tar.gz"))).toBe(true);
  });

  it("requires a version", async () => {
    const root = createProject();
    fs.rmSync(path.join(root, "package.json"));

    expect(await runBuild({ root, iconFile: "claude-ai-icon.svg" })).toBe(1);
    expect(err).toEqual(["✖ No version given and none found in package.json. Use --release-version <v>."]);
  });

  it("points at the bundle step when the bundle is missing", async () => {
    const root = createProject();
    fs.rmSync(path.join(root, "dist"), { recursive: true });

    expect(await runBuild({ root, iconFile: "claude-ai-icon.svg" })).toBe(1);
    expect(err).toEqual(["✖ Release file not found: dist/flakedesk.cjs"]);
    expect(out).toContain("ℹ Run npm run bundle first.");
  });

  it("rejects a file that is not an installer", async () => {
    write(path.join(tmp, "plain.sh"), "#!/bin/sh\necho hi\n");
    expect(await runUnpack(path.join(tmp, "plain.sh"), path.join(tmp, "dest"))).toBe(1);
    expect(err).toHaveLength(1);
  });
});

// ─── Configuration ──────────────────────────────────────────

describe("configuration", () => {
  let tmp: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "flakedesk-config-"));
    env = { FLAKEDESK_HOME: tmp };
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  function writeConfig(text: string): string {
    const file = path.join(tmp, "config.yaml");
    fs.writeFileSync(file, text);
    return file;
  }

  function configError(fn: () => unknown): StepFailure {
    try {
      fn();
    } catch (e: unknown) {
      if (e instanceof StepFailure) return e;
      throw e;
    }
    throw new Error("expected a configuration error");
  }

  it("uses the defaults without a config file", () => {
    const config = loadConfig({ env });
    expect(config.source).toBeUndefined();
    expect(config.log_level).toBe("silent");
    expect(config.profile).toEqual(DEFAULT_PROFILE);
  });

  it("overlays profile fields and paths from the file", () => {
    const file = writeConfig(
      [
        "profile:",
        "  launch_check_seconds: 0",
        "  companion: false",
        "paths:",
        "  home: /home/tester",
        "  bin_dir: /home/tester/.local/bin",
        "",
      ].join("\n"),
    );

    const config = loadConfig({ env });
    expect(config.source).toBe(file);
    expect(config.profile.launch_check_seconds).toBe(0);
    expect(config.profile.companion).toBeUndefined();
    expect(config.profile.flake).toBe(DEFAULT_PROFILE.flake);
    expect(config.paths.launcher).toBe("/home/tester/.local/bin/claude-desktop");
    expect(config.paths.menu_entry).toBe(
      "/home/tester/.local/share/applications/claude-desktop.desktop",
    );
  });

  it("treats an empty file as no settings", () => {
    writeConfig("");
    expect(loadConfig({ env }).profile).toEqual(DEFAULT_PROFILE);
  });

  it("lets the environment and --debug raise the log level", () => {
    writeConfig("log_level: info\n");
    expect(loadConfig({ env }).log_level).toBe("info");
    expect(loadConfig({ env: { ...env, FLAKEDESK_LOG_LEVEL: "warn" } }).log_level).toBe("warn");
    expect(loadConfig({ env: { ...env, FLAKEDESK_LOG_LEVEL: "loud" } }).log_level).toBe("info");
    expect(loadConfig({ env: { ...env, FLAKEDESK_LOG_LEVEL: "warn" }, debug: true }).log_level).toBe(
      "debug",
    );
  });

  it("requires an explicit config file to exist", () => {
    const missing = path.join(tmp, "missing.yaml");
    const failure = configError(() => loadConfig({ configPath: missing, env }));
    expect(failure.category).toBe("CONFIG_ERROR");
    expect(failure.message).toBe(`Config file not found: ${missing}`);
  });

  it("rejects unknown keys", () => {
    const file = writeConfig("colour: blue\n");
    expect(configError(() => readConfigFile(file)).message).toBe(
      `Invalid config ${file}: (root): Unrecognized key(s) in object: 'colour'`,
    );
  });

  it("names the path of an invalid value", () => {
    const file = writeConfig("profile:\n  launch_check_seconds: -1\n");
    expect(configError(() => readConfigFile(file)).message).toBe(
      `Invalid config ${file}: profile.launch_check_seconds: Number must be greater than or equal to 0`,
    );
  });

  it("reports unparseable YAML", () => {
    const file = writeConfig("profile: [unclosed\n");
    const failure = configError(() => readConfigFile(file));
    expect(failure.category).toBe("CONFIG_ERROR");
    expect(failure.message.startsWith(`Could not read ${file}: `)).toBe(true);
  });
});
