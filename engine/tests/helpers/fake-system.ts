/**
 * flakedesk Engine — In-Process Fake System
 *
 * A CommandRunner that simulates the tools the installer drives (apt,
 * dpkg, sudo, nix, gsettings, ...) against a temporary directory tree.
 * State changes persist across calls, so an install followed by a second
 * install or an uninstall behaves like it would on a real host.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { EngineContext, NON_INTERACTIVE_ENV } from "../../src/context";
import { FlakeDeskEngine } from "../../src/engine";
import { StepFailure } from "../../src/errors";
import { DEFAULT_PROFILE, resolveInstallPaths } from "../../src/profile";
import { formatFavorites, parseFavorites } from "../../src/desktop/favorites";
import { AppProfile, EngineEvent, InstallPaths } from "../../src/types";
import { CommandResult, CommandRunner, RunOptions } from "../../src/utils/command";
import { createLogger } from "../../src/utils/logger";

export interface FakeCall {
  command: string;
  args: string[];
  input?: string;
}

type Override = {
  matches: (command: string, args: string[]) => boolean;
  result: CommandResult;
};

const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout, stderr: "" });
const fail = (exitCode: number, stderr = ""): CommandResult => ({ exitCode, stdout: "", stderr });

/** Tools present on a fresh Ubuntu desktop */
export const BASE_TOOLS = [
  "apt",
  "dpkg",
  "sudo",
  "gsettings",
  "gio",
  "gdbus",
  "update-desktop-database",
  "wmctrl",
];

export const STORE_HASH = "0a1b2c3d4e5f-claude-desktop-0.9.0";

export class FakeSystem implements CommandRunner {
  readonly calls: FakeCall[] = [];
  readonly tools = new Set<string>(BASE_TOOLS);
  readonly packages = new Set<string>();
  readonly groups = new Set<string>();
  favorites: string[] = ["firefox.desktop", "org.gnome.Nautilus.desktop"];
  /** Whether pgrep finds the application */
  running = false;
  /** nix run starts the application (used by the launch check) */
  launchStarts = true;
  /** Exit code and output of `nix run` */
  runResult: CommandResult = ok();
  /** The npx form that completes companion setup; others exit 1 */
  npxAccepts: "--no-interaction" | "--yes" | "input" | "none" = "--no-interaction";
  private readonly overrides: Override[] = [];

  constructor(
    readonly paths: InstallPaths,
    readonly profile: AppProfile,
  ) {}

  /** Answer matching calls with a fixed result */
  respond(matches: (command: string, args: string[]) => boolean, result: CommandResult): void {
    this.overrides.push({ matches, result });
  }

  clearOverrides(): void {
    this.overrides.length = 0;
  }

  callsTo(command: string): string[][] {
    return this.calls.filter((c) => c.command === command).map((c) => c.args);
  }

  /** Every call rendered as a command line */
  commandLines(): string[] {
    return this.calls.map((c) => [c.command, ...c.args].join(" "));
  }

  get sandboxPath(): string {
    return path.join(this.paths.nix_store, STORE_HASH, "libexec", "electron", this.profile.sandbox_binary);
  }

  get companionConfig(): string {
    return path.join(this.paths.home, this.profile.companion?.config_file ?? "companion.json");
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    this.calls.push({ command, args, input: options.input });

    const override = this.overrides.find((o) => o.matches(command, args));
    if (override) return override.result;

    switch (command) {
      case "sh":
        return this.shell(args[1] ?? "");
      case "sudo":
        return this.sudo(args[0] === "-E" ? args.slice(1) : args, options);
      case "dpkg":
        if (args[0] === "--print-architecture") return ok("amd64\n");
        return this.packages.has(args[1])
          ? ok(`Package: ${args[1]}\nStatus: install ok installed\n`)
          : fail(1, `dpkg-query: package '${args[1]}' is not installed`);
      case "lsb_release":
        return ok("jammy\n");
      case "nix":
        return this.nix(args, options);
      case "timeout":
        return this.nix(args.slice(2), options);
      case "pgrep":
        return this.running ? ok("4242\n") : fail(1);
      case "pkill":
        this.running = false;
        return ok();
      case "npx":
        return this.npx(args, options);
      case "gsettings":
        return this.gsettings(args);
      case "gdbus":
        return ok("(true, '')\n");
      case "gio":
      case "setfattr":
      case "nautilus":
      case "update-desktop-database":
      case "wmctrl":
      case "xdotool":
        return this.tools.has(command) ? ok() : fail(127, `${command}: not found`);
      default:
        return fail(127, `${command}: not found`);
    }
  }

  private shell(script: string): CommandResult {
    const probe = /^command -v (\S+)$/.exec(script);
    if (probe) {
      return this.tools.has(probe[1]) ? ok(`/usr/bin/${probe[1]}\n`) : fail(1);
    }
    if (script.includes("install.determinate.systems")) {
      this.tools.add("nix");
    }
    return ok();
  }

  private sudo(args: string[], options: RunOptions): CommandResult {
    const [command, ...rest] = args;
    switch (command) {
      case "apt-get":
        return this.apt(rest);
      case "chmod":
        fs.chmodSync(rest[1], parseInt(rest[0], 8));
        return ok();
      case "chown":
      case "mkdir":
        return ok();
      case "tee":
        fs.writeFileSync(rest[0], options.input ?? "");
        return ok();
      case "rm":
        fs.rmSync(rest[rest.length - 1], { recursive: true, force: true });
        return ok();
      case "usermod":
        this.groups.add(rest[1]);
        return ok();
      case "gpasswd":
        if (!this.groups.has(rest[2])) return fail(3, `gpasswd: user is not a member of '${rest[2]}'`);
        this.groups.delete(rest[2]);
        return ok();
      default:
        return fail(127, `sudo: ${command}: command not found`);
    }
  }

  private apt(args: string[]): CommandResult {
    const [verb, , ...packages] = args;
    if (verb === "update") return ok();
    for (const pkg of packages) {
      if (verb === "install") this.packages.add(pkg);
      else this.packages.delete(pkg);
    }
    const present = verb === "install";
    if (packages.includes("nodejs")) this.setTools(["node", "npm", "npx"], present);
    if (packages.includes("docker-ce")) this.setTools(["docker"], present);
    return ok();
  }

  private setTools(tools: string[], present: boolean): void {
    for (const tool of tools) {
      if (present) this.tools.add(tool);
      else this.tools.delete(tool);
    }
  }

  private nix(args: string[], options: RunOptions): CommandResult {
    if (!this.tools.has("nix")) return fail(127, "nix: not found");
    if (args[0] === "build") {
      fs.mkdirSync(path.dirname(this.sandboxPath), { recursive: true });
      if (!fs.existsSync(this.sandboxPath)) {
        fs.writeFileSync(this.sandboxPath, "sandbox");
        fs.chmodSync(this.sandboxPath, 0o755);
      }
      const out = path.join(this.paths.nix_store, STORE_HASH);
      options.onLine?.(`copying path '${out}' from 'https://cache.nixos.org'...`);
      return ok(`${out}\n`);
    }
    if (this.launchStarts) this.running = true;
    for (const line of this.runResult.stderr.split("\n")) {
      if (line) options.onLine?.(line);
    }
    return this.runResult;
  }

  private npx(args: string[], options: RunOptions): CommandResult {
    const accepted =
      this.npxAccepts === "input"
        ? options.input === "y\n"
        : this.npxAccepts !== "none" && args.includes(this.npxAccepts);
    if (!accepted) return fail(1, "prompt aborted");

    const key = this.profile.companion?.server_key ?? "companion";
    fs.mkdirSync(path.dirname(this.companionConfig), { recursive: true });
    fs.writeFileSync(
      this.companionConfig,
      JSON.stringify({ mcpServers: { [key]: { command: "npx" } } }),
    );
    return ok();
  }

  private gsettings(args: string[]): CommandResult {
    if (!this.tools.has("gsettings")) return fail(127, "gsettings: not found");
    if (args[0] === "get" && args[2] === "favorite-apps") {
      return ok(this.favorites.length > 0 ? `${formatFavorites(this.favorites)}\n` : "@as []\n");
    }
    if (args[0] === "set" && args[2] === "favorite-apps") {
      this.favorites = parseFavorites(args[3]);
    }
    return ok();
  }
}

// ─── Environment ──────────────────────────────────────────────

export interface TestEnvironment {
  root: string;
  profile: AppProfile;
  paths: InstallPaths;
  osReleasePath: string;
  system: FakeSystem;
  events: EngineEvent[];
  cleanup: () => void;
}

export const UBUNTU_2204 = `PRETTY_NAME="Ubuntu 22.04.4 LTS"
NAME="Ubuntu"
VERSION_ID="22.04"
ID=ubuntu
`;

export const TEST_ICON = "<svg>test-icon</svg>\n";

/**
 * A temporary host layout with a bundled icon and an Ubuntu 22.04
 * os-release file.
 */
export function createTestEnvironment(profile: Partial<AppProfile> = {}): TestEnvironment {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "flakedesk-test-"));
  const fullProfile: AppProfile = {
    ...DEFAULT_PROFILE,
    required_space_gb: 0,
    launch_check_seconds: 0,
    ...profile,
  };
  const paths = resolveInstallPaths(fullProfile, {
    home: path.join(root, "home"),
    bin_dir: path.join(root, "bin"),
    nix_root: path.join(root, "nix"),
    etc_dir: path.join(root, "etc"),
    assets_dir: path.join(root, "assets"),
  });
  fs.mkdirSync(paths.home, { recursive: true });
  fs.mkdirSync(paths.desktop_dir, { recursive: true });
  fs.mkdirSync(paths.assets_dir, { recursive: true });
  fs.writeFileSync(path.join(paths.assets_dir, fullProfile.icon_file), TEST_ICON);

  const osReleasePath = path.join(root, "os-release");
  fs.writeFileSync(osReleasePath, UBUNTU_2204);

  return {
    root,
    profile: fullProfile,
    paths,
    osReleasePath,
    system: new FakeSystem(paths, fullProfile),
    events: [],
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
}

/** uid the test process can give its own files */
export const OWN_UID = typeof process.getuid === "function" ? process.getuid() : 0;

export function createTestEngine(env: TestEnvironment, isRoot = false): FlakeDeskEngine {
  const engine = new FlakeDeskEngine(
    { profile: env.profile, paths: env.paths, log_level: "silent" },
    {
      runner: env.system,
      sleep: async () => {},
      user: "tester",
      env: { PATH: "/usr/bin:/bin", HOME: env.paths.home },
      osReleasePath: env.osReleasePath,
      isRoot,
      logger: createLogger({ level: "silent" }),
      sandboxOwnerUid: OWN_UID,
    },
  );
  engine.on((event) => env.events.push(event));
  return engine;
}

export function createTestContext(env: TestEnvironment, verbose = false): EngineContext {
  return {
    profile: env.profile,
    paths: env.paths,
    runner: env.system,
    logger: createLogger({ level: "silent" }),
    env: { PATH: "/usr/bin:/bin", HOME: env.paths.home, ...NON_INTERACTIVE_ENV },
    user: "tester",
    verbose,
    emit: (event) => env.events.push(event),
    sandboxOwnerUid: OWN_UID,
    sleep: async () => {},
  };
}

/**
 * Await a promise expected to reject with a StepFailure.
 */
export async function captureFailure(promise: Promise<unknown>): Promise<StepFailure> {
  try {
    await promise;
  } catch (err: unknown) {
    if (err instanceof StepFailure) return err;
    throw err;
  }
  throw new Error("Expected a StepFailure, but the promise resolved");
}
