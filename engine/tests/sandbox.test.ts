/**
 * flakedesk Engine — Sandbox Helper Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  extractPrivilegedPath,
  findBinary,
  findSetuidSandboxes,
  isPatched,
  isSetuid,
  locateSandboxBinary,
  patchSandboxBinary,
  permissionBits,
  resetSandboxPermissions,
} from "../src/sandbox";
import {
  OWN_UID,
  STORE_HASH,
  TestEnvironment,
  captureFailure,
  createTestContext,
  createTestEnvironment,
} from "./helpers/fake-system";

const ELECTRON_ERROR =
  "[12345:FATAL:setuid_sandbox_host.cc(158)] The SUID sandbox helper binary was found, " +
  "but is not configured correctly. Rather than run without sandboxing I'm aborting now. " +
  "You need to make sure that /nix/store/9xk2m1-electron-33.2.1/libexec/electron/chrome-sandbox " +
  "is owned by root and has mode 4755.";

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function touch(file: string, mode = 0o755): string {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, "bin");
  fs.chmodSync(file, mode);
  return file;
}

let env: TestEnvironment;

beforeEach(() => {
  env = createTestEnvironment();
});

afterEach(() => {
  env.cleanup();
});

describe("extractPrivilegedPath", () => {
  it("finds the helper path in Electron's error text", () => {
    expect(extractPrivilegedPath(ELECTRON_ERROR)).toBe(
      "/nix/store/9xk2m1-electron-33.2.1/libexec/electron/chrome-sandbox",
    );
  });

  it("stops at surrounding quotes", () => {
    const text = "chmod: '/nix/store/abc-e/libexec/electron/chrome-sandbox': Operation not permitted";
    expect(extractPrivilegedPath(text)).toBe("/nix/store/abc-e/libexec/electron/chrome-sandbox");
  });

  it("returns the first of several matches", () => {
    const text =
      "/nix/store/first-e/libexec/electron/chrome-sandbox\n" +
      "/nix/store/second-e/libexec/electron/chrome-sandbox\n";
    expect(extractPrivilegedPath(text)).toBe("/nix/store/first-e/libexec/electron/chrome-sandbox");
  });

  it("returns null when nothing matches", () => {
    expect(extractPrivilegedPath("error: flake has no app output")).toBeNull();
  });

  it("accepts a custom pattern", () => {
    expect(extractPrivilegedPath("see /opt/app/sandbox now", "/opt/[a-z]+/sandbox")).toBe(
      "/opt/app/sandbox",
    );
  });
});

describe("findBinary", () => {
  it("finds regular files by name, sorted, without following symlinks", () => {
    const root = path.join(env.root, "tree");
    const deep = touch(path.join(root, "a", "libexec", "electron", "chrome-sandbox"));
    const shallow = touch(path.join(root, "b", "chrome-sandbox"));
    fs.mkdirSync(path.join(root, "c", "chrome-sandbox"), { recursive: true });
    fs.symlinkSync(shallow, path.join(root, "chrome-sandbox"));

    expect(findBinary(root, "chrome-sandbox")).toEqual([deep, shallow]);
  });

  it("respects the depth limit", () => {
    const root = path.join(env.root, "tree");
    touch(path.join(root, "a", "libexec", "electron", "chrome-sandbox"));
    const shallow = touch(path.join(root, "b", "chrome-sandbox"));

    expect(findBinary(root, "chrome-sandbox", { maxDepth: 2 })).toEqual([shallow]);
  });

  it("returns nothing for a missing root", () => {
    expect(findBinary(path.join(env.root, "missing"), "chrome-sandbox")).toEqual([]);
  });
});

describe("permission checks", () => {
  it("recognises setuid and the patched mode", () => {
    const file = touch(path.join(env.root, "helper"), 0o4755);
    const stats = fs.statSync(file);
    expect(permissionBits(stats)).toBe(0o4755);
    expect(isSetuid(stats)).toBe(true);
    expect(isPatched(stats, OWN_UID)).toBe(true);
    expect(isPatched(stats, OWN_UID + 1)).toBe(false);
  });

  it("does not treat a plain executable as patched", () => {
    const stats = fs.statSync(touch(path.join(env.root, "helper")));
    expect(isSetuid(stats)).toBe(false);
    expect(isPatched(stats, OWN_UID)).toBe(false);
  });

  it("lists setuid helpers in the store", () => {
    const store = env.paths.nix_store;
    const patched = touch(path.join(store, "aaa-e", "libexec", "electron", "chrome-sandbox"), 0o4755);
    touch(path.join(store, "bbb-e", "libexec", "electron", "chrome-sandbox"));

    expect(findSetuidSandboxes(store, "chrome-sandbox")).toEqual([patched]);
  });
});

describe("patchSandboxBinary", () => {
  it("sets root ownership and mode 4755 through sudo", async () => {
    const file = touch(env.system.sandboxPath);
    await patchSandboxBinary(createTestContext(env), file);

    expect(env.system.commandLines()).toEqual([
      `sudo chown root:root ${file}`,
      `sudo chmod 4755 ${file}`,
    ]);
    expect(fs.statSync(file).mode & 0o7777).toBe(0o4755);
  });

  it("fails with a sandbox error when sudo is refused", async () => {
    const file = touch(env.system.sandboxPath);
    env.system.respond(
      (command, args) => command === "sudo" && args[0] === "chown",
      { exitCode: 1, stdout: "", stderr: "Operation not permitted" },
    );

    const failure = await captureFailure(patchSandboxBinary(createTestContext(env), file));
    expect(failure.category).toBe("SANDBOX_ERROR");
    expect(failure.step).toBe("application");
    expect(failure.message).toBe(
      `Failed to set proper permissions on ${file}: ` +
        `\`sudo chown root:root ${file}\` exited with code 1: Operation not permitted`,
    );
  });
});

describe("resetSandboxPermissions", () => {
  it("returns setuid helpers to mode 755", async () => {
    const file = touch(env.system.sandboxPath, 0o4755);
    const results = await resetSandboxPermissions(createTestContext(env));

    expect(results).toEqual([{ path: file, reset: true }]);
    expect(fs.statSync(file).mode & 0o7777).toBe(0o755);
  });

  it("reports helpers it could not reset", async () => {
    const file = touch(env.system.sandboxPath, 0o4755);
    env.system.respond((command, args) => command === "sudo" && args[0] === "chmod", {
      exitCode: 1,
      stdout: "",
      stderr: "denied",
    });

    expect(await resetSandboxPermissions(createTestContext(env))).toEqual([
      { path: file, reset: false },
    ]);
  });

  it("does nothing without a store", async () => {
    expect(await resetSandboxPermissions(createTestContext(env))).toEqual([]);
  });
});

describe("locateSandboxBinary", () => {
  beforeEach(() => {
    env.system.tools.add("nix");
    env.profile.sandbox_output_pattern =
      `${escapeRegex(env.paths.nix_store)}/[^/\\s'"]+/libexec/electron/chrome-sandbox`;
  });

  it("searches the build output first", async () => {
    const location = await locateSandboxBinary(createTestContext(env));
    expect(location).toEqual({ path: env.system.sandboxPath, source: "build-output" });
    expect(env.system.callsTo("nix").map((args) => args[0])).toEqual(["build"]);
  });

  it("passes the profile's flake and flags to nix build", async () => {
    await locateSandboxBinary(createTestContext(env));
    expect(env.system.callsTo("nix")[0]).toEqual([
      "build",
      "github:k3d3/claude-desktop-linux-flake",
      "--impure",
      "--extra-experimental-features",
      "nix-command",
      "--extra-experimental-features",
      "flakes",
      "--print-out-paths",
      "--no-link",
    ]);
  });

  it("falls back to the path named in the run output", async () => {
    env.system.respond((command, args) => command === "nix" && args[0] === "build", {
      exitCode: 1,
      stdout: "",
      stderr: "error: builder failed",
    });
    const helper = touch(env.system.sandboxPath);
    env.system.runResult = {
      exitCode: 1,
      stdout: "",
      stderr: `You need to make sure that ${helper} is owned by root and has mode 4755.`,
    };

    const location = await locateSandboxBinary(createTestContext(env));
    expect(location).toEqual({ path: helper, source: "run-output" });
  });

  it("fails when neither strategy finds the helper", async () => {
    env.system.respond((command, args) => command === "nix" && args[0] === "build", {
      exitCode: 1,
      stdout: "",
      stderr: "error: builder failed",
    });
    env.system.runResult = { exitCode: 1, stdout: "", stderr: "error: no sandbox here" };

    const failure = await captureFailure(locateSandboxBinary(createTestContext(env)));
    expect(failure.category).toBe("SANDBOX_ERROR");
    expect(failure.message).toBe(
      "Could not find the chrome-sandbox binary in the Nix output. " +
        "Claude Desktop may not have been built properly.",
    );
    expect(failure.details).toEqual({
      build_output: "error: builder failed",
      run_output: "error: no sandbox here",
    });
  });

  it("streams build progress", async () => {
    await locateSandboxBinary(createTestContext(env));
    expect(env.events).toContainEqual({
      type: "progress",
      step: "application",
      label: "Package Build",
      status: "Downloading dependencies (1 packages)...",
    });
    expect(path.basename(path.dirname(path.dirname(path.dirname(env.system.sandboxPath))))).toBe(
      STORE_HASH,
    );
  });
});
