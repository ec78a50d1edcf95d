/**
 * flakedesk Engine — Application Profile & Install Paths
 *
 * DEFAULT_PROFILE describes Claude Desktop built from the community flake.
 * The CLI overlays user configuration on top of it.
 */

import * as os from "os";
import * as path from "path";
import { AppProfile, InstallPaths } from "./types";

export const DEFAULT_PROFILE: AppProfile = {
  id: "claude-desktop",
  name: "Claude Desktop",
  flake: "github:k3d3/claude-desktop-linux-flake",
  nix_flags: [
    "--impure",
    "--extra-experimental-features",
    "nix-command",
    "--extra-experimental-features",
    "flakes",
  ],
  sandbox_binary: "chrome-sandbox",
  sandbox_output_pattern: "/nix/store/[^/\\s'\"]+/libexec/electron/chrome-sandbox",
  process_patterns: ["claude-desktop.*app.asar", "electron.*claude"],
  window_class: "Claude",
  icon_file: "claude-ai-icon.svg",
  desktop_entry: {
    comment: "Claude AI Desktop Application",
    generic_name: "AI Assistant",
    categories: ["Office", "Productivity"],
    keywords: ["AI", "Assistant", "Claude", "Anthropic"],
  },
  companion: {
    name: "Desktop Commander",
    package: "@wonderwhy-er/desktop-commander@latest",
    command: "setup",
    config_file: ".config/Claude/claude_desktop_config.json",
    server_key: "desktop-commander",
  },
  launch_check_seconds: 15,
  min_ubuntu_version: "20.04",
  required_space_gb: 5,
};

export interface PathOverrides {
  home?: string;
  /** Directory the launcher is written to (default /usr/local/bin) */
  bin_dir?: string;
  /** Root of the Nix installation (default /nix) */
  nix_root?: string;
  /** System configuration directory (default /etc) */
  etc_dir?: string;
  assets_dir?: string;
}

/**
 * Derive every filesystem location the installer touches.
 */
export function resolveInstallPaths(
  profile: AppProfile,
  overrides: PathOverrides = {},
): InstallPaths {
  const home = overrides.home ?? os.homedir();
  const binDir = overrides.bin_dir ?? "/usr/local/bin";
  const nixRoot = overrides.nix_root ?? "/nix";
  const etcDir = overrides.etc_dir ?? "/etc";

  const iconDir = path.join(home, ".local", "share", "icons");
  const applicationsDir = path.join(home, ".local", "share", "applications");
  const desktopDir = path.join(home, "Desktop");
  const entryName = `${profile.id}.desktop`;

  return {
    home,
    launcher: path.join(binDir, profile.id),
    icon_dir: iconDir,
    icon: path.join(iconDir, profile.icon_file),
    applications_dir: applicationsDir,
    menu_entry: path.join(applicationsDir, entryName),
    desktop_dir: desktopDir,
    desktop_copy: path.join(desktopDir, entryName),
    desktop_mime_cache: path.join(desktopDir, "mimeinfo.cache"),
    nix_store: path.join(nixRoot, "store"),
    nix_root: nixRoot,
    nix_daemon_profile: path.join(
      nixRoot,
      "var",
      "nix",
      "profiles",
      "default",
      "etc",
      "profile.d",
      "nix-daemon.sh",
    ),
    nix_user_profile: path.join(home, ".nix-profile", "etc", "profile.d", "nix.sh"),
    nix_system_files: [
      path.join(etcDir, "profile.d", "nix.sh"),
      path.join(etcDir, "bash.bashrc.backup-before-nix"),
      path.join(etcDir, "zshrc.backup-before-nix"),
    ],
    nix_user_dirs: [
      path.join(home, ".nix-profile"),
      path.join(home, ".nix-defexpr"),
      path.join(home, ".nix-channels"),
    ],
    shell_profiles: [
      path.join(home, ".profile"),
      path.join(home, ".bashrc"),
      path.join(home, ".zshrc"),
    ],
    apt_sources_dir: path.join(etcDir, "apt", "sources.list.d"),
    apt_keyrings_dir: path.join(etcDir, "apt", "keyrings"),
    assets_dir: overrides.assets_dir ?? path.join(home, ".local", "share", "flakedesk", "assets"),
  };
}

/**
 * The `.desktop` identifier GNOME uses in its favourites list.
 */
export function desktopEntryId(profile: AppProfile): string {
  return `${profile.id}.desktop`;
}

/**
 * Arguments for `nix <verb> <flake> <flags...>`.
 */
export function nixArgs(
  profile: AppProfile,
  verb: "build" | "run",
  extra: string[] = [],
): string[] {
  return [verb, profile.flake, ...profile.nix_flags, ...extra];
}
