/**
 * flakedesk Engine — Launcher Script
 *
 * Shell wrapper installed on PATH and referenced by the desktop entry.
 * It must behave like `flakedesk launch` (see ../launch.ts) without
 * needing Node.js at launch time.
 */

import { nixArgs } from "../profile";
import { AppProfile, InstallPaths } from "../types";
import { shellQuote } from "../utils/command";

/**
 * Render the launcher:
 *   - activates the existing window and exits 0 when already running
 *   - otherwise runs the flake, and on failure prints the chown/chmod
 *     commands for the sandbox path found in the output, exiting 1
 */
export function renderLauncherScript(profile: AppProfile, paths: InstallPaths): string {
  const daemonProfile = shellQuote(paths.nix_daemon_profile);
  const windowClass = shellQuote(profile.window_class);
  const runCommand = ["nix", ...nixArgs(profile, "run")].map(shellQuote).join(" ");
  const running = profile.process_patterns
    .map((pattern) => `pgrep -f ${shellQuote(pattern)} > /dev/null`)
    .join(" || ");

  const binary = profile.sandbox_binary;
  // Perl syntax: the pattern is also a JavaScript RegExp (see extractPrivilegedPath)
  const grepPattern = shellQuote(profile.sandbox_output_pattern);

  return `#!/bin/bash
# ${profile.name} launcher

export NIXPKGS_ALLOW_UNFREE=1

cd "$HOME"

if [ -e ${daemonProfile} ]; then
    . ${daemonProfile}
fi

if ${running}; then
    echo "${profile.name} is already running. Bringing to front..."
    if command -v wmctrl > /dev/null 2>&1; then
        wmctrl -a ${windowClass} 2>/dev/null || true
    elif command -v xdotool > /dev/null 2>&1; then
        xdotool search --class ${windowClass} windowactivate 2>/dev/null || true
    fi
    exit 0
fi

nix_output=$(${runCommand} 2>&1)
nix_exit_code=$?

if [ $nix_exit_code -ne 0 ]; then
    echo "ERROR: ${profile.name} failed to launch with the ${binary}." >&2
    echo "The sandbox is required; ${profile.name} will not run without it." >&2
    echo "" >&2

    sandbox_path=$(echo "$nix_output" | grep -oP ${grepPattern} | head -1)

    if [ -n "$sandbox_path" ]; then
        echo "Please ensure ${binary} has proper setuid permissions:" >&2
        echo "  sudo chown root:root '$sandbox_path'" >&2
        echo "  sudo chmod 4755 '$sandbox_path'" >&2
    else
        echo "Please ensure ${binary} is properly installed with setuid permissions." >&2
        echo "Find the ${binary} location with:" >&2
        echo "  find ${paths.nix_store} -name '${binary}' -type f" >&2
        echo "Then set permissions with:" >&2
        echo "  sudo chown root:root <path-to-${binary}>" >&2
        echo "  sudo chmod 4755 <path-to-${binary}>" >&2
    fi

    exit 1
fi
`;
}

/**
 * Remediation text for a failed launch, shared by `flakedesk launch`.
 */
export function sandboxRemediation(
  profile: AppProfile,
  paths: InstallPaths,
  sandboxPath: string | null,
): string[] {
  const binary = profile.sandbox_binary;
  if (sandboxPath) {
    return [
      `Please ensure ${binary} has proper setuid permissions:`,
      `  sudo chown root:root '${sandboxPath}'`,
      `  sudo chmod 4755 '${sandboxPath}'`,
    ];
  }
  return [
    `Please ensure ${binary} is properly installed with setuid permissions.`,
    `Find the ${binary} location with:`,
    `  find ${paths.nix_store} -name '${binary}' -type f`,
    "Then set permissions with:",
    `  sudo chown root:root <path-to-${binary}>`,
    `  sudo chmod 4755 <path-to-${binary}>`,
  ];
}
