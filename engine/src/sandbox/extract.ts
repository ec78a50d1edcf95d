/**
 * flakedesk Engine — Sandbox Path Extraction
 *
 * Pulls the setuid helper's store path out of free-form build or launch
 * output. This is a heuristic over third-party diagnostic text: the path
 * layout can change between upstream releases, so callers must verify the
 * file exists and keep the raw output for a human when it does not.
 */

import { DEFAULT_PROFILE } from "../profile";

/**
 * Return the first match of `pattern` in `rawOutput`, or null.
 *
 * @param pattern - regex source; defaults to the Electron helper layout
 *   `/nix/store/<hash>/libexec/electron/chrome-sandbox`
 */
export function extractPrivilegedPath(
  rawOutput: string,
  pattern: string = DEFAULT_PROFILE.sandbox_output_pattern,
): string | null {
  const match = new RegExp(pattern).exec(rawOutput);
  return match ? match[0] : null;
}
