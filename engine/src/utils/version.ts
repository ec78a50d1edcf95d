/**
 * flakedesk Engine — Version Comparison
 *
 * Compares dotted numeric versions as reported by /etc/os-release
 * ("20.04", "22.04.3") and by tools ("v20.11.1").
 *
 * This is intentionally NOT a semver implementation: pre-release tags are
 * ignored and missing components count as zero, which is all a distro
 * release check needs.
 */

/**
 * Strip a leading "v" and surrounding whitespace.
 *
 *   "v20.11.1" → "20.11.1"
 *   " 22.04 "  → "22.04"
 */
export function normalizeVersion(version: string): string {
  return version.trim().replace(/^[vV]/, "");
}

/**
 * Split a version into its numeric components.
 * Returns null when the leading part is not numeric.
 *
 *   "22.04.3"    → [22, 4, 3]
 *   "24.04 LTS"  → [24, 4]
 *   "1.2.3-rc1"  → [1, 2, 3]
 */
export function parseVersion(version: string): number[] | null {
  const match = normalizeVersion(version).match(/^\d+(?:\.\d+)*/);
  if (!match) return null;
  return match[0].split(".").map((part) => parseInt(part, 10));
}

/**
 * Compare two dotted versions.
 *
 * Returns -1 / 0 / 1, or null if either side cannot be parsed.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 | null {
  const pa = parseVersion(a);
  const pb = parseVersion(b);
  if (!pa || !pb) return null;

  const length = Math.max(pa.length, pb.length);
  for (let i = 0; i < length; i++) {
    const x = pa[i] ?? 0;
    const y = pb[i] ?? 0;
    if (x !== y) return x > y ? 1 : -1;
  }
  return 0;
}

/**
 * True when `version` is at least `minimum`. Unparseable input is treated
 * as not satisfying the minimum.
 */
export function isAtLeast(version: string, minimum: string): boolean {
  const cmp = compareVersions(version, minimum);
  return cmp !== null && cmp >= 0;
}
