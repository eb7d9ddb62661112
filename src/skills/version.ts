// ── Version Ordering ────────────────────────────────────────────────────────
//
// Numeric dot segments with an optional "v" prefix and optional pre-release
// suffix after "-". Build metadata after "+" is ignored.

export interface ParsedVersion {
  readonly segments: readonly number[];
  readonly prerelease: readonly string[];
}

const VERSION_PATTERN = /^v?(\d+(?:\.\d+)*)(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/;

export function parseVersion(raw: string): ParsedVersion | null {
  const match = raw.trim().match(VERSION_PATTERN);
  if (!match) return null;

  return {
    segments: (match[1] ?? "").split(".").map((s) => Number.parseInt(s, 10)),
    prerelease: match[2] ? match[2].split(".") : [],
  };
}

function comparePrereleaseIdentifiers(a: string, b: string): number {
  const aNum = /^\d+$/.test(a);
  const bNum = /^\d+$/.test(b);
  if (aNum && bNum) return Math.sign(Number(a) - Number(b));
  if (aNum) return -1;
  if (bNum) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Three-way comparison: negative when `a` is older, positive when newer.
 * Missing segments count as 0 ("1.2" equals "1.2.0"); a pre-release sorts
 * before its release.
 *
 * @returns null when either side is not a recognizable version.
 */
export function compareVersions(a: string, b: string): number | null {
  const left = parseVersion(a);
  const right = parseVersion(b);
  if (!left || !right) return null;

  const length = Math.max(left.segments.length, right.segments.length);
  for (let i = 0; i < length; i++) {
    const diff = (left.segments[i] ?? 0) - (right.segments[i] ?? 0);
    if (diff !== 0) return Math.sign(diff);
  }

  if (left.prerelease.length === 0 || right.prerelease.length === 0) {
    return Math.sign(right.prerelease.length - left.prerelease.length);
  }

  const preLength = Math.max(left.prerelease.length, right.prerelease.length);
  for (let i = 0; i < preLength; i++) {
    const l = left.prerelease[i];
    const r = right.prerelease[i];
    if (l === undefined) return -1;
    if (r === undefined) return 1;
    const diff = comparePrereleaseIdentifiers(l, r);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function isVersionNewer(candidate: string, current: string): boolean {
  const result = compareVersions(candidate, current);
  return result !== null && result > 0;
}
