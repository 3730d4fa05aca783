import type { Version } from "../types/kernel.js";

const ZERO: Version = [0, 0, 0];

/**
 * Parse a package or kernel version into a range-comparable triple.
 *
 * Everything from the first "-" on (the package revision) is dropped, then the
 * leading run of dot-separated digit groups is read as major.minor. Any further
 * component, numeric or not, is ignored and the patch slot is forced to 0, so
 * "6.15.9.hardened1", "6.15.2-1" and "6.15" all normalize to [6, 15, 0].
 * Input without a leading number yields [0, 0, 0].
 *
 * Exact-match checks must compare the raw strings instead of going through here.
 */
export function normalizeVersion(input: string): Version {
  const base = input.trim().split("-", 1)[0] ?? "";
  const match = /^\d+(?:\.\d+)*/.exec(base);
  if (!match) return ZERO;

  const [major, minor] = match[0].split(".").map((part) => Number.parseInt(part, 10));
  if (major === undefined || Number.isNaN(major)) return ZERO;
  return [major, minor ?? 0, 0];
}

/** Lexicographic triple ordering: negative, zero or positive like a sort comparator. */
export function compareVersions(a: Version, b: Version): number {
  for (let i = 0; i < 3; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/** Canonical text form; normalizeVersion(formatVersion(v)) equals v. */
export function formatVersion(version: Version): string {
  return version.join(".");
}

/** True iff min <= normalize(version) <= max under triple ordering. */
export function isWithinRange(version: string, min: string, max: string): boolean {
  const v = normalizeVersion(version);
  return compareVersions(normalizeVersion(min), v) <= 0 && compareVersions(v, normalizeVersion(max)) <= 0;
}
