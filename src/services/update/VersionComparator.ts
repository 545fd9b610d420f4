/**
 * Driver version comparison
 *
 * Versions are compared only on their embedded digit runs, so "580.105.08",
 * "580-105-8" and "v580.105.8" are all the same release.
 */

import type { VersionIdentifier } from '../../models/DriverState.js';

/**
 * Where latest stands relative to current
 */
export enum VersionComparison {
  NEWER = 'newer',
  EQUAL = 'equal',
  OLDER = 'older'
}

/**
 * Extract every maximal run of digits, in order, as an integer.
 * BigInt keeps very long runs exact.
 */
export function extractVersionComponents(version: VersionIdentifier): bigint[] {
  const runs = version.match(/\d+/g);
  if (!runs) {
    return [];
  }
  return runs.map(run => BigInt(run));
}

/**
 * Tuple ordering: first differing element decides, a strict prefix is smaller
 */
function compareComponents(a: readonly bigint[], b: readonly bigint[]): number {
  const length = Math.min(a.length, b.length);

  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined) break;
    if (left < right) return -1;
    if (left > right) return 1;
  }

  return Math.sign(a.length - b.length);
}

/**
 * Compare the latest published version against the installed one.
 *
 * Returns EQUAL when either side has no numeric component, so unparseable
 * input never triggers an update.
 */
export function compareVersions(
  current: VersionIdentifier,
  latest: VersionIdentifier
): VersionComparison {
  const currentParts = extractVersionComponents(current);
  const latestParts = extractVersionComponents(latest);

  if (currentParts.length === 0 || latestParts.length === 0) {
    return VersionComparison.EQUAL;
  }

  const order = compareComponents(latestParts, currentParts);
  if (order > 0) return VersionComparison.NEWER;
  if (order < 0) return VersionComparison.OLDER;
  return VersionComparison.EQUAL;
}
