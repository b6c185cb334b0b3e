import semver, { type SemVer } from 'semver';
import { ok, fail, type Result } from '../errors.js';

export interface VersionComparison {
  aIsGreater: boolean;
  aIsPrerelease: boolean;
}

export const INITIAL_BASELINE_VERSION = '0.0.0';

/** Removes every leading `v`, so `vv1.0.0` and `v1.0.0` name the same version. */
export function stripTagPrefix(version: string): string {
  return version.trim().replace(/^v+/, '');
}

export function parseVersion(version: string): Result<SemVer> {
  const parsed = semver.parse(stripTagPrefix(version));
  if (!parsed) {
    return fail('INVALID_VERSION', `Invalid semantic version '${version}'`, { version });
  }
  return ok(parsed);
}

/**
 * Compares two version strings by semver precedence. A pre-release sorts
 * before the final release of the same major.minor.patch.
 */
export function compareVersions(a: string, b: string): Result<VersionComparison> {
  const left = parseVersion(a);
  if (!left.ok) return left;

  const right = parseVersion(b);
  if (!right.ok) return right;

  return ok({
    aIsGreater: semver.gt(left.value, right.value),
    aIsPrerelease: left.value.prerelease.length > 0,
  });
}

export function isPrerelease(version: string): boolean {
  const parsed = parseVersion(version);
  return parsed.ok && parsed.value.prerelease.length > 0;
}

export function toTagName(version: string): string {
  return `v${stripTagPrefix(version)}`;
}
