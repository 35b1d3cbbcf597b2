// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import semver from 'semver';

/**
 * Strict SemVer 2.0: the string must be exactly what the parser reads back,
 * so loose forms such as `v1.2.3`, `=1.2.3` or padded strings do not count.
 */
export function isValidVersion(version: string): boolean {
  const parsed = semver.parse(version);
  if (parsed === null) {
    return false;
  }
  const build = parsed.build.length > 0 ? `+${parsed.build.join('.')}` : '';
  return `${parsed.version}${build}` === version;
}

/**
 * Precedence order: valid versions ascending by semver (build metadata breaks
 * ties), then unparsable versions in code-point order.
 */
export function compareVersions(a: string, b: string): number {
  const aValid = isValidVersion(a);
  const bValid = isValidVersion(b);

  if (aValid && bValid) {
    return semver.compareBuild(a, b);
  }
  if (aValid !== bValid) {
    return aValid ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortVersions(versions: Iterable<string>): string[] {
  return [...versions].sort(compareVersions);
}

/**
 * Highest valid semantic version, or undefined when none parses.
 */
export function selectLatest(versions: Iterable<string>): string | undefined {
  let latest: string | undefined;

  for (const version of versions) {
    if (!isValidVersion(version)) {
      continue;
    }
    if (latest === undefined || semver.compareBuild(version, latest) > 0) {
      latest = version;
    }
  }

  return latest;
}

export function unparsableVersions(versions: Iterable<string>): string[] {
  return [...versions].filter((version) => !isValidVersion(version));
}
