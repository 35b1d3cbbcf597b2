// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

/**
 * Where clients download a version from. Handed out as-is, never fetched.
 */
export interface DistRef {
  tarball?: string;
  shasum?: string;
}

export interface VersionRecord {
  version: string;
  /** Upstream author name, or the configured fallback author. Never empty. */
  author: string;
  dependencies: Record<string, string>;
  dist: DistRef;
  description?: string;
  displayName?: string;
  unity?: string;
  category?: string;
  hideInEditor?: boolean;
  license?: string;
  /** Upstream publish date, ISO 8601 */
  publishedAt?: string;
}

export interface PackageRecord {
  name: string;
  /** Keyed by version string. Consumers sort by semver precedence. */
  versions: Record<string, VersionRecord>;
  distTags: Record<string, string>;
  lastSynced: Date;
}

/**
 * A package as the remote catalog reports it, before normalization.
 */
export interface UpstreamVersion {
  version: string;
  author?: string | null;
  dependencies?: Record<string, string>;
  tarball?: string;
  shasum?: string;
  description?: string | null;
  displayName?: string | null;
  unity?: string | null;
  category?: string | null;
  hideInEditor?: boolean | null;
  license?: string | null;
  publishedAt?: string | null;
}

export interface UpstreamPackage {
  name: string;
  versions: UpstreamVersion[];
  distTags?: Record<string, string>;
}

/**
 * One package in the remote feed. `locator` is the provider's handle for
 * fetching the package's versions.
 */
export interface PackageIdentity {
  name: string;
  locator: string;
}
