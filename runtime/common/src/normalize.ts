// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { EmptyPackageError } from './errors';
import { PackageRecord, UpstreamPackage, UpstreamVersion, VersionRecord } from './types';
import { selectLatest, sortVersions } from './versions';

export interface NormalizeOptions {
  fallbackAuthor: string;
  syncedAt: Date;
}

const OPTIONAL_STRING_FIELDS = [
  'description',
  'displayName',
  'unity',
  'category',
  'license',
  'publishedAt',
] as const;

/**
 * Turns upstream metadata into the stored record. The result replaces any
 * previous record for the package wholesale.
 */
export function normalizePackage(upstream: UpstreamPackage, options: NormalizeOptions): PackageRecord {
  const byVersion = new Map<string, UpstreamVersion>();
  for (const version of upstream.versions) {
    if (!byVersion.has(version.version)) {
      byVersion.set(version.version, version);
    }
  }

  if (byVersion.size === 0) {
    throw new EmptyPackageError(upstream.name);
  }

  const versions: Record<string, VersionRecord> = {};
  for (const version of sortVersions(byVersion.keys())) {
    const source = byVersion.get(version);
    if (source) {
      versions[version] = normalizeVersion(source, options.fallbackAuthor);
    }
  }

  return {
    name: upstream.name,
    versions,
    distTags: buildDistTags(Object.keys(versions), upstream.distTags),
    lastSynced: options.syncedAt,
  };
}

export function normalizeVersion(upstream: UpstreamVersion, fallbackAuthor: string): VersionRecord {
  const record: VersionRecord = {
    version: upstream.version,
    author: resolveAuthor(upstream.author, fallbackAuthor),
    dependencies: { ...(upstream.dependencies ?? {}) },
    dist: {},
  };

  if (upstream.tarball != null) {
    record.dist.tarball = upstream.tarball;
  }
  if (upstream.shasum != null) {
    record.dist.shasum = upstream.shasum;
  }

  for (const field of OPTIONAL_STRING_FIELDS) {
    const value = upstream[field];
    if (value != null) {
      record[field] = value;
    }
  }

  if (upstream.hideInEditor != null) {
    record.hideInEditor = upstream.hideInEditor;
  }

  return record;
}

export function resolveAuthor(author: string | null | undefined, fallbackAuthor: string): string {
  if (author == null || author.trim() === '') {
    return fallbackAuthor;
  }
  return author;
}

/**
 * `latest` is always recomputed; other tags survive only while they point at
 * a version that is still present.
 */
export function buildDistTags(
  versions: string[],
  upstreamTags: Record<string, string> = {},
): Record<string, string> {
  const present = new Set(versions);
  const tags: Record<string, string> = {};

  const latest = selectLatest(versions);
  if (latest !== undefined) {
    tags.latest = latest;
  }

  for (const tag of Object.keys(upstreamTags).sort()) {
    const target = upstreamTags[tag];
    if (tag !== 'latest' && present.has(target)) {
      tags[tag] = target;
    }
  }

  return tags;
}
