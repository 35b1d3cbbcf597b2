// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { PackageRecord, VersionRecord } from '../../../common/src/types';
import { selectLatest, sortVersions } from '../../../common/src/versions';
import {
  DescriptiveFields,
  PackageDocument,
  PackageSummary,
  SearchObject,
  VersionDocument,
} from './registry.types';

const SEARCH_SCORE: SearchObject['score'] = {
  final: 1,
  detail: { quality: 1, popularity: 1, maintenance: 1 },
};

/**
 * Version whose fields describe the package: the `latest` tag when it points
 * at a stored version, otherwise the highest stored version (the last in
 * code-point order when none parses).
 */
export function headlineVersion(record: PackageRecord): VersionRecord | undefined {
  const tagged = record.distTags.latest;
  if (tagged !== undefined && record.versions[tagged]) {
    return record.versions[tagged];
  }

  const keys = Object.keys(record.versions);
  const highest = selectLatest(keys) ?? sortVersions(keys).pop();
  return highest === undefined ? undefined : record.versions[highest];
}

function descriptiveFields(version: VersionRecord): DescriptiveFields {
  const fields: DescriptiveFields = {};
  if (version.description !== undefined) fields.description = version.description;
  if (version.displayName !== undefined) fields.displayName = version.displayName;
  if (version.unity !== undefined) fields.unity = version.unity;
  if (version.category !== undefined) fields.category = version.category;
  if (version.hideInEditor !== undefined) fields.hideInEditor = version.hideInEditor;
  if (version.license !== undefined) fields.license = version.license;
  return fields;
}

export function toVersionDocument(name: string, version: VersionRecord): VersionDocument {
  return {
    _id: `${name}@${version.version}`,
    name,
    version: version.version,
    author: version.author,
    dependencies: { ...version.dependencies },
    dist: { ...version.dist },
    ...descriptiveFields(version),
  };
}

/**
 * Full registry document. Versions are emitted in precedence order so
 * clients that read key order see oldest first.
 */
export function toPackageDocument(record: PackageRecord): PackageDocument {
  const headline = headlineVersion(record);
  const versions: Record<string, VersionDocument> = {};
  const time: Record<string, string> = { modified: record.lastSynced.toISOString() };

  for (const key of sortVersions(Object.keys(record.versions))) {
    const version = record.versions[key];
    versions[key] = toVersionDocument(record.name, version);
    if (version.publishedAt !== undefined) {
      time[key] = version.publishedAt;
    }
  }

  return {
    _id: record.name,
    name: record.name,
    ...(headline ? { author: headline.author, ...descriptiveFields(headline) } : {}),
    'dist-tags': { ...record.distTags },
    versions,
    time,
  };
}

export function toSummary(record: PackageRecord): PackageSummary {
  const headline = headlineVersion(record);
  const latest = record.distTags.latest;

  const summary: PackageSummary = {
    name: record.name,
    'dist-tags': { ...record.distTags },
    versions: latest !== undefined ? { [latest]: 'latest' } : {},
  };
  if (!headline) {
    return summary;
  }

  summary.author = headline.author;
  Object.assign(summary, descriptiveFields(headline));
  if (headline.publishedAt !== undefined) {
    summary.time = headline.publishedAt;
  }
  return summary;
}

export function toSearchObject(record: PackageRecord): SearchObject {
  const headline = headlineVersion(record);
  const pkg: SearchObject['package'] = { name: record.name };

  if (headline) {
    pkg.version = headline.version;
    if (headline.description !== undefined) pkg.description = headline.description;
    if (headline.publishedAt !== undefined) pkg.date = headline.publishedAt;
    if (headline.displayName !== undefined) pkg.displayName = headline.displayName;
  }

  return { package: pkg, score: SEARCH_SCORE, searchScore: 1 };
}
