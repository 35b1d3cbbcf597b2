// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { DistRef } from '../../../common/src/types';

/** Descriptive fields copied from a stored version when present */
export interface DescriptiveFields {
  description?: string;
  displayName?: string;
  unity?: string;
  category?: string;
  hideInEditor?: boolean;
  license?: string;
}

export interface VersionDocument extends DescriptiveFields {
  _id: string;
  name: string;
  version: string;
  author: string;
  dependencies: Record<string, string>;
  dist: DistRef;
}

export interface PackageDocument extends DescriptiveFields {
  _id: string;
  name: string;
  author?: string;
  'dist-tags': Record<string, string>;
  versions: Record<string, VersionDocument>;
  time: Record<string, string>;
}

export interface PackageSummary extends DescriptiveFields {
  name: string;
  author?: string;
  'dist-tags': Record<string, string>;
  versions: Record<string, 'latest'>;
  time?: string;
}

export interface AllPackagesResponse {
  _updated: number;
  [name: string]: PackageSummary | number;
}

export interface SearchQuery {
  text?: string;
  from?: number;
  size?: number;
}

export interface SearchObject {
  package: {
    name: string;
    version?: string;
    description?: string;
    date?: string;
    displayName?: string;
  };
  score: {
    final: number;
    detail: { quality: number; popularity: number; maintenance: number };
  };
  searchScore: number;
}

export interface SearchPage {
  objects: SearchObject[];
  total: number;
  time: string;
}
