// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Inject, Injectable } from '@nestjs/common';
import { PACKAGE_STORE, PackageStore } from '../../../common/src/store/package-store';
import { PackageRecord } from '../../../common/src/types';
import { toPackageDocument, toSearchObject, toSummary } from './registry.projection';
import { PackageDocument, PackageSummary, SearchPage, SearchQuery } from './registry.types';

export const DEFAULT_SEARCH_SIZE = 20;
export const MAX_SEARCH_SIZE = 250;

/**
 * Read-only projection of the mirror into npm registry shapes.
 */
@Injectable()
export class RegistryService {
  constructor(@Inject(PACKAGE_STORE) private readonly store: PackageStore) {}

  async getPackage(name: string): Promise<PackageDocument | null> {
    const record = await this.store.get(name);
    if (!record || Object.keys(record.versions).length === 0) {
      return null;
    }
    return toPackageDocument(record);
  }

  async *listAll(): AsyncIterable<PackageSummary> {
    for await (const record of this.store.getAll()) {
      yield toSummary(record);
    }
  }

  async search(query: SearchQuery, now: Date = new Date()): Promise<SearchPage> {
    const needle = (query.text ?? '').toLowerCase();
    const from = clamp(query.from, 0, Number.MAX_SAFE_INTEGER, 0);
    const size = clamp(query.size, 0, MAX_SEARCH_SIZE, DEFAULT_SEARCH_SIZE);

    const matches: PackageRecord[] = [];
    for await (const record of this.store.getAll()) {
      if (record.name.toLowerCase().includes(needle)) {
        matches.push(record);
      }
    }
    matches.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    return {
      objects: matches.slice(from, from + size).map(toSearchObject),
      total: matches.length,
      time: now.toISOString(),
    };
  }
}

function clamp(value: number | undefined, min: number, max: number, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, Math.trunc(value)));
}
