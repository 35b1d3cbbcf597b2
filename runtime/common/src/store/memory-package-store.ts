// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { PackageRecord } from '../types';
import { PackageStore } from './package-store';

/**
 * Process-local store. Records are copied on the way in and out so callers
 * never share state with the store.
 */
export class MemoryPackageStore implements PackageStore {
  private readonly records = new Map<string, PackageRecord>();

  async upsert(record: PackageRecord): Promise<void> {
    this.records.set(record.name, structuredClone(record));
  }

  async get(name: string): Promise<PackageRecord | null> {
    const record = this.records.get(name);
    return record ? structuredClone(record) : null;
  }

  async *getAll(): AsyncIterable<PackageRecord> {
    const names = [...this.records.keys()].sort();
    for (const name of names) {
      const record = this.records.get(name);
      if (record) {
        yield structuredClone(record);
      }
    }
  }

  async deleteAll(): Promise<number> {
    const count = this.records.size;
    this.records.clear();
    return count;
  }

  async ping(): Promise<void> {}

  get size(): number {
    return this.records.size;
  }
}
