// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { StoredRecordInvalidError } from '../src/errors';
import { MemoryPackageStore } from '../src/store/memory-package-store';
import { fromDocument, toDocument } from '../src/store/mongo-package-store';
import { PackageRecord } from '../src/types';

function record(name: string, versions: string[]): PackageRecord {
  return {
    name,
    versions: Object.fromEntries(
      versions.map((version) => [version, { version, author: 'Tools Team', dependencies: {}, dist: {} }]),
    ),
    distTags: { latest: versions[versions.length - 1] },
    lastSynced: new Date('2026-02-01T00:00:00.000Z'),
  };
}

async function collect(store: MemoryPackageStore): Promise<string[]> {
  const names: string[] = [];
  for await (const item of store.getAll()) {
    names.push(item.name);
  }
  return names;
}

describe('MemoryPackageStore', () => {
  let store: MemoryPackageStore;

  beforeEach(() => {
    store = new MemoryPackageStore();
  });

  it('should return null for unknown packages', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('should replace the whole record on upsert', async () => {
    await store.upsert(record('pkg', ['1.0.0', '1.1.0']));
    await store.upsert(record('pkg', ['1.1.0']));

    const stored = await store.get('pkg');
    expect(Object.keys(stored?.versions ?? {})).toEqual(['1.1.0']);
  });

  it('should not share state with callers', async () => {
    const original = record('pkg', ['1.0.0']);
    await store.upsert(original);
    original.distTags.latest = 'mutated';

    const stored = await store.get('pkg');
    expect(stored?.distTags.latest).toBe('1.0.0');
  });

  it('should list records ordered by name', async () => {
    await store.upsert(record('beta', ['1.0.0']));
    await store.upsert(record('alpha', ['1.0.0']));

    expect(await collect(store)).toEqual(['alpha', 'beta']);
  });

  it('should delete everything and report the count', async () => {
    await store.upsert(record('a', ['1.0.0']));
    await store.upsert(record('b', ['1.0.0']));

    expect(await store.deleteAll()).toBe(2);
    expect(await collect(store)).toEqual([]);
  });
});

describe('Mongo document mapping', () => {
  it('should store versions as an array and read them back keyed by version', () => {
    const source = record('com.example.tools', ['1.0.0', '2.0.0']);
    const document = toDocument(source);

    expect(document.versions.map((version) => version.version)).toEqual(['1.0.0', '2.0.0']);
    expect(fromDocument(document)).toEqual(source);
  });

  it('should reject documents that do not match the stored shape', () => {
    const document = { name: 'broken', versions: [{ version: '1.0.0' }], distTags: {}, lastSynced: new Date() };

    expect(() => fromDocument(document)).toThrow(StoredRecordInvalidError);
    expect(() => fromDocument(document)).toThrow("Stored package 'broken' is invalid");
  });
});
