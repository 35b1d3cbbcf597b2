// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Collection, Db, MongoError } from 'mongodb';
import { z } from 'zod';
import { MirrorError, StoredRecordInvalidError, StoreUnavailableError } from '../errors';
import { PackageRecord, VersionRecord } from '../types';
import { PackageStore } from './package-store';

const VersionRecordSchema = z.object({
  version: z.string(),
  author: z.string().min(1),
  dependencies: z.record(z.string(), z.string()),
  dist: z.object({
    tarball: z.string().optional(),
    shasum: z.string().optional(),
  }),
  description: z.string().optional(),
  displayName: z.string().optional(),
  unity: z.string().optional(),
  category: z.string().optional(),
  hideInEditor: z.boolean().optional(),
  license: z.string().optional(),
  publishedAt: z.string().optional(),
});

const StoredPackageSchema = z.object({
  name: z.string(),
  versions: z.array(VersionRecordSchema),
  distTags: z.record(z.string(), z.string()),
  lastSynced: z.date(),
});

/**
 * Versions are stored as an array: version strings contain dots, which
 * MongoDB does not accept as plain field names.
 */
export type StoredPackageDocument = z.infer<typeof StoredPackageSchema>;

export class MongoPackageStore implements PackageStore {
  private readonly collection: Collection<StoredPackageDocument>;

  constructor(private readonly db: Db, collectionName: string) {
    this.collection = db.collection<StoredPackageDocument>(collectionName);
  }

  async ensureIndexes(): Promise<void> {
    await this.run('create indexes', () =>
      this.collection.createIndex({ name: 1 }, { unique: true }),
    );
  }

  async upsert(record: PackageRecord): Promise<void> {
    await this.run(`upsert '${record.name}'`, () =>
      this.collection.replaceOne({ name: record.name }, toDocument(record), { upsert: true }),
    );
  }

  async get(name: string): Promise<PackageRecord | null> {
    const document = await this.run(`read '${name}'`, () =>
      this.collection.findOne({ name }, { projection: { _id: 0 } }),
    );
    return document ? fromDocument(document) : null;
  }

  async *getAll(): AsyncIterable<PackageRecord> {
    const cursor = this.collection.find({}, { projection: { _id: 0 } }).sort({ name: 1 });

    try {
      for await (const document of cursor) {
        yield fromDocument(document);
      }
    } catch (error) {
      throw wrapStoreError('list packages', error);
    }
  }

  async deleteAll(): Promise<number> {
    const result = await this.run('delete all packages', () => this.collection.deleteMany({}));
    return result.deletedCount;
  }

  async ping(): Promise<void> {
    await this.run('ping', () => this.db.command({ ping: 1 }));
  }

  private async run<T>(operation: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw wrapStoreError(operation, error);
    }
  }
}

export function toDocument(record: PackageRecord): StoredPackageDocument {
  return {
    name: record.name,
    versions: Object.values(record.versions),
    distTags: record.distTags,
    lastSynced: record.lastSynced,
  };
}

export function fromDocument(document: unknown): PackageRecord {
  const parsed = StoredPackageSchema.safeParse(document);
  if (!parsed.success) {
    const name = z.object({ name: z.string() }).safeParse(document);
    throw new StoredRecordInvalidError(
      name.success ? name.data.name : '<unknown>',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }

  const versions: Record<string, VersionRecord> = {};
  for (const version of parsed.data.versions) {
    versions[version.version] = version;
  }

  return {
    name: parsed.data.name,
    versions,
    distTags: parsed.data.distTags,
    lastSynced: parsed.data.lastSynced,
  };
}

function wrapStoreError(operation: string, error: unknown): MirrorError {
  if (error instanceof MirrorError) {
    return error;
  }
  const reason = error instanceof MongoError ? error.message : String(error);
  return new StoreUnavailableError(`Store operation '${operation}' failed: ${reason}`, { cause: error });
}
