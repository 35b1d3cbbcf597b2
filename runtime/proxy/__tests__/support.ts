// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { ConfigService } from '@nestjs/config';
import { StoreUnavailableError } from '../../common/src/errors';
import { MemoryPackageStore } from '../../common/src/store/memory-package-store';
import { PackageRecord, VersionRecord } from '../../common/src/types';
import { ProxyEnv, validateProxyEnv } from '../src/config/proxy.config';

export function createConfig(): ConfigService<ProxyEnv, true> {
  return new ConfigService<ProxyEnv, true>(
    validateProxyEnv({
      MONGO_HOST: 'localhost',
      MONGO_USER: 'root',
      MONGO_PASS: 'test-password',
      MONGO_DB: 'mirror',
    }),
  );
}

export function version(value: string, fields: Partial<VersionRecord> = {}): VersionRecord {
  return {
    version: value,
    author: 'Tools Team',
    dependencies: {},
    dist: { tarball: `https://pkgs.example/${value}.tgz` },
    ...fields,
  };
}

export function packageRecord(
  name: string,
  versions: VersionRecord[],
  distTags: Record<string, string> = {},
): PackageRecord {
  return {
    name,
    versions: Object.fromEntries(versions.map((entry) => [entry.version, entry])),
    distTags,
    lastSynced: new Date('2026-04-01T00:00:00.000Z'),
  };
}

/** Store whose reads fail as if MongoDB were unreachable. */
export class UnreachableStore extends MemoryPackageStore {
  async get(): Promise<PackageRecord | null> {
    throw new StoreUnavailableError('Metadata store unavailable');
  }

  async *getAll(): AsyncIterable<PackageRecord> {
    throw new StoreUnavailableError('Metadata store unavailable');
  }
}
