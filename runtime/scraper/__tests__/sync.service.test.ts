// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { StoreUnavailableError, UpstreamRequestError, UpstreamUnavailableError } from '../../common/src/errors';
import { MemoryPackageStore } from '../../common/src/store/memory-package-store';
import { PackageRecord } from '../../common/src/types';
import { MetricsService } from '../src/metrics/metrics.service';
import { SyncService } from '../src/sync/sync.service';
import { createConfig, FakeCatalog, upstreamPackage } from './support';

function withoutSyncTime(record: PackageRecord | null) {
  if (!record) {
    return null;
  }
  const { lastSynced, ...rest } = record;
  return rest;
}

describe('SyncService', () => {
  let catalog: FakeCatalog;
  let store: MemoryPackageStore;
  let metrics: MetricsService;
  let service: SyncService;

  beforeEach(() => {
    catalog = new FakeCatalog();
    store = new MemoryPackageStore();
    metrics = new MetricsService();
    service = new SyncService(createConfig(), catalog, store, metrics);
  });

  describe('distribution tags', () => {
    it('should tag the highest semver as latest, ignoring unparsable versions', async () => {
      catalog.set(upstreamPackage('com.example.a', ['1.2.0', '1.10.0-beta.1', '1.9.3', 'experimental']));

      await service.runSyncCycle();

      const record = await store.get('com.example.a');
      expect(record?.distTags.latest).toBe('1.10.0-beta.1');
      expect(Object.keys(record?.versions ?? {})).toContain('experimental');
    });
  });

  describe('author fallback', () => {
    it('should fall back per version, keeping upstream authors where present', async () => {
      catalog.set({
        name: 'com.example.b',
        versions: [
          { version: '1.0.0', author: '' },
          { version: '1.1.0' },
          { version: '2.0.0', author: 'Robin' },
        ],
      });

      await service.runSyncCycle();

      const record = await store.get('com.example.b');
      expect(record?.versions['1.0.0'].author).toBe('Tools Team');
      expect(record?.versions['1.1.0'].author).toBe('Tools Team');
      expect(record?.versions['2.0.0'].author).toBe('Robin');
    });
  });

  describe('idempotence', () => {
    it('should store identical records when upstream is unchanged', async () => {
      catalog.set(upstreamPackage('com.example.c', ['0.1.0', '0.2.0', '0.10.0']));

      await service.runSyncCycle();
      const first = await store.get('com.example.c');
      await service.runSyncCycle();
      const second = await store.get('com.example.c');

      expect(withoutSyncTime(second)).toEqual(withoutSyncTime(first));
      expect(Object.keys(second?.versions ?? {})).toEqual(Object.keys(first?.versions ?? {}));
    });
  });

  describe('deletion propagation', () => {
    it('should drop a version removed upstream on the next sync', async () => {
      catalog.set(upstreamPackage('com.example.d', ['1.0.0', '2.0.0']));
      await service.runSyncCycle();

      catalog.set(upstreamPackage('com.example.d', ['1.0.0']));
      await service.runSyncCycle();

      const record = await store.get('com.example.d');
      expect(Object.keys(record?.versions ?? {})).toEqual(['1.0.0']);
      expect(record?.distTags.latest).toBe('1.0.0');
    });
  });

  describe('partial failure isolation', () => {
    it('should update the other packages and leave the failing one untouched', async () => {
      catalog.set(upstreamPackage('A', ['1.0.0'])).set(upstreamPackage('B', ['1.0.0'])).set(upstreamPackage('C', ['1.0.0']));
      await service.runSyncCycle();
      const priorB = await store.get('B');

      catalog.set(upstreamPackage('A', ['1.0.0', '1.1.0']));
      catalog.set(upstreamPackage('B', ['1.0.0', '1.1.0']));
      catalog.set(upstreamPackage('C', ['1.0.0', '1.1.0']));
      catalog.failing.add('B');

      const report = await service.runSyncCycle();

      expect(report.synced.sort()).toEqual(['A', 'C']);
      expect(report.failed).toEqual([
        { name: 'B', kind: 'server', reason: "Failed to get versions of 'B': HTTP 500" },
      ]);
      expect((await store.get('A'))?.distTags.latest).toBe('1.1.0');
      expect((await store.get('C'))?.distTags.latest).toBe('1.1.0');
      expect(await store.get('B')).toEqual(priorB);
    });

    it('should not create a record for a package that never synced', async () => {
      catalog.set(upstreamPackage('A', ['1.0.0'])).set(upstreamPackage('B', ['1.0.0']));
      catalog.failing.add('B');

      await service.runSyncCycle();

      expect(await store.get('B')).toBeNull();
      expect(await store.get('A')).not.toBeNull();
    });

    it('should report a package without versions as failed', async () => {
      catalog.set({ name: 'hollow', versions: [] });

      const report = await service.runSyncCycle();

      expect(report.failed).toEqual([{ name: 'hollow', kind: 'empty', reason: "Package 'hollow' has no versions" }]);
      expect(await store.get('hollow')).toBeNull();
    });
  });

  describe('listing failure', () => {
    it('should abort the cycle without writing anything', async () => {
      catalog.set(upstreamPackage('A', ['1.0.0']));
      catalog.listingError = new UpstreamRequestError('auth', 'https://feed.example', 'authentication rejected', {
        status: 203,
      });

      await expect(service.runSyncCycle()).rejects.toBeInstanceOf(UpstreamUnavailableError);
      expect(store.size).toBe(0);
      expect(catalog.fetched).toEqual([]);
    });
  });

  describe('store outage', () => {
    it('should fail the cycle instead of reporting packages as skipped', async () => {
      catalog.set(upstreamPackage('A', ['1.0.0']));
      jest.spyOn(store, 'upsert').mockRejectedValue(new StoreUnavailableError('connection refused'));

      await expect(service.runSyncCycle()).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('should keep committed records and start no further packages', async () => {
      catalog
        .set(upstreamPackage('A', ['1.0.0']))
        .set(upstreamPackage('B', ['1.0.0']))
        .set(upstreamPackage('C', ['1.0.0']));
      const upsert = store.upsert.bind(store);
      jest
        .spyOn(store, 'upsert')
        .mockImplementationOnce(upsert)
        .mockRejectedValueOnce(new StoreUnavailableError('connection refused'));
      const serial = new SyncService(createConfig({ SYNC_CONCURRENCY: '1' }), catalog, store, metrics);

      await expect(serial.runSyncCycle()).rejects.toBeInstanceOf(StoreUnavailableError);

      expect(await store.get('A')).not.toBeNull();
      expect(await store.get('B')).toBeNull();
      expect(catalog.fetched).toEqual(['A', 'B']);
    });
  });

  describe('cancellation', () => {
    it('should skip every package when cancelled before the cycle starts', async () => {
      catalog.set(upstreamPackage('A', ['1.0.0'])).set(upstreamPackage('B', ['1.0.0']));
      const controller = new AbortController();
      controller.abort();

      const report = await service.runSyncCycle(controller.signal);

      expect(report.skipped).toEqual(['A', 'B']);
      expect(report.synced).toEqual([]);
      expect(store.size).toBe(0);
    });

    it('should keep finished packages and skip the interrupted and remaining ones', async () => {
      catalog
        .set(upstreamPackage('A', ['1.0.0']))
        .set(upstreamPackage('B', ['1.0.0']))
        .set(upstreamPackage('C', ['1.0.0']));
      const controller = new AbortController();
      const fetchPackage = catalog.fetchPackage.bind(catalog);
      jest.spyOn(catalog, 'fetchPackage').mockImplementation(async (identity) => {
        if (identity.name === 'B') {
          controller.abort();
          throw new UpstreamRequestError('cancelled', identity.locator, 'request cancelled');
        }
        return fetchPackage(identity);
      });
      const serial = new SyncService(createConfig({ SYNC_CONCURRENCY: '1' }), catalog, store, metrics);

      const report = await serial.runSyncCycle(controller.signal);

      expect(report.synced).toEqual(['A']);
      expect(report.skipped).toEqual(['B', 'C']);
      expect(report.failed).toEqual([]);
      expect(await store.get('A')).not.toBeNull();
      expect(store.size).toBe(1);
      expect(catalog.fetched).toEqual(['A']);
    });
  });

  describe('metrics', () => {
    it('should count synced packages and failures', async () => {
      catalog.set(upstreamPackage('A', ['1.0.0'])).set(upstreamPackage('B', ['1.0.0']));
      catalog.failing.add('B');

      await service.runSyncCycle();
      const output = await metrics.getMetrics();

      expect(output).toContain('feed_mirror_packages_synced_total 1');
      expect(output).toContain('feed_mirror_package_sync_failures_total{kind="server"} 1');
      expect(output).toContain('feed_mirror_sync_cycles_total{outcome="partial"} 1');
    });
  });
});
