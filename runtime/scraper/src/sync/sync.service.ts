// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  describeError,
  PackageSyncFailedError,
  StoreUnavailableError,
  UpstreamUnavailableError,
} from '../../../common/src/errors';
import { normalizePackage } from '../../../common/src/normalize';
import { PACKAGE_STORE, PackageStore } from '../../../common/src/store/package-store';
import { PackageIdentity, PackageRecord } from '../../../common/src/types';
import { unparsableVersions } from '../../../common/src/versions';
import { ScraperEnv } from '../config/scraper.config';
import { CATALOG_CLIENT, CatalogClient } from '../devops/catalog-client';
import { CycleOutcome, MetricsService } from '../metrics/metrics.service';
import { runPool, TaskOutcome } from './worker-pool';

export interface PackageFailure {
  name: string;
  kind: string;
  reason: string;
}

export interface SyncCycleReport {
  startedAt: Date;
  finishedAt: Date;
  listed: number;
  synced: string[];
  failed: PackageFailure[];
  /** Not attempted, or interrupted, because the cycle was cancelled */
  skipped: string[];
}

@Injectable()
export class SyncService {
  private readonly logger = new Logger(SyncService.name);
  private readonly fallbackAuthor: string;
  private readonly concurrency: number;

  constructor(
    private readonly configService: ConfigService<ScraperEnv, true>,
    @Inject(CATALOG_CLIENT) private readonly catalog: CatalogClient,
    @Inject(PACKAGE_STORE) private readonly store: PackageStore,
    private readonly metricsService: MetricsService,
  ) {
    this.fallbackAuthor = this.configService.get('FALLBACK_AUTHOR', { infer: true });
    this.concurrency = this.configService.get('SYNC_CONCURRENCY', { infer: true });
  }

  /**
   * One reconciliation pass over the whole feed. Rejects with
   * UpstreamUnavailableError when the feed cannot be listed and with
   * StoreUnavailableError when the store stops accepting writes; a failure
   * of a single package only lands in the report.
   */
  async runSyncCycle(signal?: AbortSignal): Promise<SyncCycleReport> {
    const startedAt = new Date();

    try {
      const report = await this.reconcile(startedAt, signal);
      this.metricsService.recordCycle(cycleOutcome(report), report.finishedAt.getTime() - startedAt.getTime());
      return report;
    } catch (error) {
      this.metricsService.recordCycle('failed', Date.now() - startedAt.getTime());
      throw error;
    }
  }

  private async reconcile(startedAt: Date, signal?: AbortSignal): Promise<SyncCycleReport> {
    let identities: PackageIdentity[];
    try {
      identities = await this.catalog.listPackages(signal);
    } catch (error) {
      throw new UpstreamUnavailableError(`Failed to list packages in the feed: ${describeError(error)}`, {
        cause: error,
      });
    }

    this.metricsService.recordPackagesListed(identities.length);
    this.logger.log(`Syncing ${identities.length} packages from the feed`);

    // Aborted by the caller, or by us once the store stops answering
    const cycle = new AbortController();
    const forwardAbort = () => cycle.abort();
    if (signal?.aborted) {
      cycle.abort();
    }
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let outcomes: TaskOutcome<PackageIdentity, PackageRecord>[];
    try {
      outcomes = await runPool(
        identities,
        this.concurrency,
        (identity) => this.syncPackage(identity, cycle),
        cycle.signal,
      );
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    const report: SyncCycleReport = {
      startedAt,
      finishedAt: new Date(),
      listed: identities.length,
      synced: [],
      failed: [],
      skipped: [],
    };

    for (const outcome of outcomes) {
      const name = outcome.item.name;

      if (outcome.status === 'fulfilled') {
        report.synced.push(name);
      } else if (outcome.status === 'skipped') {
        report.skipped.push(name);
      } else if (outcome.reason instanceof StoreUnavailableError) {
        throw outcome.reason;
      } else if (outcome.reason instanceof PackageSyncFailedError && outcome.reason.kind === 'cancelled') {
        report.skipped.push(name);
      } else {
        const failure = toFailure(name, outcome.reason);
        this.metricsService.incrementPackageFailures(failure.kind);
        this.logger.error(`Skipping package '${name}' this cycle: ${failure.reason}`);
        report.failed.push(failure);
      }
    }

    this.logger.log(
      `Sync cycle finished: ${report.synced.length} synced, ${report.failed.length} failed, ${report.skipped.length} skipped`,
    );

    return report;
  }

  private async syncPackage(identity: PackageIdentity, cycle: AbortController): Promise<PackageRecord> {
    let record: PackageRecord;
    try {
      const upstream = await this.catalog.fetchPackage(identity, cycle.signal);
      record = normalizePackage(upstream, { fallbackAuthor: this.fallbackAuthor, syncedAt: new Date() });
    } catch (error) {
      throw new PackageSyncFailedError(identity.name, { cause: error });
    }

    const unparsable = unparsableVersions(Object.keys(record.versions));
    if (unparsable.length > 0) {
      this.logger.warn(
        `Package '${identity.name}' has versions that are not valid semver and cannot be tagged latest: ${unparsable.join(', ')}`,
      );
    }

    try {
      await this.store.upsert(record);
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        cycle.abort();
        throw error;
      }
      throw new PackageSyncFailedError(identity.name, { cause: error });
    }

    this.metricsService.incrementPackagesSynced();
    this.logger.debug(`Stored '${record.name}' (${Object.keys(record.versions).length} versions)`);
    return record;
  }
}

function toFailure(name: string, reason: unknown): PackageFailure {
  if (reason instanceof PackageSyncFailedError) {
    return { name, kind: reason.kind, reason: describeError(reason.cause) };
  }
  return { name, kind: 'other', reason: describeError(reason) };
}

function cycleOutcome(report: SyncCycleReport): CycleOutcome {
  if (report.skipped.length > 0) {
    return 'cancelled';
  }
  return report.failed.length > 0 ? 'partial' : 'success';
}
