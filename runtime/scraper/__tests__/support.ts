// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { ConfigService } from '@nestjs/config';
import { UpstreamRequestError } from '../../common/src/errors';
import { PackageIdentity, UpstreamPackage } from '../../common/src/types';
import { ScraperEnv, validateScraperEnv } from '../src/config/scraper.config';
import { CatalogClient } from '../src/devops/catalog-client';

export function createConfig(overrides: Record<string, string> = {}): ConfigService<ScraperEnv, true> {
  return new ConfigService<ScraperEnv, true>(
    validateScraperEnv({
      ORG_NAME: 'example-org',
      FEED_ID: 'example-feed',
      PAT: 'test-token',
      FALLBACK_AUTHOR: 'Tools Team',
      REFRESH: '60',
      SYNC_CONCURRENCY: '2',
      MONGO_HOST: 'localhost',
      MONGO_USER: 'root',
      MONGO_PASS: 'test-password',
      MONGO_DB: 'mirror',
      ...overrides,
    }),
  );
}

/**
 * Feed held in memory. Packages listed in `failing` reject their metadata
 * fetch with a server error.
 */
export class FakeCatalog implements CatalogClient {
  readonly packages = new Map<string, UpstreamPackage>();
  readonly failing = new Set<string>();
  listingError: Error | null = null;
  fetched: string[] = [];

  set(pkg: UpstreamPackage): this {
    this.packages.set(pkg.name, pkg);
    return this;
  }

  async listPackages(): Promise<PackageIdentity[]> {
    if (this.listingError) {
      throw this.listingError;
    }
    return [...this.packages.keys()].map((name) => ({ name, locator: `https://feed.example/${name}/versions` }));
  }

  async fetchPackage(identity: PackageIdentity): Promise<UpstreamPackage> {
    this.fetched.push(identity.name);
    if (this.failing.has(identity.name)) {
      throw new UpstreamRequestError('server', identity.locator, `Failed to get versions of '${identity.name}': HTTP 500`, {
        status: 500,
      });
    }
    const pkg = this.packages.get(identity.name);
    if (!pkg) {
      throw new UpstreamRequestError('client', identity.locator, 'HTTP 404', { status: 404 });
    }
    return structuredClone(pkg);
  }
}

export function upstreamPackage(name: string, versions: string[], author: string | null = 'Jamie'): UpstreamPackage {
  return {
    name,
    versions: versions.map((version) => ({
      version,
      author,
      tarball: `https://feed.example/${name}/-/${name}-${version}.tgz`,
      dependencies: {},
    })),
  };
}
