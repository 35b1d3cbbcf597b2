// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { Logger } from '@nestjs/common';
import axios, { AxiosAdapter, AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import { z } from 'zod';
import { UpstreamRequestError } from '../../../common/src/errors';
import { PackageIdentity, UpstreamPackage, UpstreamVersion } from '../../../common/src/types';
import { CatalogClient } from './catalog-client';
import {
  FeedPackageListSchema,
  FeedSchema,
  FeedVersion,
  FeedVersionListSchema,
  License,
  Person,
  RegistryDocumentSchema,
  RegistryVersion,
} from './devops.types';

export interface DevOpsClientOptions {
  organization: string;
  feedId: string;
  pat: string;
  timeoutMs: number;
  /** Attempts per request, including the first */
  retries: number;
  retryDelayMs?: number;
  /** Replaces the HTTP transport; tests answer requests in-process. */
  adapter?: AxiosAdapter;
}

const FEED_API_VERSION = '6.0-preview.1';

/**
 * Reads an Azure DevOps Artifacts feed. Version lists come from the feed
 * API; download locations and Unity fields come from the feed's npm registry.
 */
export class DevOpsCatalogClient implements CatalogClient {
  private readonly logger = new Logger(DevOpsCatalogClient.name);
  private readonly client: AxiosInstance;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private packagesUrl: string | null = null;

  readonly feedUrl: string;
  readonly registryBaseUrl: string;

  constructor(options: DevOpsClientOptions) {
    const organization = encodeURIComponent(options.organization);
    const feed = encodeURIComponent(options.feedId);

    this.feedUrl = `https://feeds.dev.azure.com/${organization}/_apis/packaging/feeds/${feed}?api-version=${FEED_API_VERSION}`;
    this.registryBaseUrl = `https://pkgs.dev.azure.com/${organization}/_packaging/${feed}/npm/registry`;
    this.retries = Math.max(1, options.retries);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.timeoutMs = options.timeoutMs;

    this.client = axios.create({
      timeout: options.timeoutMs,
      // DevOps takes a PAT as the password of an otherwise empty basic login
      auth: { username: '', password: options.pat },
      headers: {
        Accept: 'application/json',
        'User-Agent': 'feed-mirror-scraper/1.0.0',
      },
      adapter: options.adapter,
    });
  }

  async listPackages(signal?: AbortSignal): Promise<PackageIdentity[]> {
    const packagesUrl = await this.resolvePackagesUrl(signal);
    const list = await this.getJson(packagesUrl, FeedPackageListSchema, 'feed package list', signal);

    const identities: PackageIdentity[] = [];
    for (const item of list.value) {
      if (item.protocolType && item.protocolType.toLowerCase() !== 'npm') {
        this.logger.debug(`Ignoring ${item.protocolType} package '${item.name}'`);
        continue;
      }
      identities.push({ name: item.name, locator: item._links.versions.href });
    }

    return identities;
  }

  async fetchPackage(identity: PackageIdentity, signal?: AbortSignal): Promise<UpstreamPackage> {
    const feedVersions = await this.getJson(
      identity.locator,
      FeedVersionListSchema,
      `feed versions of '${identity.name}'`,
      signal,
    );
    const registry = await this.getJson(
      this.registryUrl(identity.name),
      RegistryDocumentSchema,
      `npm registry document of '${identity.name}'`,
      signal,
    );

    const versions: UpstreamVersion[] = [];
    for (const feedVersion of feedVersions.value) {
      const registryVersion = registry.versions[feedVersion.version];
      if (!registryVersion) {
        this.logger.warn(
          `Package '${identity.name}' version ${feedVersion.version} is in the feed but not in its npm registry; it will not be mirrored`,
        );
        continue;
      }
      versions.push(mergeVersion(feedVersion, registryVersion));
    }

    return {
      name: identity.name,
      versions,
      distTags: registry['dist-tags'] ?? {},
    };
  }

  registryUrl(packageName: string): string {
    const encoded = packageName.startsWith('@')
      ? `@${encodeURIComponent(packageName.slice(1))}`
      : encodeURIComponent(packageName);
    return `${this.registryBaseUrl}/${encoded}`;
  }

  private async resolvePackagesUrl(signal?: AbortSignal): Promise<string> {
    if (this.packagesUrl === null) {
      const feed = await this.getJson(this.feedUrl, FeedSchema, 'feed description', signal);
      this.packagesUrl = feed._links.packages.href;
    }
    return this.packagesUrl;
  }

  private async getJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    description: string,
    signal?: AbortSignal,
  ): Promise<T> {
    const response = await this.executeWithRetry(() => this.request(url, description, signal), signal);

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new UpstreamRequestError(
        'malformed',
        url,
        `Unexpected ${description}: ${issue.path.join('.')} ${issue.message}`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  private async request(url: string, description: string, signal?: AbortSignal): Promise<AxiosResponse<unknown>> {
    // axios' own timeout only covers idle sockets; this bounds the whole request
    const deadline = AbortSignal.timeout(this.timeoutMs);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(url, { signal: signal ? AbortSignal.any([signal, deadline]) : deadline });
    } catch (error) {
      if (deadline.aborted && !signal?.aborted) {
        throw new UpstreamRequestError(
          'timeout',
          url,
          `Failed to get ${description}: no complete response within ${this.timeoutMs}ms`,
          { cause: error },
        );
      }
      throw toUpstreamError(error, url, description);
    }

    // DevOps answers a rejected PAT with a 203 and a sign-in page
    if (response.status === 203) {
      throw new UpstreamRequestError(
        'auth',
        url,
        `Failed to get ${description}: authentication rejected. Is the PAT valid and does it have the Packaging (Read) scope?`,
        { status: 203 },
      );
    }

    return response;
  }

  private async executeWithRetry<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt < this.retries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        if (!(error instanceof UpstreamRequestError) || !error.retryable || signal?.aborted) {
          throw error;
        }

        if (attempt < this.retries - 1) {
          const backoffMs = Math.min(this.retryDelayMs * Math.pow(2, attempt), 10000);
          this.logger.warn(`${error.message}; retrying in ${backoffMs}ms`);
          await this.sleep(backoffMs, signal);
        }
      }
    }

    throw lastError;
  }

  /** Ends early when `signal` aborts; the next attempt then fails as cancelled. */
  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const wake = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', wake);
        resolve();
      }, ms);
      signal?.addEventListener('abort', wake, { once: true });
    });
  }
}

export function toUpstreamError(error: unknown, url: string, description: string): UpstreamRequestError {
  const prefix = `Failed to get ${description}`;

  if (!isAxiosError(error)) {
    return new UpstreamRequestError('network', url, `${prefix}: ${String(error)}`, { cause: error });
  }

  if (error.code === 'ERR_CANCELED') {
    return new UpstreamRequestError('cancelled', url, `${prefix}: request cancelled`, { cause: error });
  }
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new UpstreamRequestError('timeout', url, `${prefix}: request exceeded the timeout`, { cause: error });
  }

  const status = error.response?.status;
  if (status === undefined) {
    return new UpstreamRequestError('network', url, `${prefix}: ${error.message}`, { cause: error });
  }
  if (status === 401 || status === 403) {
    return new UpstreamRequestError('auth', url, `${prefix}: HTTP ${status}`, { cause: error, status });
  }
  if (status >= 400 && status < 500) {
    return new UpstreamRequestError('client', url, `${prefix}: HTTP ${status}`, { cause: error, status });
  }
  return new UpstreamRequestError('server', url, `${prefix}: HTTP ${status}`, { cause: error, status });
}

function mergeVersion(feedVersion: FeedVersion, registryVersion: RegistryVersion): UpstreamVersion {
  const dependencies: Record<string, string> = {};
  for (const dependency of feedVersion.dependencies ?? []) {
    dependencies[dependency.packageName] = dependency.versionRange;
  }

  return {
    version: feedVersion.version,
    author: authorName(registryVersion.author),
    dependencies,
    tarball: registryVersion.dist?.tarball,
    shasum: registryVersion.dist?.shasum,
    description: feedVersion.description,
    displayName: registryVersion.displayName,
    unity: registryVersion.unity,
    category: registryVersion.category,
    hideInEditor: registryVersion.hideInEditor,
    license: licenseName(registryVersion.license),
    publishedAt: feedVersion.publishDate,
  };
}

function authorName(author: Person | null | undefined): string | null | undefined {
  return typeof author === 'object' && author !== null ? author.name : author;
}

function licenseName(license: License | null | undefined): string | null | undefined {
  return typeof license === 'object' && license !== null ? license.type : license;
}
