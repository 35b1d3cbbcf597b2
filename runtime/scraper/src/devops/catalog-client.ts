// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { PackageIdentity, UpstreamPackage } from '../../../common/src/types';

export const CATALOG_CLIENT = Symbol('CATALOG_CLIENT');

/**
 * Read access to the remote feed. Both calls reject with UpstreamRequestError.
 */
export interface CatalogClient {
  listPackages(signal?: AbortSignal): Promise<PackageIdentity[]>;
  fetchPackage(identity: PackageIdentity, signal?: AbortSignal): Promise<UpstreamPackage>;
}
