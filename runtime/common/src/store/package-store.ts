// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { PackageRecord } from '../types';

export const PACKAGE_STORE = Symbol('PACKAGE_STORE');

/**
 * Boundary to the metadata store. Implementations report connectivity
 * problems as StoreUnavailableError and never as a missing record.
 */
export interface PackageStore {
  /** Replaces the whole record for `record.name`, creating it if needed. */
  upsert(record: PackageRecord): Promise<void>;
  get(name: string): Promise<PackageRecord | null>;
  /** Lazily yields every record ordered by name. */
  getAll(): AsyncIterable<PackageRecord>;
  deleteAll(): Promise<number>;
  ping(): Promise<void>;
}
