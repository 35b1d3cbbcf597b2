// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

export class MirrorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type UpstreamFailureKind =
  | 'timeout'
  | 'network'
  | 'auth'
  | 'client'
  | 'server'
  | 'malformed'
  | 'cancelled';

/**
 * A single request to the remote feed failed.
 */
export class UpstreamRequestError extends MirrorError {
  readonly status?: number;

  constructor(
    readonly kind: UpstreamFailureKind,
    readonly url: string,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, options);
    this.status = options?.status;
  }

  /** False for bad credentials, 4xx responses and unreadable bodies. */
  get retryable(): boolean {
    return this.kind === 'timeout' || this.kind === 'network' || this.kind === 'server';
  }
}

/**
 * The package listing could not be fetched; the whole cycle is abandoned.
 */
export class UpstreamUnavailableError extends MirrorError {}

export class PackageSyncFailedError extends MirrorError {
  constructor(readonly packageName: string, options?: { cause?: unknown }) {
    super(`Failed to sync package '${packageName}'`, options);
  }

  get kind(): string {
    if (this.cause instanceof UpstreamRequestError) {
      return this.cause.kind;
    }
    if (this.cause instanceof EmptyPackageError) {
      return 'empty';
    }
    return 'other';
  }
}

export class EmptyPackageError extends MirrorError {
  constructor(readonly packageName: string) {
    super(`Package '${packageName}' has no versions`);
  }
}

/** Base class for failures reading or writing the metadata store. */
export class StoreError extends MirrorError {}

export class StoreUnavailableError extends StoreError {}

export class StoredRecordInvalidError extends StoreError {
  constructor(readonly packageName: string, detail: string) {
    super(`Stored package '${packageName}' is invalid: ${detail}`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}
