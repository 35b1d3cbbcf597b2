// SPDX-License-Identifier: Apache-2.0
// Copyright 2025 Provability-Fabric Contributors

import { z } from 'zod';

// Only the fields the mirror reads are declared; everything else passes through.

export const FeedSchema = z
  .object({
    _links: z.object({
      packages: z.object({ href: z.string().min(1) }),
    }),
  })
  .passthrough();

export const FeedPackageSchema = z
  .object({
    name: z.string().min(1),
    protocolType: z.string().nullish(),
    _links: z.object({
      versions: z.object({ href: z.string().min(1) }),
    }),
  })
  .passthrough();

export const FeedPackageListSchema = z.object({
  value: z.array(FeedPackageSchema),
});

export const FeedVersionSchema = z
  .object({
    version: z.string().min(1),
    description: z.string().nullish(),
    publishDate: z.string().nullish(),
    dependencies: z
      .array(z.object({ packageName: z.string(), versionRange: z.string() }).passthrough())
      .nullish(),
  })
  .passthrough();

export const FeedVersionListSchema = z.object({
  value: z.array(FeedVersionSchema),
});

const PersonSchema = z.union([z.string(), z.object({ name: z.string().nullish() }).passthrough()]);

const LicenseSchema = z.union([z.string(), z.object({ type: z.string() }).passthrough()]);

export const RegistryVersionSchema = z
  .object({
    author: PersonSchema.nullish(),
    dist: z
      .object({ tarball: z.string().optional(), shasum: z.string().optional() })
      .passthrough()
      .nullish(),
    displayName: z.string().nullish(),
    unity: z.string().nullish(),
    category: z.string().nullish(),
    hideInEditor: z.boolean().nullish(),
    license: LicenseSchema.nullish(),
  })
  .passthrough();

export const RegistryDocumentSchema = z
  .object({
    'dist-tags': z.record(z.string(), z.string()).optional(),
    versions: z.record(z.string(), RegistryVersionSchema).default({}),
  })
  .passthrough();

export type FeedVersion = z.infer<typeof FeedVersionSchema>;
export type RegistryVersion = z.infer<typeof RegistryVersionSchema>;
export type Person = z.infer<typeof PersonSchema>;
export type License = z.infer<typeof LicenseSchema>;
