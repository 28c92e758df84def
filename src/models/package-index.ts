import { z } from 'zod';

/**
 * One entry of index.json as served by the index host.
 * Unknown fields are stripped; `repo_url` is exposed as `repoUrl`.
 */
export const PackageMetadataSchema = z
  .object({
    category: z.string(),
    version: z.string(),
    repo_url: z.string(),
  })
  .transform((entry) => ({
    category: entry.category,
    version: entry.version,
    repoUrl: entry.repo_url,
  }));

export type PackageMetadata = Readonly<z.infer<typeof PackageMetadataSchema>>;

/**
 * Top-level index payload: package name -> metadata
 */
export const PackageIndexSchema = z.record(z.string(), PackageMetadataSchema);

export type PackageIndex = Readonly<Record<string, PackageMetadata>>;
