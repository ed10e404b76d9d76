import * as path from 'node:path';
import { z } from 'zod';
import { CatalogError } from '../core/errors.js';
import { readFileIfExists, writeJsonAtomic } from '../utils/atomic_write.js';

export const METADATA_FILE = 'metadata.json';

export const ContentMetadataSchema = z.object({
  content_id: z.string(),
  source: z.string(),
  title: z.string(),
  content_type: z.enum(['web', 'youtube', 'other']),
  created_at: z.string(),
  updated_at: z.string(),
  run_id: z.string().optional(),
  artifacts: z.array(z.string()).default([]),
  artifact_digests: z.record(z.string()).default({}),
});

export type ContentMetadata = z.infer<typeof ContentMetadataSchema>;

export async function readMetadata(contentDir: string): Promise<ContentMetadata | null> {
  const metadataPath = path.join(contentDir, METADATA_FILE);
  const raw = await readFileIfExists(metadataPath);
  if (!raw) return null;
  let json: unknown;
  try {
    json = JSON.parse(raw.toString('utf8'));
  } catch (error) {
    throw new CatalogError(`Metadata at ${metadataPath} is not valid JSON`, { path: metadataPath }, { cause: error });
  }
  const parsed = ContentMetadataSchema.safeParse(json);
  if (!parsed.success) {
    throw new CatalogError(`Metadata at ${metadataPath} does not match the expected shape`, {
      path: metadataPath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export async function writeMetadata(contentDir: string, metadata: ContentMetadata): Promise<void> {
  await writeJsonAtomic(path.join(contentDir, METADATA_FILE), metadata);
}
