import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { CatalogError, ContentNotFoundError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { isErrno, readFileIfExists, writeFileAtomic, writeJsonAtomic } from '../utils/atomic_write.js';
import { computeDigest } from '../utils/checksums.js';
import { canonicalizeSource, computeContentId, detectContentType, isContentId, type ContentType } from './content_id.js';
import { readMetadata, writeMetadata, type ContentMetadata } from './metadata.js';

export const CATALOG_FILE = 'catalog.json';

export const CatalogItemSchema = z.object({
  id: z.string(),
  source: z.string(),
  title: z.string(),
  content_type: z.enum(['web', 'youtube', 'other']),
  first_seen: z.string(),
  last_seen: z.string(),
  tags: z.array(z.string()).default([]),
  artifacts: z.array(z.string()).default([]),
  run_id: z.string().optional(),
});

export type CatalogItem = z.infer<typeof CatalogItemSchema>;

export const CatalogIndexSchema = z.object({
  version: z.literal(1),
  items: z.array(CatalogItemSchema),
});

export type CatalogIndex = z.infer<typeof CatalogIndexSchema>;

export interface IngestOptions {
  title?: string;
  contentType?: ContentType;
  tags?: string[];
  runId?: string;
}

export interface IngestResult {
  contentId: string;
  path: string;
  /** False when the source had already been ingested. */
  created: boolean;
  item: CatalogItem;
}

export interface DepositedArtifact {
  name: string;
  content: string;
}

/**
 * Content-addressed library. The index is one small JSON file replaced
 * atomically on every mutation; concurrent writers resolve as last writer
 * wins and readers always see a complete snapshot.
 */
export class ContentCatalog {
  readonly indexPath: string;

  constructor(
    homeDir: string,
    readonly libraryDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.indexPath = path.join(homeDir, CATALOG_FILE);
  }

  contentDir(contentId: string): string {
    if (!isContentId(contentId)) {
      throw new ContentNotFoundError(contentId);
    }
    return path.join(this.libraryDir, contentId);
  }

  async load(): Promise<CatalogIndex> {
    const raw = await readFileIfExists(this.indexPath);
    if (!raw) return { version: 1, items: [] };
    let json: unknown;
    try {
      json = JSON.parse(raw.toString('utf8'));
    } catch (error) {
      throw new CatalogError(`Catalog index ${this.indexPath} is not valid JSON`, { path: this.indexPath }, { cause: error });
    }
    const parsed = CatalogIndexSchema.safeParse(json);
    if (!parsed.success) {
      throw new CatalogError(`Catalog index ${this.indexPath} does not match the expected shape`, {
        path: this.indexPath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }

  private async save(index: CatalogIndex): Promise<void> {
    await writeJsonAtomic(this.indexPath, index);
  }

  async ingest(source: string, options: IngestOptions = {}): Promise<IngestResult> {
    const canonical = canonicalizeSource(source);
    if (!canonical) {
      throw new CatalogError('Cannot ingest an empty source identifier');
    }
    const contentId = computeContentId(canonical);
    const dir = this.contentDir(contentId);
    const created = !(await directoryExists(dir));
    await fs.mkdir(dir, { recursive: true });

    const timestamp = this.now().toISOString();
    const index = await this.load();
    const existing = index.items.find((item) => item.id === contentId);
    let item: CatalogItem;
    if (existing) {
      existing.last_seen = timestamp;
      if (options.title) existing.title = options.title;
      if (options.runId) existing.run_id = options.runId;
      existing.tags = mergeUnique(existing.tags, options.tags ?? []);
      item = existing;
    } else {
      item = {
        id: contentId,
        source: canonical,
        title: options.title ?? canonical,
        content_type: options.contentType ?? detectContentType(canonical),
        first_seen: timestamp,
        last_seen: timestamp,
        tags: mergeUnique([], options.tags ?? []),
        artifacts: [],
        run_id: options.runId,
      };
      index.items.push(item);
    }
    await this.save(index);
    logDebug('Catalog: ingested source', { contentId, created });
    return { contentId, path: dir, created, item };
  }

  async lookup(contentId: string): Promise<string | null> {
    if (!isContentId(contentId)) return null;
    const index = await this.load();
    const dir = this.contentDir(contentId);
    if (index.items.some((item) => item.id === contentId)) return dir;
    return (await directoryExists(dir)) ? dir : null;
  }

  async get(contentId: string): Promise<CatalogItem | null> {
    const index = await this.load();
    return index.items.find((item) => item.id === contentId) ?? null;
  }

  /** Most recently seen first. */
  async list(limit?: number): Promise<CatalogItem[]> {
    const index = await this.load();
    const sorted = [...index.items].sort((a, b) => b.last_seen.localeCompare(a.last_seen) || a.id.localeCompare(b.id));
    return limit === undefined ? sorted : sorted.slice(0, limit);
  }

  /** Case-insensitive substring match over title, source and tags. */
  async search(query: string): Promise<CatalogItem[]> {
    const needle = query.trim().toLowerCase();
    const items = await this.list();
    if (!needle) return items;
    return items.filter((item) =>
      item.title.toLowerCase().includes(needle)
      || item.source.toLowerCase().includes(needle)
      || item.tags.some((tag) => tag.toLowerCase().includes(needle)));
  }

  async filterByType(contentType: ContentType): Promise<CatalogItem[]> {
    return (await this.list()).filter((item) => item.content_type === contentType);
  }

  /** Drops the index entry; the content folder stays on disk. */
  async remove(contentId: string): Promise<boolean> {
    const index = await this.load();
    const remaining = index.items.filter((item) => item.id !== contentId);
    if (remaining.length === index.items.length) return false;
    await this.save({ ...index, items: remaining });
    return true;
  }

  /**
   * Copy artifacts into the content folder and record their whole-file
   * digests in `metadata.json` for the fast validation path.
   */
  async depositArtifacts(contentId: string, artifacts: readonly DepositedArtifact[], runId?: string): Promise<ContentMetadata> {
    const index = await this.load();
    const item = index.items.find((candidate) => candidate.id === contentId);
    if (!item) {
      throw new ContentNotFoundError(contentId);
    }
    const dir = this.contentDir(contentId);
    const timestamp = this.now().toISOString();

    const digests: Record<string, string> = {};
    for (const artifact of artifacts) {
      await writeFileAtomic(path.join(dir, artifact.name), artifact.content);
      digests[artifact.name] = computeDigest(artifact.content);
    }

    const previous = await readMetadata(dir);
    const names = artifacts.map((artifact) => artifact.name);
    const metadata: ContentMetadata = {
      content_id: contentId,
      source: item.source,
      title: item.title,
      content_type: item.content_type,
      created_at: previous?.created_at ?? timestamp,
      updated_at: timestamp,
      run_id: runId ?? previous?.run_id,
      artifacts: mergeUnique(previous?.artifacts ?? [], names),
      artifact_digests: { ...(previous?.artifact_digests ?? {}), ...digests },
    };
    await writeMetadata(dir, metadata);

    item.artifacts = mergeUnique(item.artifacts, names);
    if (runId) item.run_id = runId;
    await this.save(index);
    return metadata;
  }

  /** Content ids whose folders exist in the library, indexed or not. */
  async listContentDirs(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.libraryDir, { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory() && isContentId(entry.name)).map((entry) => entry.name).sort();
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return [];
      throw error;
    }
  }
}

async function directoryExists(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return false;
    throw error;
  }
}

function mergeUnique(base: readonly string[], extra: readonly string[]): string[] {
  const merged = [...base];
  for (const value of extra) {
    const trimmed = value.trim();
    if (trimmed && !merged.includes(trimmed)) merged.push(trimmed);
  }
  return merged;
}
