import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CatalogError, ContentNotFoundError } from '../../core/errors.js';
import { computeDigest } from '../../utils/checksums.js';
import { ContentCatalog } from '../catalog.js';
import { computeContentId } from '../content_id.js';
import { readMetadata } from '../metadata.js';

describe('ContentCatalog', () => {
  let home: string;
  let clock: number;
  let catalog: ContentCatalog;

  beforeEach(async () => {
    home = await fs.mkdtemp(path.join(os.tmpdir(), 'provenant-catalog-'));
    clock = Date.parse('2026-01-01T00:00:00.000Z');
    catalog = new ContentCatalog(home, path.join(home, 'library'), () => {
      clock += 1000;
      return new Date(clock);
    });
  });

  afterEach(async () => {
    await fs.rm(home, { recursive: true, force: true });
  });

  it('creates a content folder and index entry on first ingest', async () => {
    const result = await catalog.ingest('https://example.com/post', { tags: ['news', ' news '] });

    expect(result.created).toBe(true);
    expect(result.contentId).toBe(computeContentId('https://example.com/post'));
    expect(result.path).toBe(path.join(home, 'library', result.contentId));
    expect((await fs.stat(result.path)).isDirectory()).toBe(true);
    expect(result.item).toEqual({
      id: result.contentId,
      source: 'https://example.com/post',
      title: 'https://example.com/post',
      content_type: 'web',
      first_seen: '2026-01-01T00:00:01.000Z',
      last_seen: '2026-01-01T00:00:01.000Z',
      tags: ['news'],
      artifacts: [],
      run_id: undefined,
    });
  });

  it('is idempotent per source and merges new details', async () => {
    const first = await catalog.ingest('https://example.com/post');
    const second = await catalog.ingest(' https://example.com/post ', { title: 'Post', tags: ['later'], runId: 'run-2' });

    expect(second.created).toBe(false);
    expect(second.contentId).toBe(first.contentId);
    expect(second.item).toMatchObject({
      title: 'Post',
      tags: ['later'],
      run_id: 'run-2',
      first_seen: '2026-01-01T00:00:01.000Z',
      last_seen: '2026-01-01T00:00:02.000Z',
    });
    expect((await catalog.load()).items).toHaveLength(1);
  });

  it('rejects empty sources', async () => {
    await expect(catalog.ingest('   ')).rejects.toBeInstanceOf(CatalogError);
  });

  it('lists by recency and searches titles, sources and tags', async () => {
    const a = await catalog.ingest('https://example.com/a', { title: 'Gardening basics' });
    const b = await catalog.ingest('https://youtu.be/xyz', { tags: ['Talks'] });

    expect((await catalog.list()).map((item) => item.id)).toEqual([b.contentId, a.contentId]);
    expect((await catalog.list(1)).map((item) => item.id)).toEqual([b.contentId]);
    expect((await catalog.search('GARDEN')).map((item) => item.id)).toEqual([a.contentId]);
    expect((await catalog.search('talks')).map((item) => item.id)).toEqual([b.contentId]);
    expect((await catalog.search('example.com')).map((item) => item.id)).toEqual([a.contentId]);
    expect((await catalog.filterByType('youtube')).map((item) => item.id)).toEqual([b.contentId]);
  });

  it('looks up indexed and on-disk content', async () => {
    const { contentId, path: dir } = await catalog.ingest('https://example.com/a');
    const orphan = '0000000000000000';
    await fs.mkdir(path.join(home, 'library', orphan), { recursive: true });

    expect(await catalog.lookup(contentId)).toBe(dir);
    expect(await catalog.lookup(orphan)).toBe(path.join(home, 'library', orphan));
    expect(await catalog.lookup('ffffffffffffffff')).toBeNull();
    expect(await catalog.lookup('not-an-id')).toBeNull();
    expect(await catalog.listContentDirs()).toEqual([orphan, contentId].sort());
    expect(() => catalog.contentDir('../x')).toThrow(ContentNotFoundError);
  });

  it('removes index entries but keeps folders', async () => {
    const { contentId, path: dir } = await catalog.ingest('https://example.com/a');

    expect(await catalog.remove(contentId)).toBe(true);
    expect(await catalog.remove(contentId)).toBe(false);
    expect(await catalog.get(contentId)).toBeNull();
    expect((await fs.stat(dir)).isDirectory()).toBe(true);
  });

  it('deposits artifacts and records their digests', async () => {
    const { contentId, path: dir } = await catalog.ingest('https://example.com/a');

    await catalog.depositArtifacts(contentId, [{ name: 'fetch.md', content: 'one' }], 'run-1');
    const metadata = await catalog.depositArtifacts(contentId, [{ name: 'summary.md', content: 'two' }], 'run-2');

    expect(await fs.readFile(path.join(dir, 'fetch.md'), 'utf8')).toBe('one');
    expect(metadata).toMatchObject({
      content_id: contentId,
      run_id: 'run-2',
      created_at: '2026-01-01T00:00:02.000Z',
      updated_at: '2026-01-01T00:00:03.000Z',
      artifacts: ['fetch.md', 'summary.md'],
      artifact_digests: { 'fetch.md': computeDigest('one'), 'summary.md': computeDigest('two') },
    });
    expect(await readMetadata(dir)).toEqual(metadata);
    expect(await catalog.get(contentId)).toMatchObject({ artifacts: ['fetch.md', 'summary.md'], run_id: 'run-2' });
  });

  it('refuses deposits for unknown content', async () => {
    await expect(catalog.depositArtifacts('0123456789abcdef', [])).rejects.toBeInstanceOf(ContentNotFoundError);
  });

  it('fails loudly on a corrupt index', async () => {
    await fs.writeFile(path.join(home, 'catalog.json'), '{"version":2,"items":[]}');

    await expect(catalog.load()).rejects.toThrow(CatalogError);
  });
});
