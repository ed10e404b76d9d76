import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ContentNotFoundError } from '../../core/errors.js';
import { computeDigest } from '../../utils/checksums.js';
import { EvidenceStore } from '../evidence_log.js';
import { groundClaims, resolveClaim } from '../resolver.js';
import { computeEvidenceId } from '../spans.js';

const CONTENT_ID = '0123456789abcdef';
const ARTIFACT = 'Rain today. Rain tomorrow. Sun on Friday.';
const CLAIMS = JSON.stringify([
  { claim: 'sunny end of week', quote: 'Sun on Friday' },
  { claim: 'it rains', quote: 'Rain' },
  { claim: 'snow expected', quote: 'Snow' },
]);
const FIXED_NOW = (): Date => new Date('2026-02-03T04:05:06.000Z');

describe('resolveClaim', () => {
  it('stores offsets in the id of grounded rows only', () => {
    const artifact = Buffer.from(ARTIFACT);
    const base = { contentId: CONTENT_ID, artifactName: 'fetch.md', artifact, extractor: 'manual', ts: 't' };

    const resolved = resolveClaim({ ...base, claim: { claim: 'c', quote: 'Sun on Friday', confidence: 0.8 } });
    expect(resolved).toMatchObject({
      status: 'resolved',
      confidence: 0.8,
      quote_sha256: computeDigest('Sun on Friday'),
      span: { artifact: 'fetch.md', utf8_byte_offset: [27, 40], slice_sha256: computeDigest('Sun on Friday') },
    });
    expect(resolved.id).toBe(computeEvidenceId(CONTENT_ID, 'manual', computeDigest('Sun on Friday'), [27, 40]));

    const unresolved = resolveClaim({ ...base, claim: { claim: 'c', quote: 'Snow', confidence: 1 } });
    expect(unresolved.span).toBeUndefined();
    expect(unresolved.id).toBe(computeEvidenceId(CONTENT_ID, 'manual', computeDigest('Snow')));
  });
});

describe('groundClaims', () => {
  let contentDir: string;

  beforeEach(async () => {
    contentDir = await fs.mkdtemp(path.join(os.tmpdir(), 'provenant-resolver-'));
    await fs.writeFile(path.join(contentDir, 'fetch.md'), ARTIFACT);
  });

  afterEach(async () => {
    await fs.rm(contentDir, { recursive: true, force: true });
  });

  const input = () => ({
    contentDir,
    contentId: CONTENT_ID,
    artifactName: 'fetch.md',
    extractorOutput: CLAIMS,
    extractor: 'fabric:extract_claims_json',
    now: FIXED_NOW,
  });

  it('appends one row per claim with its resolution', async () => {
    const summary = await groundClaims(input());

    expect(summary).toMatchObject({ appended: 3, skipped: 0, resolved: 1, ambiguous: 1, unresolved: 1 });
    const store = new EvidenceStore(contentDir);
    const rows = await store.readAll();
    expect(rows.map((row) => row.status)).toEqual(['resolved', 'ambiguous', 'unresolved']);
    expect(rows[1]?.span?.utf8_byte_offset).toEqual([0, 4]);
    expect(rows[1]?.resolution).toEqual({ method: 'exact', match_count: 2, match_rank: 1, reason: 'multiple_matches' });

    const audit = await store.readAudit();
    expect(audit).toHaveLength(3);
    expect(audit[0]).toEqual({
      type: 'EvidenceAppended',
      ts: '2026-02-03T04:05:06.000Z',
      content_id: CONTENT_ID,
      evidence_id: rows[0]?.id,
      status: 'resolved',
      extractor: 'fabric:extract_claims_json',
    });
  });

  it('does not duplicate rows when grounding the same output again', async () => {
    await groundClaims(input());
    const again = await groundClaims(input());

    expect(again).toMatchObject({ appended: 0, skipped: 3 });
    expect(await new EvidenceStore(contentDir).readAll()).toHaveLength(3);
  });

  it('fails when the artifact is missing', async () => {
    await expect(groundClaims({ ...input(), artifactName: 'absent.md' })).rejects.toBeInstanceOf(ContentNotFoundError);
  });
});
