import { describe, expect, it } from 'vitest';
import { computeDigest, computeShortHash } from '../../utils/checksums.js';
import {
  buildAnchorText,
  buildSpan,
  computeEvidenceId,
  findOccurrences,
  findPrecedingTimestamp,
  findQuote,
  normalizeForHint,
  offsetToLineCol,
} from '../spans.js';

const buf = (text: string): Buffer => Buffer.from(text, 'utf8');

describe('findQuote', () => {
  it('resolves a unique exact match to its byte range', () => {
    expect(findQuote(buf('hello world'), 'world')).toEqual({
      status: 'resolved',
      resolution: { method: 'exact', match_count: 1, match_rank: 1 },
      start: 6,
      end: 11,
      occurrences: [6],
    });
  });

  it('counts offsets in UTF-8 bytes', () => {
    const match = findQuote(buf('café au lait'), 'au');
    expect(match).toMatchObject({ status: 'resolved', start: 6, end: 8 });
  });

  it('picks the first of several matches and marks the row ambiguous', () => {
    const quote = '0123456789';
    const artifact = buf(`${'x'.repeat(10)}${quote}${'y'.repeat(30)}${quote}zz`);

    for (let attempt = 0; attempt < 3; attempt++) {
      expect(findQuote(artifact, quote)).toEqual({
        status: 'ambiguous',
        resolution: { method: 'exact', match_count: 2, match_rank: 1, reason: 'multiple_matches' },
        start: 10,
        end: 20,
        occurrences: [10, 50],
      });
    }
  });

  it('annotates whitespace-only differences without producing a span', () => {
    expect(findQuote(buf('the  sky\nis blue'), 'the sky is blue')).toEqual({
      status: 'unresolved',
      resolution: { method: 'normalized_hint', match_count: 0, match_rank: 0, reason: 'normalized_match_only' },
    });
  });

  it('leaves absent and blank quotes unresolved', () => {
    const unresolved = {
      status: 'unresolved',
      resolution: { method: 'none', match_count: 0, match_rank: 0, reason: 'no_match' },
    };
    expect(findQuote(buf('hello'), 'goodbye')).toEqual(unresolved);
    expect(findQuote(buf('hello'), '  \n')).toEqual(unresolved);
  });

  it('is case sensitive', () => {
    expect(findQuote(buf('The Sky'), 'the sky').status).toBe('unresolved');
  });
});

describe('span helpers', () => {
  it('finds overlapping occurrences', () => {
    expect(findOccurrences(buf('aaaa'), buf('aa'))).toEqual([0, 1, 2]);
    expect(findOccurrences(buf('aaaa'), buf(''))).toEqual([]);
  });

  it('normalizes composed characters and whitespace for hints', () => {
    expect(normalizeForHint('  café \t au\nlait ')).toBe('café au lait');
  });

  it('centres the anchor window and marks truncated sides', () => {
    const artifact = buf(`${'a'.repeat(100)}QUOTE${'b'.repeat(100)}`);
    expect(buildAnchorText(artifact, 100, 105)).toBe(`...${'a'.repeat(37)}QUOTE${'b'.repeat(38)}...`);
    expect(buildAnchorText(buf('short text'), 0, 5)).toBe('short text');
  });

  it('widens the anchor to whole characters', () => {
    const artifact = buf(`${'é'.repeat(60)}X`);
    expect(buildAnchorText(artifact, 120, 121)).toBe(`...${'é'.repeat(20)}X`);
  });

  it('returns the last timestamp token before the offset', () => {
    const artifact = buf('[00:01] intro [1:02:03] main point [2:00:00]');
    expect(findPrecedingTimestamp(artifact, 30)).toBe('1:02:03');
    expect(findPrecedingTimestamp(artifact, 3)).toBeUndefined();
  });

  it('maps byte offsets to line and code point column', () => {
    const artifact = buf('ab\ncé d');
    expect(offsetToLineCol(artifact, 0)).toEqual({ line: 1, column: 1 });
    expect(offsetToLineCol(artifact, 7)).toEqual({ line: 2, column: 4 });
  });

  it('builds spans whose slice hash matches the quote', () => {
    const artifact = buf('[0:05] hello world');
    const span = buildSpan('a.md', artifact, 13, 18);
    expect(span).toEqual({
      artifact: 'a.md',
      utf8_byte_offset: [13, 18],
      slice_sha256: computeDigest('world'),
      artifact_sha256: computeDigest('[0:05] hello world'),
      anchor_text: '[0:05] hello world',
      human_timestamp: '0:05',
    });
  });

  it('derives evidence ids from their inputs', () => {
    expect(computeEvidenceId('c', 'e', 'q', [1, 2])).toBe(computeShortHash('ceq12'));
    expect(computeEvidenceId('c', 'e', 'q')).toBe(computeShortHash('ceq'));
    expect(computeEvidenceId('c', 'e', 'q')).toHaveLength(16);
  });
});
