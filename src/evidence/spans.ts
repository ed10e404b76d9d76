import { computeDigest, computeShortHash } from '../utils/checksums.js';
import type { EvidenceStatus, Resolution, Span } from './types.js';

export const ANCHOR_WINDOW_BYTES = 80;
export const EVIDENCE_ID_LENGTH = 16;
const ELLIPSIS = '...';
const NEWLINE = 0x0a;
const TIMESTAMP_TOKEN = /\[(\d{1,2}(?::\d{1,2}){1,2})\]/g;

export type QuoteMatch =
  | { status: 'unresolved'; resolution: Resolution }
  | { status: Exclude<EvidenceStatus, 'unresolved'>; resolution: Resolution; start: number; end: number; occurrences: number[] };

/** Every byte offset where `needle` occurs, overlapping occurrences included. */
export function findOccurrences(haystack: Buffer, needle: Buffer): number[] {
  const offsets: number[] = [];
  if (needle.length === 0) return offsets;
  let from = 0;
  while (from <= haystack.length - needle.length) {
    const index = haystack.indexOf(needle, from);
    if (index === -1) break;
    offsets.push(index);
    from = index + 1;
  }
  return offsets;
}

/** NFC plus collapsed whitespace; case is preserved. */
export function normalizeForHint(text: string): string {
  return text.normalize('NFC').replace(/\s+/g, ' ').trim();
}

/**
 * Exact byte search. Ties go to the lowest offset. The normalized comparison
 * only annotates a miss and never yields a span.
 */
export function findQuote(artifact: Buffer, quote: string): QuoteMatch {
  const unresolved: QuoteMatch = {
    status: 'unresolved',
    resolution: { method: 'none', match_count: 0, match_rank: 0, reason: 'no_match' },
  };
  if (!quote.trim()) return unresolved;

  const needle = Buffer.from(quote, 'utf8');
  const occurrences = findOccurrences(artifact, needle);
  const [first] = occurrences;

  if (first === undefined) {
    const hint = normalizeForHint(quote);
    if (hint && normalizeForHint(artifact.toString('utf8')).includes(hint)) {
      return {
        status: 'unresolved',
        resolution: { method: 'normalized_hint', match_count: 0, match_rank: 0, reason: 'normalized_match_only' },
      };
    }
    return unresolved;
  }

  const end = first + needle.length;
  if (occurrences.length === 1) {
    return {
      status: 'resolved',
      resolution: { method: 'exact', match_count: 1, match_rank: 1 },
      start: first,
      end,
      occurrences,
    };
  }
  return {
    status: 'ambiguous',
    resolution: { method: 'exact', match_count: occurrences.length, match_rank: 1, reason: 'multiple_matches' },
    start: first,
    end,
    occurrences,
  };
}

function isContinuationByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

/**
 * About `ANCHOR_WINDOW_BYTES` of context centred on the span, widened to
 * whole UTF-8 characters, with `...` on truncated sides.
 */
export function buildAnchorText(artifact: Buffer, start: number, end: number): string {
  const remaining = Math.max(0, ANCHOR_WINDOW_BYTES - (end - start));
  const before = Math.floor(remaining / 2);
  const after = remaining - before;

  let anchorStart = Math.max(0, start - before);
  let anchorEnd = Math.min(artifact.length, end + after);
  while (anchorStart > 0 && isContinuationByte(artifact[anchorStart])) anchorStart -= 1;
  while (anchorEnd < artifact.length && isContinuationByte(artifact[anchorEnd])) anchorEnd += 1;

  const text = artifact.subarray(anchorStart, anchorEnd).toString('utf8');
  const prefix = anchorStart > 0 ? ELLIPSIS : '';
  const suffix = anchorEnd < artifact.length ? ELLIPSIS : '';
  return `${prefix}${text}${suffix}`;
}

/** Last `[H:MM:SS]` / `[MM:SS]` token before `offset`, without brackets. */
export function findPrecedingTimestamp(artifact: Buffer, offset: number): string | undefined {
  const before = artifact.subarray(0, offset).toString('utf8');
  let found: string | undefined;
  for (const match of before.matchAll(TIMESTAMP_TOKEN)) {
    found = match[1];
  }
  return found;
}

export interface LineColumn {
  line: number;
  column: number;
}

/** 1-indexed line (newlines before `offset`) and column (code points since line start). */
export function offsetToLineCol(artifact: Buffer, offset: number): LineColumn {
  const bounded = Math.max(0, Math.min(offset, artifact.length));
  let line = 1;
  let lineStart = 0;
  for (let index = 0; index < bounded; index++) {
    if (artifact[index] === NEWLINE) {
      line += 1;
      lineStart = index + 1;
    }
  }
  const column = [...artifact.subarray(lineStart, bounded).toString('utf8')].length + 1;
  return { line, column };
}

export function sliceDigest(artifact: Buffer, start: number, end: number): string {
  return computeDigest(artifact.subarray(start, end));
}

export function buildSpan(artifactName: string, artifact: Buffer, start: number, end: number): Span {
  const span: Span = {
    artifact: artifactName,
    utf8_byte_offset: [start, end],
    slice_sha256: sliceDigest(artifact, start, end),
    artifact_sha256: computeDigest(artifact),
    anchor_text: buildAnchorText(artifact, start, end),
  };
  const timestamp = findPrecedingTimestamp(artifact, start);
  if (timestamp) span.human_timestamp = timestamp;
  return span;
}

/**
 * `sha256(content_id ‖ extractor ‖ quote_sha256 [‖ start ‖ end])[0:16]`, offsets
 * as decimal strings with no separators.
 */
export function computeEvidenceId(
  contentId: string,
  extractor: string,
  quoteSha256: string,
  offsets?: readonly [number, number],
): string {
  const parts = [contentId, extractor, quoteSha256];
  if (offsets) parts.push(String(offsets[0]), String(offsets[1]));
  return computeShortHash(parts.join(''), EVIDENCE_ID_LENGTH);
}
