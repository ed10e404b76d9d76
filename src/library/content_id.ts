import { computeShortHash } from '../utils/checksums.js';

export const CONTENT_ID_LENGTH = 16;

const CONTENT_ID_PATTERN = /^[0-9a-f]{16}$/;

export type ContentType = 'web' | 'youtube' | 'other';

export function canonicalizeSource(source: string): string {
  return source.trim();
}

/** `sha256(canonical source)` as hex, first 16 characters. */
export function computeContentId(source: string): string {
  return computeShortHash(canonicalizeSource(source), CONTENT_ID_LENGTH);
}

export function isContentId(value: string): boolean {
  return CONTENT_ID_PATTERN.test(value);
}

export function detectContentType(source: string): ContentType {
  let url: URL;
  try {
    url = new URL(canonicalizeSource(source));
  } catch {
    return 'other';
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return 'other';
  const host = url.hostname.toLowerCase().replace(/^www\./, '');
  if (host === 'youtube.com' || host === 'm.youtube.com' || host === 'youtu.be') return 'youtube';
  return 'web';
}
