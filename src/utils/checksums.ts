import { createHash } from 'node:crypto';

export const DIGEST_PREFIX = 'sha256:';

export function sha256Hex(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Digest in the `sha256:<hex>` form stored in evidence rows and metadata.
 */
export function computeDigest(content: string | Uint8Array): string {
  return `${DIGEST_PREFIX}${sha256Hex(content)}`;
}

/**
 * Truncated hex digest used for identifiers (content ids, evidence ids,
 * idempotency keys).
 */
export function computeShortHash(content: string | Uint8Array, length = 16): string {
  return sha256Hex(content).slice(0, length);
}
