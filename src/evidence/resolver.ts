import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ContentNotFoundError, errorMessage } from '../core/errors.js';
import { logInfo } from '../telemetry/logger.js';
import { computeDigest } from '../utils/checksums.js';
import { parseExtractedClaims } from './claims.js';
import { EvidenceStore } from './evidence_log.js';
import { buildSpan, computeEvidenceId, findQuote } from './spans.js';
import type { Evidence, ExtractedClaim } from './types.js';

export interface ResolveClaimInput {
  contentId: string;
  artifactName: string;
  artifact: Buffer;
  claim: ExtractedClaim;
  extractor: string;
  ts: string;
}

/** Ground one claim against an artifact. Never throws for an unfindable quote. */
export function resolveClaim(input: ResolveClaimInput): Evidence {
  const { contentId, artifactName, artifact, claim, extractor, ts } = input;
  const quoteSha256 = computeDigest(claim.quote);
  const match = findQuote(artifact, claim.quote);

  const base = {
    content_id: contentId,
    claim: claim.claim,
    quote: claim.quote,
    quote_sha256: quoteSha256,
    confidence: claim.confidence,
    extractor,
    ts,
  };

  if (match.status === 'unresolved') {
    return {
      id: computeEvidenceId(contentId, extractor, quoteSha256),
      ...base,
      status: 'unresolved',
      resolution: match.resolution,
    };
  }
  return {
    id: computeEvidenceId(contentId, extractor, quoteSha256, [match.start, match.end]),
    ...base,
    status: match.status,
    resolution: match.resolution,
    span: buildSpan(artifactName, artifact, match.start, match.end),
  };
}

export interface GroundingSummary {
  appended: number;
  skipped: number;
  resolved: number;
  ambiguous: number;
  unresolved: number;
  evidence: Evidence[];
}

export interface GroundClaimsInput {
  contentDir: string;
  contentId: string;
  artifactName: string;
  extractorOutput: string;
  extractor: string;
  now?: () => Date;
}

/**
 * Parse an extractor's output, resolve every claim against the artifact and
 * append rows whose id is not yet in the log. Re-grounding the same claims
 * against an unchanged artifact appends nothing.
 */
export async function groundClaims(input: GroundClaimsInput): Promise<GroundingSummary> {
  const now = input.now ?? (() => new Date());
  const artifactPath = path.join(input.contentDir, input.artifactName);
  let artifact: Buffer;
  try {
    artifact = await fs.readFile(artifactPath);
  } catch (error) {
    throw new ContentNotFoundError(`${input.contentId}/${input.artifactName} (${errorMessage(error)})`);
  }

  const claims = parseExtractedClaims(input.extractorOutput);
  const store = new EvidenceStore(input.contentDir);
  const known = new Set((await store.readAll()).map((row) => row.id));
  const summary: GroundingSummary = { appended: 0, skipped: 0, resolved: 0, ambiguous: 0, unresolved: 0, evidence: [] };

  for (const claim of claims) {
    const ts = now().toISOString();
    const row = resolveClaim({
      contentId: input.contentId,
      artifactName: input.artifactName,
      artifact,
      claim,
      extractor: input.extractor,
      ts,
    });
    summary.evidence.push(row);
    summary[row.status] += 1;
    if (known.has(row.id)) {
      summary.skipped += 1;
      continue;
    }
    known.add(row.id);
    await store.append(row);
    await store.appendAudit({
      type: 'EvidenceAppended',
      ts,
      content_id: input.contentId,
      evidence_id: row.id,
      status: row.status,
      extractor: input.extractor,
    });
    summary.appended += 1;
  }

  logInfo('Evidence: grounded claims', {
    contentId: input.contentId,
    artifact: input.artifactName,
    appended: summary.appended,
    skipped: summary.skipped,
    unresolved: summary.unresolved,
  });
  return summary;
}
