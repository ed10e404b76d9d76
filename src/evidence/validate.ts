import * as path from 'node:path';
import { readMetadata } from '../library/metadata.js';
import { logInfo } from '../telemetry/logger.js';
import { readFileIfExists } from '../utils/atomic_write.js';
import { computeDigest } from '../utils/checksums.js';
import { EvidenceStore } from './evidence_log.js';
import { sliceDigest } from './spans.js';
import type { ArtifactValidation, Evidence } from './types.js';

export type StaleReason = 'hash_mismatch' | 'out_of_bounds' | 'artifact_missing';

export type RowValidation =
  | { id: string; artifact: string; status: 'valid' }
  | { id: string; artifact: string; status: 'stale'; reason: StaleReason }
  | { id: string; status: 'unresolved' };

export interface ValidationReport {
  content_id: string;
  valid_count: number;
  stale_count: number;
  unresolved_count: number;
  artifact_missing_count: number;
  artifacts: ArtifactValidation[];
  rows: RowValidation[];
}

export interface ValidateOptions {
  /** Rehash every span even when the whole-file digest matches. */
  forceSlowPath?: boolean;
  now?: () => Date;
}

type SpannedEvidence = Evidence & { span: NonNullable<Evidence['span']> };

function hasSpan(row: Evidence): row is SpannedEvidence {
  return row.span !== undefined;
}

export function checkSpan(row: SpannedEvidence, artifact: Buffer): RowValidation {
  const [start, end] = row.span.utf8_byte_offset;
  if (start > end || end > artifact.length) {
    return { id: row.id, artifact: row.span.artifact, status: 'stale', reason: 'out_of_bounds' };
  }
  if (sliceDigest(artifact, start, end) !== row.span.slice_sha256) {
    return { id: row.id, artifact: row.span.artifact, status: 'stale', reason: 'hash_mismatch' };
  }
  return { id: row.id, artifact: row.span.artifact, status: 'valid' };
}

/**
 * Reconcile evidence rows with the artifacts as they are now. A row whose
 * recorded `artifact_sha256` equals the artifact's current digest is valid
 * without per-span work; every other row has its span rehashed. `digest_ok`
 * reports whether the artifact still matches its last deposit in
 * `metadata.json`. Rows are never modified; the outcome is appended to the
 * content's audit log.
 */
export async function validateEvidence(contentDir: string, contentId: string, options: ValidateOptions = {}): Promise<ValidationReport> {
  const now = options.now ?? (() => new Date());
  const store = new EvidenceStore(contentDir);
  const rows = await store.readAll();
  const metadata = await readMetadata(contentDir);
  const recordedDigests = metadata?.artifact_digests ?? {};

  const byArtifact = new Map<string, SpannedEvidence[]>();
  const results: RowValidation[] = [];
  for (const row of rows) {
    if (!hasSpan(row)) {
      results.push({ id: row.id, status: 'unresolved' });
      continue;
    }
    const group = byArtifact.get(row.span.artifact) ?? [];
    group.push(row);
    byArtifact.set(row.span.artifact, group);
  }

  const artifacts: ArtifactValidation[] = [];
  for (const [artifactName, group] of [...byArtifact.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    const bytes = await readFileIfExists(path.join(contentDir, artifactName));
    if (!bytes) {
      for (const row of group) {
        results.push({ id: row.id, artifact: artifactName, status: 'stale', reason: 'artifact_missing' });
      }
      artifacts.push({ artifact: artifactName, digest_ok: false, missing: true, valid: 0, stale: group.length });
      continue;
    }

    const currentDigest = computeDigest(bytes);
    const digestOk = recordedDigests[artifactName] === currentDigest;
    const groupResults = group.map((row): RowValidation =>
      !options.forceSlowPath && row.span.artifact_sha256 === currentDigest
        ? { id: row.id, artifact: artifactName, status: 'valid' }
        : checkSpan(row, bytes));
    results.push(...groupResults);

    const valid = groupResults.filter((result) => result.status === 'valid').length;
    artifacts.push({ artifact: artifactName, digest_ok: digestOk, missing: false, valid, stale: group.length - valid });
  }

  const report: ValidationReport = {
    content_id: contentId,
    valid_count: results.filter((result) => result.status === 'valid').length,
    stale_count: results.filter((result) => result.status === 'stale').length,
    unresolved_count: results.filter((result) => result.status === 'unresolved').length,
    artifact_missing_count: artifacts.filter((artifact) => artifact.missing).length,
    artifacts,
    rows: results,
  };

  await store.appendAudit({
    type: 'EvidenceValidated',
    ts: now().toISOString(),
    content_id: contentId,
    valid_count: report.valid_count,
    stale_count: report.stale_count,
    unresolved_count: report.unresolved_count,
    artifact_missing_count: report.artifact_missing_count,
    artifacts,
  });
  logInfo('Evidence: validated', {
    contentId,
    valid: report.valid_count,
    stale: report.stale_count,
    unresolved: report.unresolved_count,
  });
  return report;
}
