import * as path from 'node:path';
import { execa } from 'execa';
import { EvidenceNotFoundError, errorMessage } from '../core/errors.js';
import type { ContentCatalog } from '../library/catalog.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { readFileIfExists } from '../utils/atomic_write.js';
import { EvidenceStore } from './evidence_log.js';
import { offsetToLineCol, sliceDigest } from './spans.js';
import type { Evidence } from './types.js';

export const MIN_PREFIX_LENGTH = 4;
export const MAX_SNIPPET_LINES = 5;
const EDITOR_TIMEOUT_MS = 10_000;

export interface FoundEvidence {
  evidence: Evidence;
  contentDir: string;
}

/**
 * Find a row by id across every content folder. A unique prefix of at least
 * `MIN_PREFIX_LENGTH` characters also matches.
 */
export async function findEvidence(catalog: ContentCatalog, idOrPrefix: string): Promise<FoundEvidence> {
  const needle = idOrPrefix.trim().toLowerCase();
  if (needle.length < MIN_PREFIX_LENGTH) {
    throw new EvidenceNotFoundError(idOrPrefix, `id must have at least ${MIN_PREFIX_LENGTH} characters`);
  }

  const prefixMatches = new Map<string, FoundEvidence>();
  for (const contentId of await catalog.listContentDirs()) {
    const contentDir = catalog.contentDir(contentId);
    for (const evidence of await new EvidenceStore(contentDir).readAll()) {
      if (evidence.id === needle) return { evidence, contentDir };
      if (evidence.id.startsWith(needle)) prefixMatches.set(evidence.id, { evidence, contentDir });
    }
  }

  const candidates = [...prefixMatches.values()];
  const [only] = candidates;
  if (candidates.length === 1 && only) return only;
  if (candidates.length > 1) {
    throw new EvidenceNotFoundError(idOrPrefix, `prefix matches ${candidates.length} rows`);
  }
  throw new EvidenceNotFoundError(idOrPrefix);
}

export interface EvidenceLocation {
  evidence: Evidence;
  contentDir: string;
  artifactPath?: string;
  line?: number;
  column?: number;
  snippet?: string[];
  /** The span ends past the artifact; no position is reported. */
  outOfBounds?: boolean;
  /** Whether the recorded span still hashes to `slice_sha256`; undefined without a span or artifact. */
  sliceIntact?: boolean;
}

export async function locateEvidence(found: FoundEvidence): Promise<EvidenceLocation> {
  const { evidence, contentDir } = found;
  if (!evidence.span) return { evidence, contentDir };

  const artifactPath = path.join(contentDir, evidence.span.artifact);
  const bytes = await readFileIfExists(artifactPath);
  if (!bytes) return { evidence, contentDir, artifactPath };

  const [start, end] = evidence.span.utf8_byte_offset;
  if (start > end || end > bytes.length) {
    return { evidence, contentDir, artifactPath, outOfBounds: true, sliceIntact: false };
  }
  const { line, column } = offsetToLineCol(bytes, start);
  return {
    evidence,
    contentDir,
    artifactPath,
    line,
    column,
    snippet: bytes.subarray(start, end).toString('utf8').split('\n').slice(0, MAX_SNIPPET_LINES),
    sliceIntact: sliceDigest(bytes, start, end) === evidence.span.slice_sha256,
  };
}

export function renderEvidence(location: EvidenceLocation): string {
  const { evidence } = location;
  const lines = [
    `Evidence ${evidence.id}`,
    `  Content:    ${evidence.content_id}`,
    `  Claim:      ${evidence.claim}`,
    `  Status:     ${evidence.status} (${evidence.resolution.method}, ${evidence.resolution.match_rank}/${evidence.resolution.match_count}${evidence.resolution.reason ? `, ${evidence.resolution.reason}` : ''})`,
    `  Confidence: ${evidence.confidence}`,
    `  Extractor:  ${evidence.extractor}`,
  ];
  const span = evidence.span;
  if (!span) {
    lines.push(`  Quote:      ${JSON.stringify(evidence.quote)}`);
    return lines.join('\n');
  }

  const [start, end] = span.utf8_byte_offset;
  lines.push(`  Artifact:   ${span.artifact} bytes [${start}, ${end})`);
  if (location.line !== undefined && location.column !== undefined) {
    lines.push(`  Location:   ${location.artifactPath}:${location.line}:${location.column}`);
  } else if (location.outOfBounds) {
    lines.push(`  Location:   ${location.artifactPath} (span past end of artifact)`);
  } else {
    lines.push('  Location:   artifact missing');
  }
  if (span.human_timestamp) lines.push(`  Timestamp:  [${span.human_timestamp}]`);
  if (location.sliceIntact === false) lines.push('  Drift:      span no longer matches slice_sha256');
  if (location.snippet && location.snippet.length > 0) {
    lines.push('  Snippet:');
    for (const snippetLine of location.snippet) lines.push(`    | ${snippetLine}`);
  }
  if (span.anchor_text) lines.push(`  Anchor:     ${JSON.stringify(span.anchor_text)}`);
  return lines.join('\n');
}

export interface OpenResult {
  opened: boolean;
  target?: string;
  reason?: string;
}

/**
 * Open the span in an editor with `<editor> -g file:line:col`. Reports
 * `opened: false` when the editor cannot be launched; callers print the
 * location instead.
 */
export async function openEvidence(location: EvidenceLocation, editorCommand: string): Promise<OpenResult> {
  if (!location.artifactPath || location.line === undefined || location.column === undefined) {
    const reason = !location.evidence.span
      ? 'evidence is unresolved'
      : location.outOfBounds ? 'span past end of artifact' : 'artifact missing';
    return { opened: false, reason };
  }
  const target = `${location.artifactPath}:${location.line}:${location.column}`;
  try {
    const result = await execa(editorCommand, ['-g', target], { reject: false, timeout: EDITOR_TIMEOUT_MS });
    if (result.failed || Number(result.exitCode ?? 1) !== 0) {
      logDebug('Editor launch failed', { editor: editorCommand, exitCode: result.exitCode });
      return { opened: false, target, reason: `${editorCommand} exited unsuccessfully` };
    }
    return { opened: true, target };
  } catch (error) {
    logWarning('Editor launch failed', { editor: editorCommand, error: errorMessage(error) });
    return { opened: false, target, reason: errorMessage(error) };
  }
}
