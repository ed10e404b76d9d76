import { ExtractorOutputError } from '../core/errors.js';
import { ExtractedClaimSchema, type ExtractedClaim } from './types.js';

const CODE_FENCE = /^```[\w-]*\s*\n([\s\S]*?)\n?```\s*$/;

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = CODE_FENCE.exec(trimmed);
  return fenced ? (fenced[1] ?? '').trim() : trimmed;
}

function parseJsonDocument(body: string): unknown[] | null {
  let whole: unknown;
  try {
    whole = JSON.parse(body);
  } catch {
    // Not a single document; the caller falls back to JSON lines.
    return null;
  }
  if (Array.isArray(whole)) return whole;
  if (whole && typeof whole === 'object' && 'claims' in whole && Array.isArray(whole.claims)) {
    return whole.claims;
  }
  return [whole];
}

function parseJsonLines(body: string): unknown[] {
  const items: unknown[] = [];
  body.split('\n').forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    try {
      items.push(JSON.parse(trimmed));
    } catch (error) {
      throw new ExtractorOutputError(`Extractor output line ${index + 1} is not valid JSON`, {
        line: index + 1,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  });
  return items;
}

/**
 * Accepts a JSON array, `{ "claims": [...] }`, or one claim object per line,
 * optionally wrapped in a Markdown code fence.
 */
export function parseExtractedClaims(output: string): ExtractedClaim[] {
  const body = stripCodeFence(output);
  if (!body) return [];
  const items = parseJsonDocument(body) ?? parseJsonLines(body);

  return items.map((item, index) => {
    const parsed = ExtractedClaimSchema.safeParse(item);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ExtractorOutputError(`Extractor claim #${index + 1} is malformed`, {
        index,
        issue: issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'schema mismatch',
      });
    }
    return parsed.data;
  });
}
