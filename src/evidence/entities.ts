import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { ContentNotFoundError, ExtractorOutputError, errorMessage } from '../core/errors.js';
import { writeJsonAtomic } from '../utils/atomic_write.js';
import { computeDigest } from '../utils/checksums.js';
import { stripCodeFence } from './claims.js';
import { EvidenceStore } from './evidence_log.js';
import { buildSpan, findQuote } from './spans.js';
import { EvidenceStatusSchema, ResolutionSchema, SpanSchema } from './types.js';

export const ENTITIES_FILE = 'entities.json';

const ExtractedMentionSchema = z.union([
  z.string(),
  z.object({ quote: z.string() }).transform((mention) => mention.quote),
]);

const ExtractedEntitySchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  confidence: z.number().min(0).max(1).default(1),
  mentions: z.array(ExtractedMentionSchema).default([]),
});

const ExtractedEntitiesSchema = z.union([
  z.array(ExtractedEntitySchema),
  z.object({ entities: z.array(ExtractedEntitySchema) }).transform((doc) => doc.entities),
]);

export const EntityMentionSchema = z.object({
  quote: z.string(),
  quote_sha256: z.string(),
  status: EvidenceStatusSchema,
  resolution: ResolutionSchema,
  span: SpanSchema.optional(),
});
export type EntityMention = z.infer<typeof EntityMentionSchema>;

export const EntitiesFileSchema = z.object({
  schema_version: z.literal(1),
  extracted_by: z.string(),
  extracted_at: z.string(),
  entities: z.array(z.object({
    name: z.string(),
    type: z.string(),
    confidence: z.number(),
    mentions: z.array(EntityMentionSchema),
  })),
});
export type EntitiesFile = z.infer<typeof EntitiesFileSchema>;

export function parseExtractedEntities(output: string): z.infer<typeof ExtractedEntitiesSchema> {
  const body = stripCodeFence(output);
  if (!body) return [];
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new ExtractorOutputError('Entity extractor output is not valid JSON', { reason: errorMessage(error) });
  }
  const parsed = ExtractedEntitiesSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ExtractorOutputError('Entity extractor output is malformed', {
      issue: issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'schema mismatch',
    });
  }
  return parsed.data;
}

export function resolveMention(artifactName: string, artifact: Buffer, quote: string): EntityMention {
  const match = findQuote(artifact, quote);
  const mention: EntityMention = {
    quote,
    quote_sha256: computeDigest(quote),
    status: match.status,
    resolution: match.resolution,
  };
  if (match.status !== 'unresolved') {
    mention.span = buildSpan(artifactName, artifact, match.start, match.end);
  }
  return mention;
}

export interface GroundEntitiesInput {
  contentDir: string;
  contentId: string;
  artifactName: string;
  extractorOutput: string;
  extractor: string;
  now?: () => Date;
}

/** Resolve every entity mention and replace `entities.json` with the result. */
export async function groundEntities(input: GroundEntitiesInput): Promise<EntitiesFile> {
  const now = input.now ?? (() => new Date());
  let artifact: Buffer;
  try {
    artifact = await fs.readFile(path.join(input.contentDir, input.artifactName));
  } catch (error) {
    throw new ContentNotFoundError(`${input.contentId}/${input.artifactName} (${errorMessage(error)})`);
  }

  const extracted = parseExtractedEntities(input.extractorOutput);
  const file: EntitiesFile = {
    schema_version: 1,
    extracted_by: input.extractor,
    extracted_at: now().toISOString(),
    entities: extracted.map((entity) => ({
      name: entity.name,
      type: entity.type,
      confidence: entity.confidence,
      mentions: [...new Set(entity.mentions)].map((quote) => resolveMention(input.artifactName, artifact, quote)),
    })),
  };

  await writeJsonAtomic(path.join(input.contentDir, ENTITIES_FILE), file);
  await new EvidenceStore(input.contentDir).appendAudit({
    type: 'EntitiesGrounded',
    ts: file.extracted_at,
    content_id: input.contentId,
    artifact: input.artifactName,
    extractor: input.extractor,
    entity_count: file.entities.length,
    mention_count: file.entities.reduce((total, entity) => total + entity.mentions.length, 0),
  });
  return file;
}
