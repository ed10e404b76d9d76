import { z } from 'zod';

export const EvidenceStatusSchema = z.enum(['resolved', 'ambiguous', 'unresolved']);
export type EvidenceStatus = z.infer<typeof EvidenceStatusSchema>;

export const ResolutionSchema = z.object({
  method: z.enum(['exact', 'none', 'normalized_hint']),
  match_count: z.number().int().min(0),
  match_rank: z.number().int().min(0),
  reason: z.enum(['no_match', 'multiple_matches', 'normalized_match_only']).optional(),
});
export type Resolution = z.infer<typeof ResolutionSchema>;

export const SpanSchema = z.object({
  artifact: z.string().min(1),
  utf8_byte_offset: z.tuple([z.number().int().min(0), z.number().int().min(0)]),
  slice_sha256: z.string(),
  /** Whole-file digest of the artifact the span was resolved against. */
  artifact_sha256: z.string().optional(),
  anchor_text: z.string().optional(),
  human_timestamp: z.string().optional(),
});
export type Span = z.infer<typeof SpanSchema>;

export const EvidenceSchema = z.object({
  id: z.string().min(1),
  content_id: z.string().min(1),
  claim: z.string(),
  quote: z.string(),
  quote_sha256: z.string(),
  status: EvidenceStatusSchema,
  resolution: ResolutionSchema,
  span: SpanSchema.optional(),
  confidence: z.number().min(0).max(1),
  extractor: z.string().min(1),
  ts: z.string(),
}).superRefine((row, ctx) => {
  const hasSpan = row.span !== undefined;
  const needsSpan = row.status !== 'unresolved';
  if (hasSpan !== needsSpan) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['span'],
      message: needsSpan ? `status ${row.status} requires a span` : 'unresolved evidence must not carry a span',
    });
  }
});
export type Evidence = z.infer<typeof EvidenceSchema>;

export const ArtifactValidationSchema = z.object({
  artifact: z.string(),
  digest_ok: z.boolean(),
  missing: z.boolean(),
  valid: z.number().int().min(0),
  stale: z.number().int().min(0),
});
export type ArtifactValidation = z.infer<typeof ArtifactValidationSchema>;

/** Per-content audit trail in `<content>/events.jsonl`. */
export const EvidenceAuditEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('EvidenceAppended'),
    ts: z.string(),
    content_id: z.string(),
    evidence_id: z.string(),
    status: EvidenceStatusSchema,
    extractor: z.string(),
  }),
  z.object({
    type: z.literal('EvidenceValidated'),
    ts: z.string(),
    content_id: z.string(),
    valid_count: z.number().int().min(0),
    stale_count: z.number().int().min(0),
    unresolved_count: z.number().int().min(0),
    artifact_missing_count: z.number().int().min(0),
    artifacts: z.array(ArtifactValidationSchema),
  }),
  z.object({
    type: z.literal('EntitiesGrounded'),
    ts: z.string(),
    content_id: z.string(),
    artifact: z.string(),
    extractor: z.string(),
    entity_count: z.number().int().min(0),
    mention_count: z.number().int().min(0),
  }),
]);
export type EvidenceAuditEvent = z.infer<typeof EvidenceAuditEventSchema>;

/** Claim as an extractor emits it. */
export const ExtractedClaimSchema = z.object({
  claim: z.string().min(1),
  quote: z.string(),
  confidence: z.number().min(0).max(1).default(1),
});
export type ExtractedClaim = z.infer<typeof ExtractedClaimSchema>;
