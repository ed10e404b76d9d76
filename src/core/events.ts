import { z } from 'zod';
import { PipelineDefinitionSchema } from './pipeline.js';

const SafetyLimitKindSchema = z.enum(['max_steps', 'max_input_bytes', 'max_output_bytes', 'run_timeout', 'denylist']);

const eventBase = {
  timestamp: z.string().datetime({ offset: true }),
  run_id: z.string().min(1),
};

const stepRef = {
  step: z.string().min(1),
  step_index: z.number().int().min(0),
};

export const EvidenceSummarySchema = z.object({
  appended: z.number().int().min(0),
  resolved: z.number().int().min(0),
  ambiguous: z.number().int().min(0),
  unresolved: z.number().int().min(0),
});

export type EvidenceSummary = z.infer<typeof EvidenceSummarySchema>;

export const RunEventSchema = z.discriminatedUnion('type', [
  z.object({
    ...eventBase,
    type: z.literal('RunStarted'),
    pipeline: z.string(),
    definition: PipelineDefinitionSchema,
    input_sha256: z.string(),
    input_bytes: z.number().int().min(0),
    source: z.string().optional(),
    title: z.string().optional(),
    tags: z.array(z.string()).optional(),
  }),
  z.object({
    ...eventBase,
    ...stepRef,
    type: z.literal('StepStarted'),
    attempt: z.number().int().min(1),
    idempotency_key: z.string(),
  }),
  z.object({
    ...eventBase,
    ...stepRef,
    type: z.literal('StepCompleted'),
    attempt: z.number().int().min(1),
    idempotency_key: z.string(),
    duration_ms: z.number().min(0),
    artifact: z.string(),
    output_sha256: z.string(),
    output_bytes: z.number().int().min(0),
  }),
  z.object({
    ...eventBase,
    ...stepRef,
    type: z.literal('StepFailed'),
    attempt: z.number().int().min(1),
    duration_ms: z.number().min(0),
    error: z.string(),
    final: z.boolean(),
  }),
  z.object({
    ...eventBase,
    ...stepRef,
    type: z.literal('StepRetrying'),
    attempt: z.number().int().min(1),
    delay_ms: z.number().min(0),
    error: z.string(),
  }),
  z.object({
    ...eventBase,
    type: z.literal('SafetyLimitReached'),
    limit: SafetyLimitKindSchema,
    message: z.string(),
    step: z.string().optional(),
  }),
  z.object({
    ...eventBase,
    type: z.literal('RunCompleted'),
    duration_ms: z.number().min(0),
    content_id: z.string().optional(),
    evidence: EvidenceSummarySchema.optional(),
  }),
  z.object({
    ...eventBase,
    type: z.literal('RunFailed'),
    error: z.string(),
    step: z.string().optional(),
    resumable: z.boolean(),
  }),
]);

export type RunEvent = z.infer<typeof RunEventSchema>;
export type RunEventType = RunEvent['type'];
export type RunEventOf<K extends RunEventType> = Extract<RunEvent, { type: K }>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Event payload as callers build it; the log stamps `timestamp` and `run_id`. */
export type RunEventInput = DistributiveOmit<RunEvent, 'timestamp' | 'run_id'>;

export function nowTimestamp(): string {
  return new Date().toISOString();
}
