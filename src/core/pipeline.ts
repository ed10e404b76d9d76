import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { isErrno } from '../utils/atomic_write.js';
import { PipelineDefinitionError } from './errors.js';
import { SafetyLimitsOverrideSchema } from './safety.js';

export const RetryPolicySchema = z.object({
  max_attempts: z.number().int().min(1).default(3),
  initial_delay_ms: z.number().int().min(0).default(1000),
  max_delay_ms: z.number().int().min(0).default(30_000),
  backoff_multiplier: z.number().min(1).default(2),
}).strict();

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = RetryPolicySchema.parse({});

/**
 * Backoff before `attempt` (1-indexed): `initial * multiplier^(attempt-1)`,
 * capped at `max_delay_ms`.
 */
export function retryDelayMs(policy: RetryPolicy, attempt: number): number {
  if (attempt <= 1) return Math.min(policy.initial_delay_ms, policy.max_delay_ms);
  const delay = policy.initial_delay_ms * Math.pow(policy.backoff_multiplier, attempt - 1);
  return Math.min(Math.round(delay), policy.max_delay_ms);
}

export function shouldRetry(policy: RetryPolicy, attempt: number): boolean {
  return attempt < policy.max_attempts;
}

export const ArtifactTypeSchema = z.enum([
  'step_output',
  'transcript',
  'wisdom',
  'summary',
  'task_list',
  'document_reference',
  'claims',
  'entities',
]);

export type ArtifactType = z.infer<typeof ArtifactTypeSchema>;

export const InputSourceSchema = z.union([
  z.literal('previous'),
  z.literal('pipeline_input'),
  z.object({ step: z.string().min(1) }).strict(),
  z.object({ static: z.string() }).strict(),
]);

export type InputSource = z.infer<typeof InputSourceSchema>;

export const EvidenceConfigSchema = z.object({
  kind: z.enum(['claims', 'entities']),
  /** Step whose artifact the extracted quotes are grounded against. */
  artifact: z.string().min(1),
  extractor: z.string().min(1).optional(),
}).strict();

export type EvidenceConfig = z.infer<typeof EvidenceConfigSchema>;

const STEP_NAME_PATTERN = /^[A-Za-z0-9][\w.-]*$/;

const stepBase = {
  name: z.string().trim().min(1, 'step name must not be empty')
    .regex(STEP_NAME_PATTERN, 'step name may only contain letters, digits, ".", "_" and "-"'),
  description: z.string().optional(),
  input_from: InputSourceSchema.default('previous'),
  retry_policy: RetryPolicySchema.optional(),
  timeout_seconds: z.number().positive().optional(),
  artifact_type: ArtifactTypeSchema.default('step_output'),
  evidence: EvidenceConfigSchema.optional(),
};

export const BuiltinActionSchema = z.enum(['identity', 'read_file', 'normalize_whitespace']);
export type BuiltinAction = z.infer<typeof BuiltinActionSchema>;

export const PipelineStepSchema = z.discriminatedUnion('adapter', [
  z.object({
    ...stepBase,
    adapter: z.literal('builtin'),
    action: BuiltinActionSchema,
  }).strict(),
  z.object({
    ...stepBase,
    adapter: z.literal('fabric'),
    pattern: z.string().min(1),
    model: z.string().min(1).optional(),
  }).strict(),
  z.object({
    ...stepBase,
    adapter: z.literal('exec'),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
  }).strict(),
]);

export type PipelineStep = z.infer<typeof PipelineStepSchema>;

export const PipelineDefinitionSchema = z.object({
  name: z.string().trim().min(1, 'pipeline name must not be empty'),
  description: z.string().optional(),
  safety_limits: SafetyLimitsOverrideSchema.optional(),
  steps: z.array(PipelineStepSchema).min(1, 'pipeline must have at least one step'),
}).strict();

export type PipelineDefinition = z.infer<typeof PipelineDefinitionSchema>;

export function stepRetryPolicy(step: PipelineStep): RetryPolicy {
  return step.retry_policy ?? DEFAULT_RETRY_POLICY;
}

/**
 * Structural checks zod cannot express: unique names and references that
 * only point backwards.
 */
export function checkPipelineReferences(definition: PipelineDefinition): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  definition.steps.forEach((step, index) => {
    if (seen.has(step.name)) {
      issues.push(`steps[${index}]: duplicate step name "${step.name}"`);
    }
    const from = step.input_from;
    if (typeof from === 'object' && 'step' in from && !seen.has(from.step)) {
      issues.push(`steps[${index}] "${step.name}": input_from references "${from.step}", which is not an earlier step`);
    }
    if (step.evidence && !seen.has(step.evidence.artifact)) {
      issues.push(`steps[${index}] "${step.name}": evidence.artifact references "${step.evidence.artifact}", which is not an earlier step`);
    }
    seen.add(step.name);
  });

  return issues;
}

export function parsePipeline(raw: unknown, source = '<inline>'): PipelineDefinition {
  const result = PipelineDefinitionSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new PipelineDefinitionError(`Invalid pipeline definition in ${source}`, issues);
  }
  const issues = checkPipelineReferences(result.data);
  if (issues.length > 0) {
    throw new PipelineDefinitionError(`Invalid pipeline definition in ${source}`, issues);
  }
  return result.data;
}

/**
 * Candidate files for a pipeline reference: an explicit path first, then
 * `<dir>/<name>.json` in each search directory.
 */
export function pipelineCandidates(reference: string, searchDirs: readonly string[], cwd: string): string[] {
  const candidates: string[] = [];
  if (reference.endsWith('.json') || reference.includes('/') || reference.includes(path.sep)) {
    candidates.push(path.resolve(cwd, reference));
  }
  for (const dir of searchDirs) {
    candidates.push(path.resolve(cwd, dir, `${reference}.json`));
  }
  return candidates;
}

export interface LoadedPipeline {
  definition: PipelineDefinition;
  path: string;
}

export async function loadPipeline(reference: string, searchDirs: readonly string[], cwd = process.cwd()): Promise<LoadedPipeline> {
  const candidates = pipelineCandidates(reference, searchDirs, cwd);
  for (const candidate of candidates) {
    let raw: string;
    try {
      raw = await fs.readFile(candidate, 'utf8');
    } catch (error) {
      if (isErrno(error, 'ENOENT') || isErrno(error, 'EISDIR')) continue;
      throw error;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PipelineDefinitionError(`Pipeline file ${candidate} is not valid JSON`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }
    return { definition: parsePipeline(json, candidate), path: candidate };
  }
  throw new PipelineDefinitionError(`Pipeline "${reference}" not found`, candidates.map((candidate) => `looked in ${candidate}`));
}
