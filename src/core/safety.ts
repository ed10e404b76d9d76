import { minimatch } from 'minimatch';
import { z } from 'zod';
import type { SafetyViolation } from './errors.js';

export const DEFAULT_DENYLIST_PATTERNS: readonly string[] = [
  '**/.env*',
  '**/secrets*',
  '**/*credential*',
  '**/*.pem',
  '**/*.key',
];

export interface SafetyLimits {
  max_steps: number;
  max_input_bytes: number;
  max_output_bytes: number;
  step_timeout_seconds: number;
  run_timeout_seconds: number;
  denylist_patterns: string[];
}

export const DEFAULT_SAFETY_LIMITS: SafetyLimits = {
  max_steps: 50,
  max_input_bytes: 10 * 1024 * 1024,
  max_output_bytes: 10 * 1024 * 1024,
  step_timeout_seconds: 300,
  run_timeout_seconds: 3600,
  denylist_patterns: [...DEFAULT_DENYLIST_PATTERNS],
};

export const SafetyLimitsOverrideSchema = z.object({
  max_steps: z.number().int().positive().optional(),
  max_input_bytes: z.number().int().positive().optional(),
  max_output_bytes: z.number().int().positive().optional(),
  step_timeout_seconds: z.number().positive().optional(),
  run_timeout_seconds: z.number().positive().optional(),
  denylist_patterns: z.array(z.string().min(1)).optional(),
}).strict();

export type SafetyLimitsOverride = z.infer<typeof SafetyLimitsOverrideSchema>;

export function mergeSafetyLimits(base: SafetyLimits, ...overrides: Array<SafetyLimitsOverride | undefined>): SafetyLimits {
  const merged: SafetyLimits = { ...base, denylist_patterns: [...base.denylist_patterns] };
  for (const override of overrides) {
    if (!override) continue;
    if (override.max_steps !== undefined) merged.max_steps = override.max_steps;
    if (override.max_input_bytes !== undefined) merged.max_input_bytes = override.max_input_bytes;
    if (override.max_output_bytes !== undefined) merged.max_output_bytes = override.max_output_bytes;
    if (override.step_timeout_seconds !== undefined) merged.step_timeout_seconds = override.step_timeout_seconds;
    if (override.run_timeout_seconds !== undefined) merged.run_timeout_seconds = override.run_timeout_seconds;
    if (override.denylist_patterns !== undefined) merged.denylist_patterns = [...override.denylist_patterns];
  }
  return merged;
}

const TOKEN_SPLIT = /[\s"'`<>()[\]{},;|=]+/;
const TRAILING_PUNCTUATION = /[.:!?]+$/;
const LEADING_ROOT = /^(?:\.\/|\/)+/;
const HAS_EXTENSION = /^[\w.-]*\.[A-Za-z0-9]+$/;

/**
 * Path-like tokens in free text: anything with a separator, a dotfile, or a
 * file extension. Plain words never qualify.
 */
export function extractPathCandidates(text: string): string[] {
  const candidates = new Set<string>();
  for (const rawToken of text.split(TOKEN_SPLIT)) {
    const token = rawToken.replace(TRAILING_PUNCTUATION, '').replace(LEADING_ROOT, '');
    if (!token) continue;
    if (token.includes('/') || token.includes('\\') || token.startsWith('.') || HAS_EXTENSION.test(token)) {
      candidates.add(token.replace(/\\/g, '/'));
    }
  }
  return [...candidates];
}

export interface DenylistMatch {
  pattern: string;
  candidate: string;
}

export function findDenylistMatch(text: string, patterns: readonly string[]): DenylistMatch | null {
  if (patterns.length === 0) return null;
  for (const candidate of extractPathCandidates(text)) {
    for (const pattern of patterns) {
      if (minimatch(candidate, pattern, { dot: true, matchBase: !pattern.includes('/') })) {
        return { pattern, candidate };
      }
    }
  }
  return null;
}

/**
 * Per-run limit accounting. Every check runs before the work it guards and
 * returns the violation instead of throwing, so the caller can record it.
 */
export class SafetyTracker {
  private readonly startedAt: number;

  constructor(
    readonly limits: SafetyLimits,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAt = now();
  }

  checkPipelineLength(stepCount: number): SafetyViolation | null {
    if (stepCount <= this.limits.max_steps) return null;
    return {
      limit: 'max_steps',
      message: `Pipeline has ${stepCount} steps, exceeding max_steps=${this.limits.max_steps}`,
    };
  }

  checkBeforeStep(step: string, input: string): SafetyViolation | null {
    const elapsedMs = this.now() - this.startedAt;
    if (elapsedMs > this.limits.run_timeout_seconds * 1000) {
      return {
        limit: 'run_timeout',
        step,
        message: `Run exceeded run_timeout_seconds=${this.limits.run_timeout_seconds} before step "${step}"`,
      };
    }
    const bytes = Buffer.byteLength(input, 'utf8');
    if (bytes > this.limits.max_input_bytes) {
      return {
        limit: 'max_input_bytes',
        step,
        message: `Input to step "${step}" is ${bytes} bytes, exceeding max_input_bytes=${this.limits.max_input_bytes}`,
      };
    }
    const denied = findDenylistMatch(input, this.limits.denylist_patterns);
    if (denied) {
      return {
        limit: 'denylist',
        step,
        message: `Input to step "${step}" references "${denied.candidate}" (denylist pattern ${denied.pattern})`,
      };
    }
    return null;
  }

  checkOutput(step: string, output: string): SafetyViolation | null {
    const bytes = Buffer.byteLength(output, 'utf8');
    if (bytes > this.limits.max_output_bytes) {
      return {
        limit: 'max_output_bytes',
        step,
        message: `Output of step "${step}" is ${bytes} bytes, exceeding max_output_bytes=${this.limits.max_output_bytes}`,
      };
    }
    const denied = findDenylistMatch(output, this.limits.denylist_patterns);
    if (denied) {
      return {
        limit: 'denylist',
        step,
        message: `Output of step "${step}" references "${denied.candidate}" (denylist pattern ${denied.pattern})`,
      };
    }
    return null;
  }

  /** Seconds a single adapter call may take: the step's own timeout, capped by the limit. */
  stepTimeoutSeconds(stepTimeout?: number): number {
    return Math.min(stepTimeout ?? this.limits.step_timeout_seconds, this.limits.step_timeout_seconds);
  }
}
