import type { PipelineStep } from '../core/pipeline.js';

export interface AdapterRequest {
  runId: string;
  step: PipelineStep;
  input: string;
  timeoutMs: number;
  /** Directory relative paths in step input resolve against. */
  cwd: string;
}

/**
 * Runs one step: text in, text out. Rejects with `AdapterError` on failure or
 * timeout; those are retried per the step's policy.
 */
export type StepRunner = (request: AdapterRequest) => Promise<string>;

export interface AdapterSettings {
  fabricBinary: string;
  env?: NodeJS.ProcessEnv;
}
