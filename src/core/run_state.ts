import { EventLogError, type SafetyLimitKind } from './errors.js';
import type { EvidenceSummary, RunEvent } from './events.js';
import type { PipelineDefinition } from './pipeline.js';

export type StepStatus = 'pending' | 'running' | 'completed' | 'failed' | 'retrying';

export type RunStatus =
  | { state: 'running' }
  | { state: 'completed' }
  | { state: 'failed'; error: string; resumable: boolean; step?: string }
  | { state: 'safety_limit_reached'; limit: SafetyLimitKind; message: string; step?: string };

export interface StepRecord {
  name: string;
  index: number;
  status: StepStatus;
  attempts: number;
  artifact?: string;
  output_sha256?: string;
  duration_ms?: number;
  error?: string;
}

export interface RunState {
  run_id: string;
  pipeline: string;
  definition: PipelineDefinition;
  input_sha256: string;
  source?: string;
  title?: string;
  tags?: string[];
  started_at: string;
  completed_at?: string;
  status: RunStatus;
  steps: StepRecord[];
  /** Number of completed steps; also the index of the next step to run. */
  current_step: number;
  last_completed_index: number;
  content_id?: string;
  evidence?: EvidenceSummary;
  event_count: number;
  /** The log ended in a corrupt record that replay dropped. */
  truncated: boolean;
}

/**
 * Fold a run's events into its state. Pure: the same events always yield
 * the same state.
 */
export function replayRunState(runId: string, events: readonly RunEvent[], truncated = false): RunState {
  const [first, ...rest] = events;
  if (!first || first.type !== 'RunStarted') {
    throw new EventLogError(`Run ${runId} log does not begin with RunStarted`, { runId });
  }

  const state: RunState = {
    run_id: runId,
    pipeline: first.pipeline,
    definition: first.definition,
    input_sha256: first.input_sha256,
    source: first.source,
    title: first.title,
    tags: first.tags,
    started_at: first.timestamp,
    status: { state: 'running' },
    steps: first.definition.steps.map((step, index) => ({
      name: step.name,
      index,
      status: 'pending',
      attempts: 0,
    })),
    current_step: 0,
    last_completed_index: -1,
    event_count: events.length,
    truncated,
  };

  for (const event of rest) {
    applyEvent(state, event);
  }
  return state;
}

function stepAt(state: RunState, index: number, name: string): StepRecord {
  const step = state.steps[index];
  if (!step || step.name !== name) {
    throw new EventLogError(`Run ${state.run_id} references unknown step ${name}@${index}`, {
      runId: state.run_id,
      step: name,
      index,
    });
  }
  return step;
}

function applyEvent(state: RunState, event: RunEvent): void {
  switch (event.type) {
    case 'RunStarted':
      throw new EventLogError(`Run ${state.run_id} has a second RunStarted event`, { runId: state.run_id });
    case 'StepStarted': {
      const step = stepAt(state, event.step_index, event.step);
      step.status = 'running';
      step.attempts = Math.max(step.attempts, event.attempt);
      // A step starting after RunFailed means the run was resumed.
      state.status = { state: 'running' };
      state.completed_at = undefined;
      return;
    }
    case 'StepCompleted': {
      const step = stepAt(state, event.step_index, event.step);
      step.status = 'completed';
      step.artifact = event.artifact;
      step.output_sha256 = event.output_sha256;
      step.duration_ms = event.duration_ms;
      step.error = undefined;
      state.last_completed_index = Math.max(state.last_completed_index, event.step_index);
      state.current_step = state.steps.filter((candidate) => candidate.status === 'completed').length;
      return;
    }
    case 'StepFailed': {
      const step = stepAt(state, event.step_index, event.step);
      step.status = 'failed';
      step.error = event.error;
      step.duration_ms = event.duration_ms;
      return;
    }
    case 'StepRetrying': {
      const step = stepAt(state, event.step_index, event.step);
      step.status = 'retrying';
      step.error = event.error;
      return;
    }
    case 'SafetyLimitReached':
      state.status = { state: 'safety_limit_reached', limit: event.limit, message: event.message, step: event.step };
      state.completed_at = event.timestamp;
      return;
    case 'RunCompleted':
      state.status = { state: 'completed' };
      state.completed_at = event.timestamp;
      state.content_id = event.content_id;
      state.evidence = event.evidence;
      return;
    case 'RunFailed':
      // SafetyLimitReached is followed by RunFailed; keep the more specific status.
      if (state.status.state !== 'safety_limit_reached') {
        state.status = { state: 'failed', error: event.error, resumable: event.resumable, step: event.step };
      }
      state.completed_at = event.timestamp;
      return;
  }
}

export function isTerminal(status: RunStatus): boolean {
  return status.state !== 'running';
}

/** Index of the first step that has not completed, or null when all have. */
export function nextStepIndex(state: RunState): number | null {
  const next = state.last_completed_index + 1;
  return next < state.steps.length ? next : null;
}
