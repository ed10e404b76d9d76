import { describe, expect, it } from 'vitest';
import { EventLogError } from '../errors.js';
import type { RunEvent } from '../events.js';
import { parsePipeline } from '../pipeline.js';
import { isTerminal, nextStepIndex, replayRunState } from '../run_state.js';

const RUN_ID = '00000000-0000-4000-8000-000000000001';
const TS = '2026-01-01T00:00:00.000Z';
const DONE_TS = '2026-01-01T00:05:00.000Z';

const definition = parsePipeline({
  name: 'two-step',
  steps: [
    { name: 'a', adapter: 'builtin', action: 'identity' },
    { name: 'b', adapter: 'builtin', action: 'identity' },
  ],
});

const started: RunEvent = {
  type: 'RunStarted',
  timestamp: TS,
  run_id: RUN_ID,
  pipeline: 'two-step',
  definition,
  input_sha256: 'sha256:abc',
  input_bytes: 3,
  source: 'https://example.com/post',
};

function stepStarted(step: string, index: number, attempt = 1): RunEvent {
  return { type: 'StepStarted', timestamp: TS, run_id: RUN_ID, step, step_index: index, attempt, idempotency_key: `${RUN_ID}:${step}:x` };
}

function stepCompleted(step: string, index: number): RunEvent {
  return {
    type: 'StepCompleted',
    timestamp: TS,
    run_id: RUN_ID,
    step,
    step_index: index,
    attempt: 1,
    idempotency_key: `${RUN_ID}:${step}:x`,
    duration_ms: 5,
    artifact: `artifacts/${step}.md`,
    output_sha256: `sha256:${step}`,
    output_bytes: 1,
  };
}

describe('replayRunState', () => {
  it('starts every step as pending', () => {
    const state = replayRunState(RUN_ID, [started]);

    expect(state.status).toEqual({ state: 'running' });
    expect(state.steps.map((step) => step.status)).toEqual(['pending', 'pending']);
    expect(state.current_step).toBe(0);
    expect(state.source).toBe('https://example.com/post');
    expect(nextStepIndex(state)).toBe(0);
  });

  it('folds a completed run', () => {
    const events: RunEvent[] = [
      started,
      stepStarted('a', 0),
      stepCompleted('a', 0),
      stepStarted('b', 1),
      stepCompleted('b', 1),
      {
        type: 'RunCompleted',
        timestamp: DONE_TS,
        run_id: RUN_ID,
        duration_ms: 10,
        content_id: '0123456789abcdef',
        evidence: { appended: 1, resolved: 1, ambiguous: 0, unresolved: 0 },
      },
    ];

    const state = replayRunState(RUN_ID, events);

    expect(state.status).toEqual({ state: 'completed' });
    expect(state.completed_at).toBe(DONE_TS);
    expect(state.current_step).toBe(2);
    expect(state.last_completed_index).toBe(1);
    expect(state.content_id).toBe('0123456789abcdef');
    expect(state.steps[1]).toMatchObject({ status: 'completed', artifact: 'artifacts/b.md', attempts: 1 });
    expect(state.event_count).toBe(6);
    expect(nextStepIndex(state)).toBeNull();
    expect(isTerminal(state.status)).toBe(true);
  });

  it('records failure and clears it when the run resumes', () => {
    const failed: RunEvent[] = [
      started,
      stepStarted('a', 0),
      stepCompleted('a', 0),
      stepStarted('b', 1),
      { type: 'StepFailed', timestamp: TS, run_id: RUN_ID, step: 'b', step_index: 1, attempt: 1, duration_ms: 1, error: 'boom', final: true },
      { type: 'RunFailed', timestamp: DONE_TS, run_id: RUN_ID, error: 'boom', step: 'b', resumable: true },
    ];

    const failedState = replayRunState(RUN_ID, failed);
    expect(failedState.status).toEqual({ state: 'failed', error: 'boom', resumable: true, step: 'b' });
    expect(failedState.steps[1]).toMatchObject({ status: 'failed', error: 'boom' });
    expect(nextStepIndex(failedState)).toBe(1);

    const resumed = replayRunState(RUN_ID, [...failed, stepStarted('b', 1)]);
    expect(resumed.status).toEqual({ state: 'running' });
    expect(resumed.completed_at).toBeUndefined();
    expect(isTerminal(resumed.status)).toBe(false);
  });

  it('keeps the safety status when RunFailed follows it', () => {
    const state = replayRunState(RUN_ID, [
      started,
      { type: 'SafetyLimitReached', timestamp: TS, run_id: RUN_ID, limit: 'denylist', message: 'blocked', step: 'a' },
      { type: 'RunFailed', timestamp: DONE_TS, run_id: RUN_ID, error: 'blocked', step: 'a', resumable: false },
    ]);

    expect(state.status).toEqual({ state: 'safety_limit_reached', limit: 'denylist', message: 'blocked', step: 'a' });
  });

  it('rejects logs that do not start with RunStarted', () => {
    expect(() => replayRunState(RUN_ID, [])).toThrow(EventLogError);
    expect(() => replayRunState(RUN_ID, [stepStarted('a', 0)])).toThrow(
      `Run ${RUN_ID} log does not begin with RunStarted`,
    );
  });

  it('rejects events for steps the definition does not have', () => {
    expect(() => replayRunState(RUN_ID, [started, stepStarted('z', 0)])).toThrow(
      `Run ${RUN_ID} references unknown step z@0`,
    );
    expect(() => replayRunState(RUN_ID, [started, started])).toThrow('has a second RunStarted event');
  });
});
