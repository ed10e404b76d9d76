import type { RunState } from '../core/run_state.js';
import { EXIT_CODES, type ExitCode } from './errors.js';

export function exitCodeForRun(state: RunState): ExitCode {
  switch (state.status.state) {
    case 'completed':
      return EXIT_CODES.SUCCESS;
    case 'safety_limit_reached':
      return EXIT_CODES.SAFETY_LIMIT;
    case 'failed':
      return state.status.resumable ? EXIT_CODES.RESUMABLE_FAILURE : EXIT_CODES.GENERAL_ERROR;
    case 'running':
      // Only an interrupted run replays as running; it can be resumed.
      return EXIT_CODES.RESUMABLE_FAILURE;
  }
}

export function describeStatus(state: RunState): string {
  const status = state.status;
  switch (status.state) {
    case 'completed':
      return 'completed';
    case 'running':
      return 'running (no terminal event; interrupted or in progress)';
    case 'failed':
      return `failed${status.step ? ` at ${status.step}` : ''}: ${status.error}${status.resumable ? ' (resumable)' : ''}`;
    case 'safety_limit_reached':
      return `stopped by safety limit ${status.limit}: ${status.message}`;
  }
}

export function formatRunState(state: RunState): string {
  const lines = [
    `Run ${state.run_id}`,
    `  Pipeline:  ${state.pipeline}`,
    `  Status:    ${describeStatus(state)}`,
    `  Started:   ${state.started_at}`,
  ];
  if (state.completed_at) lines.push(`  Finished:  ${state.completed_at}`);
  if (state.source) lines.push(`  Source:    ${state.source}`);
  if (state.content_id) lines.push(`  Content:   ${state.content_id}`);
  lines.push(`  Progress:  ${state.current_step}/${state.steps.length} steps`);
  for (const step of state.steps) {
    const attempts = step.attempts > 1 ? ` (${step.attempts} attempts)` : '';
    const error = step.status === 'failed' && step.error ? `: ${step.error}` : '';
    lines.push(`    ${String(step.index + 1).padStart(2)}. ${step.name.padEnd(20)} ${step.status}${attempts}${error}`);
  }
  if (state.evidence) {
    const { appended, resolved, ambiguous, unresolved } = state.evidence;
    lines.push(`  Evidence:  ${appended} appended (${resolved} resolved, ${ambiguous} ambiguous, ${unresolved} unresolved)`);
  }
  if (state.truncated) lines.push('  Warning:   log ends in a corrupt record that was ignored');
  return lines.join('\n');
}

export function formatRunRow(state: RunState): string {
  return [
    state.run_id,
    state.pipeline.padEnd(16),
    state.status.state.padEnd(21),
    `${state.current_step}/${state.steps.length}`.padEnd(6),
    state.started_at,
  ].join('  ');
}
