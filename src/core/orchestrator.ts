import { randomUUID } from 'node:crypto';
import type { StepRunner } from '../adapters/types.js';
import { groundEntities } from '../evidence/entities.js';
import { groundClaims } from '../evidence/resolver.js';
import type { ContentCatalog } from '../library/catalog.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { computeDigest, computeShortHash } from '../utils/checksums.js';
import { EventLogError, SafetyLimitError, errorMessage, type SafetyViolation } from './errors.js';
import type { EventLog } from './event_log.js';
import type { EvidenceSummary } from './events.js';
import {
  retryDelayMs,
  shouldRetry,
  stepRetryPolicy,
  type PipelineDefinition,
  type PipelineStep,
} from './pipeline.js';
import { nextStepIndex, replayRunState, type RunState } from './run_state.js';
import { mergeSafetyLimits, SafetyTracker, type SafetyLimits } from './safety.js';

export interface OrchestratorDeps {
  eventLog: EventLog;
  catalog: ContentCatalog;
  runStep: StepRunner;
  /** Configured limits; a pipeline's own `safety_limits` override them. */
  safety: SafetyLimits;
  /** Directory step inputs that name files resolve against. */
  cwd?: string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  newRunId?: () => string;
}

export interface StartRunOptions {
  input: string;
  /** Canonical source identifier; when set, the finished run is ingested into the catalog. */
  source?: string;
  title?: string;
  tags?: string[];
}

interface ExecutionContext {
  runId: string;
  definition: PipelineDefinition;
  runInput: string;
  startedAt: string;
  source?: string;
  title?: string;
  tags?: string[];
  outputs: Map<string, string>;
  tracker: SafetyTracker;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function idempotencyKey(runId: string, step: string, input: string): string {
  return `${runId}:${step}:${computeShortHash(input)}`;
}

export function artifactFileName(step: string): string {
  return `${step}.md`;
}

export function defaultExtractorName(step: PipelineStep): string {
  switch (step.adapter) {
    case 'builtin':
      return `builtin:${step.action}`;
    case 'fabric':
      return `fabric:${step.pattern}`;
    case 'exec':
      return step.command;
  }
}

/**
 * Runs pipelines step by step, recording every transition in the run's event
 * log. Run state is never held anywhere else: status and resume both replay
 * the log.
 */
export class Orchestrator {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly newRunId: () => string;
  private readonly cwd: string;

  constructor(private readonly deps: OrchestratorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.newRunId = deps.newRunId ?? randomUUID;
    this.cwd = deps.cwd ?? process.cwd();
  }

  async run(definition: PipelineDefinition, options: StartRunOptions): Promise<RunState> {
    const runId = this.newRunId();
    const { eventLog } = this.deps;
    await eventLog.writeInput(runId, options.input);
    const started = await eventLog.append(runId, {
      type: 'RunStarted',
      pipeline: definition.name,
      definition,
      input_sha256: computeDigest(options.input),
      input_bytes: Buffer.byteLength(options.input, 'utf8'),
      source: options.source,
      title: options.title,
      tags: options.tags,
    });
    logInfo('Run started', { runId, pipeline: definition.name, steps: definition.steps.length });

    const context: ExecutionContext = {
      runId,
      definition,
      runInput: options.input,
      startedAt: started.timestamp,
      source: options.source,
      title: options.title,
      tags: options.tags,
      outputs: new Map(),
      tracker: this.createTracker(definition),
    };

    const lengthViolation = context.tracker.checkPipelineLength(definition.steps.length);
    if (lengthViolation) {
      await this.haltForSafety(runId, lengthViolation);
    } else {
      await this.execute(context, 0);
    }
    return this.status(runId);
  }

  /**
   * Continue a failed or interrupted run at the first step without a
   * `StepCompleted` event, feeding it the recorded outputs of earlier steps.
   * Completed runs are returned unchanged; runs stopped by a safety limit
   * are refused.
   */
  async resume(runId: string): Promise<RunState> {
    const state = await this.status(runId);
    if (state.status.state === 'completed') {
      logInfo('Run already completed; nothing to resume', { runId });
      return state;
    }
    if (state.status.state === 'safety_limit_reached') {
      throw new SafetyLimitError({
        limit: state.status.limit,
        step: state.status.step,
        message: `Run ${runId} stopped at a safety limit and cannot be resumed: ${state.status.message}`,
      });
    }

    const { eventLog } = this.deps;
    const runInput = await eventLog.readInput(runId);
    if (computeDigest(runInput) !== state.input_sha256) {
      throw new EventLogError(`Stored input for run ${runId} no longer matches its recorded hash`, { runId });
    }

    const outputs = new Map<string, string>();
    for (const step of state.steps) {
      if (step.status !== 'completed' || !step.artifact) continue;
      const output = await eventLog.loadArtifact(runId, step.artifact);
      if (computeDigest(output) !== step.output_sha256) {
        throw new EventLogError(`Artifact ${step.artifact} of run ${runId} changed since it was recorded`, {
          runId,
          step: step.name,
        });
      }
      outputs.set(step.name, output);
    }

    const context: ExecutionContext = {
      runId,
      definition: state.definition,
      runInput,
      startedAt: state.started_at,
      source: state.source,
      title: state.title,
      tags: state.tags,
      outputs,
      tracker: this.createTracker(state.definition),
    };
    const next = nextStepIndex(state);
    logInfo('Resuming run', { runId, fromStep: next ?? 'finalize' });
    if (next === null) {
      await this.finish(context);
    } else {
      await this.execute(context, next);
    }
    return this.status(runId);
  }

  async status(runId: string): Promise<RunState> {
    const { events, truncated } = await this.deps.eventLog.replay(runId);
    return replayRunState(runId, events, truncated);
  }

  /** Most recently started first. Runs whose log cannot be replayed are skipped. */
  async listRuns(limit?: number): Promise<RunState[]> {
    const states: RunState[] = [];
    for (const runId of await this.deps.eventLog.listRunIds()) {
      try {
        states.push(await this.status(runId));
      } catch (error) {
        logWarning('Skipping unreadable run', { runId, error: errorMessage(error) });
      }
    }
    states.sort((a, b) => b.started_at.localeCompare(a.started_at) || a.run_id.localeCompare(b.run_id));
    return limit === undefined ? states : states.slice(0, limit);
  }

  private createTracker(definition: PipelineDefinition): SafetyTracker {
    return new SafetyTracker(mergeSafetyLimits(this.deps.safety, definition.safety_limits), this.now);
  }

  private resolveStepInput(context: ExecutionContext, index: number): string {
    const { definition, outputs, runInput } = context;
    const step = definition.steps[index];
    if (!step) {
      throw new EventLogError(`Run ${context.runId} has no step at index ${index}`, { runId: context.runId });
    }
    const from = step.input_from;
    let sourceStep: string | undefined;
    if (from === 'pipeline_input') return runInput;
    if (from === 'previous') {
      if (index === 0) return runInput;
      sourceStep = definition.steps[index - 1]?.name;
    } else if ('static' in from) {
      return from.static;
    } else {
      sourceStep = from.step;
    }
    const output = sourceStep === undefined ? undefined : outputs.get(sourceStep);
    if (output === undefined) {
      throw new EventLogError(`Step "${step.name}" needs output of "${sourceStep}", which has not completed`, {
        runId: context.runId,
        step: step.name,
      });
    }
    return output;
  }

  private async execute(context: ExecutionContext, startIndex: number): Promise<void> {
    const { runId, definition, tracker } = context;

    for (let index = startIndex; index < definition.steps.length; index++) {
      const step = definition.steps[index];
      if (!step) break;
      const input = this.resolveStepInput(context, index);

      const inputViolation = tracker.checkBeforeStep(step.name, input);
      if (inputViolation) {
        await this.haltForSafety(runId, inputViolation);
        return;
      }

      const output = await this.attemptStep(context, step, index, input);
      if (output === null) return;

      context.outputs.set(step.name, output);
    }

    await this.finish(context);
  }

  /**
   * Run one step until it succeeds or its retry policy is exhausted. Returns
   * null when the run stopped; the reason is already in the log.
   */
  private async attemptStep(context: ExecutionContext, step: PipelineStep, index: number, input: string): Promise<string | null> {
    const { runId, tracker } = context;
    const { eventLog } = this.deps;
    const policy = stepRetryPolicy(step);
    const timeoutMs = tracker.stepTimeoutSeconds(step.timeout_seconds) * 1000;
    const key = idempotencyKey(runId, step.name, input);

    for (let attempt = 1; ; attempt++) {
      await eventLog.append(runId, { type: 'StepStarted', step: step.name, step_index: index, attempt, idempotency_key: key });
      const startedAt = this.now();
      let output: string;
      try {
        output = await this.deps.runStep({ runId, step, input, timeoutMs, cwd: this.cwd });
      } catch (error) {
        const message = errorMessage(error);
        const retry = shouldRetry(policy, attempt);
        await eventLog.append(runId, {
          type: 'StepFailed',
          step: step.name,
          step_index: index,
          attempt,
          duration_ms: Math.max(0, this.now() - startedAt),
          error: message,
          final: !retry,
        });
        if (!retry) {
          logWarning('Step failed; run stopped and can be resumed', { runId, step: step.name, attempts: attempt, error: message });
          await eventLog.append(runId, { type: 'RunFailed', error: message, step: step.name, resumable: true });
          return null;
        }
        const delay = retryDelayMs(policy, attempt);
        await eventLog.append(runId, {
          type: 'StepRetrying',
          step: step.name,
          step_index: index,
          attempt: attempt + 1,
          delay_ms: delay,
          error: message,
        });
        logInfo('Retrying step', { runId, step: step.name, attempt: attempt + 1, delayMs: delay });
        await this.sleep(delay);
        continue;
      }

      const outputViolation = tracker.checkOutput(step.name, output);
      if (outputViolation) {
        await this.haltForSafety(runId, outputViolation);
        return null;
      }
      const artifact = await eventLog.storeArtifact(runId, step.name, output);
      await eventLog.append(runId, {
        type: 'StepCompleted',
        step: step.name,
        step_index: index,
        attempt,
        idempotency_key: key,
        duration_ms: Math.max(0, this.now() - startedAt),
        artifact,
        output_sha256: computeDigest(output),
        output_bytes: Buffer.byteLength(output, 'utf8'),
      });
      return output;
    }
  }

  private async haltForSafety(runId: string, violation: SafetyViolation): Promise<void> {
    logWarning('Safety limit reached; run stopped', { runId, limit: violation.limit, step: violation.step });
    await this.deps.eventLog.append(runId, {
      type: 'SafetyLimitReached',
      limit: violation.limit,
      message: violation.message,
      step: violation.step,
    });
    await this.deps.eventLog.append(runId, {
      type: 'RunFailed',
      error: violation.message,
      step: violation.step,
      resumable: false,
    });
  }

  private async finish(context: ExecutionContext): Promise<void> {
    const { runId } = context;
    let contentId: string | undefined;
    let evidence: EvidenceSummary | undefined;
    if (context.source) {
      const deposited = await this.deposit(context, context.source);
      contentId = deposited.contentId;
      evidence = deposited.evidence;
    }
    await this.deps.eventLog.append(runId, {
      type: 'RunCompleted',
      duration_ms: Math.max(0, this.now() - Date.parse(context.startedAt)),
      content_id: contentId,
      evidence,
    });
    logInfo('Run completed', { runId, contentId });
  }

  /**
   * Ingest the run's source, copy every step output into the content folder
   * and ground the outputs of evidence-producing steps.
   */
  private async deposit(context: ExecutionContext, source: string): Promise<{ contentId: string; evidence?: EvidenceSummary }> {
    const { catalog } = this.deps;
    const { definition, outputs, runId } = context;
    const ingested = await catalog.ingest(source, { title: context.title, tags: context.tags, runId });

    const artifacts = definition.steps.flatMap((step) => {
      const content = outputs.get(step.name);
      return content === undefined ? [] : [{ name: artifactFileName(step.name), content }];
    });
    await catalog.depositArtifacts(ingested.contentId, artifacts, runId);

    const evidenceSteps = definition.steps.filter((step) => step.evidence);
    if (evidenceSteps.length === 0) return { contentId: ingested.contentId };

    const summary: EvidenceSummary = { appended: 0, resolved: 0, ambiguous: 0, unresolved: 0 };
    for (const step of evidenceSteps) {
      const config = step.evidence;
      const extractorOutput = outputs.get(step.name);
      if (!config || extractorOutput === undefined) continue;
      const input = {
        contentDir: ingested.path,
        contentId: ingested.contentId,
        artifactName: artifactFileName(config.artifact),
        extractorOutput,
        extractor: config.extractor ?? defaultExtractorName(step),
      };
      try {
        if (config.kind === 'claims') {
          const grounded = await groundClaims(input);
          summary.appended += grounded.appended;
          summary.resolved += grounded.resolved;
          summary.ambiguous += grounded.ambiguous;
          summary.unresolved += grounded.unresolved;
        } else {
          await groundEntities(input);
        }
      } catch (error) {
        if (error instanceof EventLogError) throw error;
        // Unusable extractor output leaves the run's artifacts intact; it is reported, not fatal.
        logWarning('Evidence grounding skipped for step', { runId, step: step.name, error: errorMessage(error) });
      }
    }
    return { contentId: ingested.contentId, evidence: summary };
  }
}
