/**
 * @packageDocumentation
 * Library surface: event-sourced pipeline runs, the content catalog and the
 * evidence engine. The `provenant` CLI is a thin layer over these.
 */

export { PROVENANT_VERSION } from './version.js';

export * from './core/errors.js';
export { EventLog, isRunId, type ReplayResult } from './core/event_log.js';
export { RunEventSchema, type RunEvent, type RunEventInput, type RunEventType, type EvidenceSummary } from './core/events.js';
export { acquireFileLock, withFileLock, type FileLockHandle, type FileLockOptions } from './core/file_lock.js';
export { appendJsonLine, readJsonLines, parseJsonLines, type JsonlReadResult } from './core/jsonl_log.js';
export { Orchestrator, idempotencyKey, type OrchestratorDeps, type StartRunOptions } from './core/orchestrator.js';
export {
  loadPipeline,
  parsePipeline,
  retryDelayMs,
  shouldRetry,
  PipelineDefinitionSchema,
  type PipelineDefinition,
  type PipelineStep,
  type RetryPolicy,
} from './core/pipeline.js';
export { replayRunState, nextStepIndex, type RunState, type RunStatus, type StepRecord } from './core/run_state.js';
export {
  DEFAULT_SAFETY_LIMITS,
  SafetyTracker,
  findDenylistMatch,
  mergeSafetyLimits,
  type SafetyLimits,
} from './core/safety.js';

export { createStepRunner } from './adapters/step_runner.js';
export type { AdapterRequest, StepRunner } from './adapters/types.js';

export { resolveConfig, type ProvenantConfig } from './config/config.js';

export { ContentCatalog, type CatalogItem, type IngestResult } from './library/catalog.js';
export { computeContentId, detectContentType, type ContentType } from './library/content_id.js';
export { readMetadata, type ContentMetadata } from './library/metadata.js';

export { groundEntities, type EntitiesFile } from './evidence/entities.js';
export { EvidenceStore } from './evidence/evidence_log.js';
export { findEvidence, locateEvidence, renderEvidence, openEvidence } from './evidence/lookup.js';
export { groundClaims, resolveClaim, type GroundingSummary } from './evidence/resolver.js';
export { buildSpan, computeEvidenceId, findQuote, offsetToLineCol, type QuoteMatch } from './evidence/spans.js';
export type { Evidence, Resolution, Span, EvidenceStatus } from './evidence/types.js';
export { validateEvidence, type ValidationReport } from './evidence/validate.js';
