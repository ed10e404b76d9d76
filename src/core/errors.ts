/**
 * Error taxonomy shared by the orchestrator, the logs and the evidence engine.
 *
 * Quote resolution outcomes (unresolved/ambiguous) and digest drift are data,
 * not errors, and never appear here.
 */

export type ProvenantErrorCode =
  | 'ADAPTER_FAILURE'
  | 'SAFETY_LIMIT_EXCEEDED'
  | 'EVENT_LOG_IO'
  | 'PIPELINE_INVALID'
  | 'CONFIG_INVALID'
  | 'RUN_NOT_FOUND'
  | 'CONTENT_NOT_FOUND'
  | 'CATALOG_INVALID'
  | 'EVIDENCE_NOT_FOUND'
  | 'EXTRACTOR_OUTPUT_INVALID';

export class ProvenantError extends Error {
  readonly code: ProvenantErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ProvenantErrorCode, message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProvenantError';
    this.code = code;
    this.details = details;
  }
}

/** Adapter invocation failed or timed out; retried per step policy. */
export class AdapterError extends ProvenantError {
  readonly timedOut: boolean;
  readonly exitCode: number | undefined;

  constructor(message: string, options: { timedOut?: boolean; exitCode?: number; stderr?: string; cause?: unknown } = {}) {
    super(
      'ADAPTER_FAILURE',
      message,
      { timedOut: options.timedOut ?? false, exitCode: options.exitCode, stderr: options.stderr },
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = 'AdapterError';
    this.timedOut = options.timedOut ?? false;
    this.exitCode = options.exitCode;
  }
}

export type SafetyLimitKind =
  | 'max_steps'
  | 'max_input_bytes'
  | 'max_output_bytes'
  | 'run_timeout'
  | 'denylist';

export interface SafetyViolation {
  limit: SafetyLimitKind;
  message: string;
  step?: string;
}

export class SafetyLimitError extends ProvenantError {
  readonly violation: SafetyViolation;

  constructor(violation: SafetyViolation) {
    super('SAFETY_LIMIT_EXCEEDED', violation.message, { limit: violation.limit, step: violation.step });
    this.name = 'SafetyLimitError';
    this.violation = violation;
  }
}

/** Fatal I/O on an append-only log. */
export class EventLogError extends ProvenantError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super('EVENT_LOG_IO', message, details, options);
    this.name = 'EventLogError';
  }
}

export class PipelineDefinitionError extends ProvenantError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('PIPELINE_INVALID', message, { issues });
    this.name = 'PipelineDefinitionError';
    this.issues = issues;
  }
}

export class ConfigError extends ProvenantError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('CONFIG_INVALID', message, details);
    this.name = 'ConfigError';
  }
}

export class RunNotFoundError extends ProvenantError {
  constructor(runId: string) {
    super('RUN_NOT_FOUND', `Run not found: ${runId}`, { runId });
    this.name = 'RunNotFoundError';
  }
}

export class ContentNotFoundError extends ProvenantError {
  constructor(contentId: string) {
    super('CONTENT_NOT_FOUND', `Content not found: ${contentId}`, { contentId });
    this.name = 'ContentNotFoundError';
  }
}

/** Catalog index or a content folder's metadata failed to parse. */
export class CatalogError extends ProvenantError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super('CATALOG_INVALID', message, details, options);
    this.name = 'CatalogError';
  }
}

export class EvidenceNotFoundError extends ProvenantError {
  constructor(evidenceId: string, reason = 'no matching evidence row') {
    super('EVIDENCE_NOT_FOUND', `Evidence not found: ${evidenceId} (${reason})`, { evidenceId, reason });
    this.name = 'EvidenceNotFoundError';
  }
}

export class ExtractorOutputError extends ProvenantError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('EXTRACTOR_OUTPUT_INVALID', message, details);
    this.name = 'ExtractorOutputError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
