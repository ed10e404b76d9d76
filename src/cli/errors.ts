/**
 * CLI error envelopes and exit codes.
 *
 * Exit codes:
 *   0  success
 *   1  general error
 *   2  invalid arguments (bad flags, malformed pipeline or config)
 *   3  pipeline failed after exhausting retries; `resume` can continue it
 *   4  a safety limit stopped the run
 */

import { ProvenantError, type ProvenantErrorCode } from '../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENTS: 2,
  RESUMABLE_FAILURE: 3,
  SAFETY_LIMIT: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type ErrorCode =
  | 'EINVALID_ARGUMENT'
  | 'EPIPELINE_INVALID'
  | 'ECONFIG_INVALID'
  | 'ENOT_FOUND'
  | 'EADAPTER_FAILURE'
  | 'ESAFETY_LIMIT'
  | 'EEVENT_LOG'
  | 'ECATALOG'
  | 'EEXTRACTOR_OUTPUT'
  | 'EUNKNOWN';

export interface ErrorEnvelope {
  code: ErrorCode;
  message: string;
  recoveryHints: string[];
  context: Record<string, unknown>;
}

export type CliErrorCode = 'INVALID_ARGUMENT' | 'NOT_FOUND';

export class CliError extends Error {
  constructor(
    message: string,
    readonly code: CliErrorCode,
    readonly hints: string[] = [],
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export function createError(code: CliErrorCode, message: string, hints: string[] = []): CliError {
  return new CliError(message, code, hints);
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  options: { recoveryHints?: string[]; context?: Record<string, unknown> } = {},
): ErrorEnvelope {
  return {
    code,
    message,
    recoveryHints: options.recoveryHints ?? [],
    context: options.context ?? {},
  };
}

const DOMAIN_CODES: Record<ProvenantErrorCode, { code: ErrorCode; hints: string[] }> = {
  ADAPTER_FAILURE: { code: 'EADAPTER_FAILURE', hints: ['Check that the adapter command is installed and on PATH'] },
  SAFETY_LIMIT_EXCEEDED: { code: 'ESAFETY_LIMIT', hints: ['Raise the limit in the pipeline\'s safety_limits or .provenant/config.json if this is expected'] },
  EVENT_LOG_IO: { code: 'EEVENT_LOG', hints: ['Check permissions and free space under PROVENANT_HOME'] },
  PIPELINE_INVALID: { code: 'EPIPELINE_INVALID', hints: ['Fix the pipeline file and run again'] },
  CONFIG_INVALID: { code: 'ECONFIG_INVALID', hints: ['Fix .provenant/config.json or unset the overriding environment variable'] },
  RUN_NOT_FOUND: { code: 'ENOT_FOUND', hints: ['Run `provenant runs` to list known run ids'] },
  CONTENT_NOT_FOUND: { code: 'ENOT_FOUND', hints: ['Run `provenant catalog list` to list content ids'] },
  CATALOG_INVALID: { code: 'ECATALOG', hints: ['Restore catalog.json or metadata.json from a backup'] },
  EVIDENCE_NOT_FOUND: { code: 'ENOT_FOUND', hints: ['Pass a full evidence id or a longer prefix'] },
  EXTRACTOR_OUTPUT_INVALID: { code: 'EEXTRACTOR_OUTPUT', hints: ['Extractor output must be a JSON array of {claim, quote} objects or JSON lines'] },
};

export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return createErrorEnvelope(error.code === 'INVALID_ARGUMENT' ? 'EINVALID_ARGUMENT' : 'ENOT_FOUND', error.message, {
      recoveryHints: error.hints.length > 0 ? error.hints : ['Run `provenant help` for usage information'],
    });
  }
  if (error instanceof ProvenantError) {
    const mapped = DOMAIN_CODES[error.code];
    return createErrorEnvelope(mapped.code, error.message, {
      recoveryHints: mapped.hints,
      context: { ...error.details },
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return createErrorEnvelope('EUNKNOWN', message);
}

export function getExitCode(envelope: ErrorEnvelope): ExitCode {
  switch (envelope.code) {
    case 'EINVALID_ARGUMENT':
    case 'EPIPELINE_INVALID':
    case 'ECONFIG_INVALID':
      return EXIT_CODES.INVALID_ARGUMENTS;
    case 'ESAFETY_LIMIT':
      return EXIT_CODES.SAFETY_LIMIT;
    case 'EADAPTER_FAILURE':
      return EXIT_CODES.RESUMABLE_FAILURE;
    default:
      return EXIT_CODES.GENERAL_ERROR;
  }
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  const issues = envelope.context.issues;
  if (Array.isArray(issues)) {
    for (const issue of issues) lines.push(`  - ${String(issue)}`);
  }
  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Hints:');
    for (const hint of envelope.recoveryHints) lines.push(`  ${hint}`);
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
