import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { ContentNotFoundError } from '../../core/errors.js';
import { groundEntities } from '../../evidence/entities.js';
import { findEvidence, locateEvidence, openEvidence, renderEvidence } from '../../evidence/lookup.js';
import { groundClaims } from '../../evidence/resolver.js';
import { validateEvidence, type ValidationReport } from '../../evidence/validate.js';
import { isEditorLaunchDisabled } from '../../utils/runtime_controls.js';
import { readStdin, readTextFile, requirePositional, stringValue, type CommandOptions } from '../args.js';
import { createError, EXIT_CODES } from '../errors.js';
import { emitJsonOutput } from '../json_output.js';
import { createRuntime, type CliRuntime } from '../runtime.js';

const USAGE = [
  'provenant evidence show <evidence_id> [--json]',
  'provenant evidence open <evidence_id>',
  'provenant evidence validate <content_id> [--json]',
  'provenant evidence ground <content_id> --artifact <file> --claims <file|-> [--extractor <name>] [--entities] [--json]',
].join('\n       ');

async function requireContentDir(runtime: CliRuntime, contentId: string): Promise<string> {
  const dir = await runtime.catalog.lookup(contentId);
  if (!dir) throw new ContentNotFoundError(contentId);
  return dir;
}

export function formatValidationReport(report: ValidationReport): string {
  const lines = [
    `Validated ${report.content_id}`,
    `  valid_count=${report.valid_count} stale_count=${report.stale_count} unresolved_count=${report.unresolved_count}`,
  ];
  for (const artifact of report.artifacts) {
    const state = artifact.missing ? 'missing' : artifact.digest_ok ? 'unchanged' : 'changed';
    lines.push(`  ${artifact.artifact}: ${state}, ${artifact.valid} valid, ${artifact.stale} stale`);
  }
  for (const row of report.rows) {
    if (row.status === 'stale') lines.push(`  stale ${row.id} (${row.reason})`);
  }
  return lines.join('\n');
}

export async function evidenceCommand(options: CommandOptions): Promise<number> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      json: { type: 'boolean', default: false },
      artifact: { type: 'string' },
      claims: { type: 'string' },
      extractor: { type: 'string' },
      entities: { type: 'boolean', default: false },
      'slow-path': { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });
  const json = values.json === true;
  const subcommand = requirePositional(positionals, 0, USAGE);
  const runtime = await createRuntime(options.workspace);

  switch (subcommand) {
    case 'show': {
      const id = requirePositional(positionals, 1, USAGE);
      const location = await locateEvidence(await findEvidence(runtime.catalog, id));
      if (json) {
        await emitJsonOutput(location);
      } else {
        console.log(renderEvidence(location));
      }
      return EXIT_CODES.SUCCESS;
    }
    case 'open': {
      const id = requirePositional(positionals, 1, USAGE);
      const location = await locateEvidence(await findEvidence(runtime.catalog, id));
      const result = isEditorLaunchDisabled()
        ? { opened: false, reason: 'editor launch disabled' }
        : await openEvidence(location, runtime.config.editorCommand);
      if (!result.opened) {
        console.log(renderEvidence(location));
      }
      return EXIT_CODES.SUCCESS;
    }
    case 'validate': {
      const contentId = requirePositional(positionals, 1, USAGE);
      const contentDir = await requireContentDir(runtime, contentId);
      const report = await validateEvidence(contentDir, contentId, { forceSlowPath: values['slow-path'] === true });
      if (json) {
        await emitJsonOutput(report);
      } else {
        console.log(formatValidationReport(report));
      }
      return EXIT_CODES.SUCCESS;
    }
    case 'ground': {
      const contentId = requirePositional(positionals, 1, USAGE);
      const artifact = stringValue(values.artifact);
      const claimsPath = stringValue(values.claims);
      if (!artifact || !claimsPath) {
        throw createError('INVALID_ARGUMENT', `--artifact and --claims are required. Usage: ${USAGE}`);
      }
      if (path.basename(artifact) !== artifact) {
        throw createError('INVALID_ARGUMENT', `--artifact names a file inside the content folder, not a path (got "${artifact}")`);
      }
      const contentDir = await requireContentDir(runtime, contentId);
      const extractorOutput = claimsPath === '-'
        ? await readStdin()
        : await readTextFile(path.resolve(options.workspace, claimsPath), '--claims');
      const input = {
        contentDir,
        contentId,
        artifactName: artifact,
        extractorOutput,
        extractor: stringValue(values.extractor) ?? 'manual',
      };

      if (values.entities === true) {
        const file = await groundEntities(input);
        if (json) {
          await emitJsonOutput(file);
        } else {
          console.log(`Grounded ${file.entities.length} entities against ${artifact}`);
        }
        return EXIT_CODES.SUCCESS;
      }
      const summary = await groundClaims(input);
      if (json) {
        await emitJsonOutput(summary);
      } else {
        console.log(
          `Grounded ${summary.evidence.length} claims against ${artifact}: ${summary.appended} appended, ${summary.skipped} already present `
          + `(${summary.resolved} resolved, ${summary.ambiguous} ambiguous, ${summary.unresolved} unresolved)`,
        );
      }
      return EXIT_CODES.SUCCESS;
    }
    default:
      throw createError('INVALID_ARGUMENT', `Unknown evidence subcommand "${subcommand}". Usage: ${USAGE}`);
  }
}
