import { parseArgs } from 'node:util';
import type { ContentType } from '../../library/content_id.js';
import { requirePositional, stringValue, stringValues, type CommandOptions } from '../args.js';
import { createError, EXIT_CODES } from '../errors.js';
import { emitJsonOutput } from '../json_output.js';
import { createRuntime } from '../runtime.js';

function parseContentType(raw: string | undefined): ContentType | undefined {
  if (raw === undefined) return undefined;
  if (raw === 'web' || raw === 'youtube' || raw === 'other') return raw;
  throw createError('INVALID_ARGUMENT', `Invalid --type "${raw}" (use web|youtube|other).`);
}

export async function ingestCommand(options: CommandOptions): Promise<number> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      title: { type: 'string' },
      type: { type: 'string' },
      tag: { type: 'string', multiple: true },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });
  const source = requirePositional(positionals, 0, 'provenant ingest <source> [--title <title>] [--type web|youtube|other] [--tag <tag>] [--json]');
  const { catalog } = await createRuntime(options.workspace);
  const result = await catalog.ingest(source, {
    title: stringValue(values.title),
    contentType: parseContentType(stringValue(values.type)),
    tags: stringValues(values.tag),
  });

  if (values.json === true) {
    await emitJsonOutput({ content_id: result.contentId, path: result.path, created: result.created, item: result.item });
  } else {
    console.log(`${result.created ? 'Ingested' : 'Already ingested'} ${result.contentId} -> ${result.path}`);
  }
  return EXIT_CODES.SUCCESS;
}
