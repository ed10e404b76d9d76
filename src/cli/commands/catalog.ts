import { parseArgs } from 'node:util';
import type { CatalogItem } from '../../library/catalog.js';
import { parsePositiveInt, requirePositional, stringValue, type CommandOptions } from '../args.js';
import { createError, EXIT_CODES } from '../errors.js';
import { emitJsonOutput } from '../json_output.js';
import { createRuntime } from '../runtime.js';

const USAGE = 'provenant catalog list [--limit N] | search <query> | lookup <content_id> | remove <content_id> [--json]';

function formatItem(item: CatalogItem): string {
  const tags = item.tags.length > 0 ? `  [${item.tags.join(', ')}]` : '';
  return `${item.id}  ${item.content_type.padEnd(7)}  ${item.last_seen}  ${item.title}${tags}`;
}

async function printItems(items: CatalogItem[], json: boolean): Promise<void> {
  if (json) {
    await emitJsonOutput({ items });
    return;
  }
  if (items.length === 0) {
    console.log('No catalog entries.');
    return;
  }
  for (const item of items) console.log(formatItem(item));
}

export async function catalogCommand(options: CommandOptions): Promise<number> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      limit: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });
  const json = values.json === true;
  const subcommand = requirePositional(positionals, 0, USAGE);
  const { catalog } = await createRuntime(options.workspace);

  switch (subcommand) {
    case 'list': {
      const limit = stringValue(values.limit);
      await printItems(await catalog.list(limit === undefined ? undefined : parsePositiveInt(limit, '--limit', 1)), json);
      return EXIT_CODES.SUCCESS;
    }
    case 'search': {
      const query = positionals.slice(1).join(' ').trim();
      if (!query) throw createError('INVALID_ARGUMENT', `Missing search query. Usage: ${USAGE}`);
      await printItems(await catalog.search(query), json);
      return EXIT_CODES.SUCCESS;
    }
    case 'lookup': {
      const contentId = requirePositional(positionals, 1, USAGE);
      const dir = await catalog.lookup(contentId);
      if (!dir) throw createError('NOT_FOUND', `Content not found: ${contentId}`);
      if (json) {
        await emitJsonOutput({ content_id: contentId, path: dir, item: await catalog.get(contentId) });
      } else {
        console.log(dir);
      }
      return EXIT_CODES.SUCCESS;
    }
    case 'remove': {
      const contentId = requirePositional(positionals, 1, USAGE);
      if (!(await catalog.remove(contentId))) throw createError('NOT_FOUND', `Content not found: ${contentId}`);
      if (json) {
        await emitJsonOutput({ content_id: contentId, removed: true });
      } else {
        console.log(`Removed ${contentId} from the catalog (files kept on disk)`);
      }
      return EXIT_CODES.SUCCESS;
    }
    default:
      throw createError('INVALID_ARGUMENT', `Unknown catalog subcommand "${subcommand}". Usage: ${USAGE}`);
  }
}
