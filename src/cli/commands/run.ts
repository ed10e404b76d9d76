import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { loadPipeline } from '../../core/pipeline.js';
import { readStdin, readTextFile, requirePositional, stringValue, stringValues, type CommandOptions } from '../args.js';
import { createError } from '../errors.js';
import { emitJsonOutput } from '../json_output.js';
import { exitCodeForRun, formatRunState } from '../run_format.js';
import { createRuntime } from '../runtime.js';

const USAGE = 'provenant run <pipeline> [--input <file> | --text <text> | --stdin] [--source <id>] [--title <title>] [--tag <tag>] [--json]';

async function resolveRunInput(values: Record<string, unknown>, workspace: string): Promise<string> {
  const inputFile = stringValue(values.input);
  const text = typeof values.text === 'string' ? values.text : undefined;
  const fromStdin = values.stdin === true;
  const chosen = [inputFile !== undefined, text !== undefined, fromStdin].filter(Boolean).length;
  if (chosen > 1) {
    throw createError('INVALID_ARGUMENT', 'Use only one of --input, --text or --stdin');
  }
  if (inputFile) return readTextFile(path.resolve(workspace, inputFile), '--input');
  if (text !== undefined) return text;
  if (fromStdin || !process.stdin.isTTY) return readStdin();
  throw createError('INVALID_ARGUMENT', `No run input. Usage: ${USAGE}`);
}

export async function runCommand(options: CommandOptions): Promise<number> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      input: { type: 'string' },
      text: { type: 'string' },
      stdin: { type: 'boolean', default: false },
      source: { type: 'string' },
      title: { type: 'string' },
      tag: { type: 'string', multiple: true },
      json: { type: 'boolean', default: false },
      out: { type: 'string' },
    },
    allowPositionals: true,
    strict: false,
  });

  const reference = requirePositional(positionals, 0, USAGE);
  const runtime = await createRuntime(options.workspace);
  const { definition } = await loadPipeline(reference, runtime.config.pipelineDirs, options.workspace);
  const input = await resolveRunInput(values, options.workspace);

  const state = await runtime.orchestrator.run(definition, {
    input,
    source: stringValue(values.source),
    title: stringValue(values.title),
    tags: stringValues(values.tag),
  });

  if (values.json === true) {
    await emitJsonOutput(state, stringValue(values.out));
  } else {
    console.log(formatRunState(state));
  }
  return exitCodeForRun(state);
}
