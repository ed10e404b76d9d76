import { parseArgs } from 'node:util';
import { requirePositional, stringValue, type CommandOptions } from '../args.js';
import { emitJsonOutput } from '../json_output.js';
import { exitCodeForRun, formatRunState } from '../run_format.js';
import { createRuntime } from '../runtime.js';

export async function resumeCommand(options: CommandOptions): Promise<number> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      json: { type: 'boolean', default: false },
      out: { type: 'string' },
    },
    allowPositionals: true,
    strict: false,
  });
  const runId = requirePositional(positionals, 0, 'provenant resume <run_id> [--json]');
  const { orchestrator } = await createRuntime(options.workspace);
  const state = await orchestrator.resume(runId);

  if (values.json === true) {
    await emitJsonOutput(state, stringValue(values.out));
  } else {
    console.log(formatRunState(state));
  }
  return exitCodeForRun(state);
}
