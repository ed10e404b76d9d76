import { parseArgs } from 'node:util';
import { parsePositiveInt, stringValue, type CommandOptions } from '../args.js';
import { EXIT_CODES } from '../errors.js';
import { emitJsonOutput } from '../json_output.js';
import { formatRunRow } from '../run_format.js';
import { createRuntime } from '../runtime.js';

export const DEFAULT_RUN_LIMIT = 10;

export async function runsCommand(options: CommandOptions): Promise<number> {
  const { values } = parseArgs({
    args: options.args,
    options: {
      limit: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });
  const limit = parsePositiveInt(stringValue(values.limit), '--limit', DEFAULT_RUN_LIMIT);
  const { orchestrator } = await createRuntime(options.workspace);
  const runs = await orchestrator.listRuns(limit);

  if (values.json === true) {
    await emitJsonOutput({
      runs: runs.map((state) => ({
        run_id: state.run_id,
        pipeline: state.pipeline,
        status: state.status,
        current_step: state.current_step,
        step_count: state.steps.length,
        started_at: state.started_at,
        completed_at: state.completed_at,
      })),
    });
    return EXIT_CODES.SUCCESS;
  }
  if (runs.length === 0) {
    console.log('No runs recorded.');
    return EXIT_CODES.SUCCESS;
  }
  for (const state of runs) console.log(formatRunRow(state));
  return EXIT_CODES.SUCCESS;
}
