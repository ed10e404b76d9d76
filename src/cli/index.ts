#!/usr/bin/env node
/**
 * @fileoverview provenant CLI
 *
 * Commands:
 *   provenant run <pipeline>       - Run a pipeline against an input
 *   provenant status <run_id>      - Show a run's replayed state
 *   provenant resume <run_id>      - Continue a failed or interrupted run
 *   provenant runs                 - List recent runs
 *   provenant ingest <source>      - Register a source in the catalog
 *   provenant catalog <sub>        - list | search | lookup | remove
 *   provenant evidence <sub>       - show | open | validate | ground
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { PROVENANT_VERSION } from '../version.js';
import { catalogCommand } from './commands/catalog.js';
import { evidenceCommand } from './commands/evidence.js';
import { ingestCommand } from './commands/ingest.js';
import { resumeCommand } from './commands/resume.js';
import { runCommand } from './commands/run.js';
import { runsCommand } from './commands/runs.js';
import { statusCommand } from './commands/status.js';
import type { CommandOptions } from './args.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';
import { splitGlobalArgs } from './global_args.js';
import { showHelp } from './help.js';

type Command = 'run' | 'status' | 'resume' | 'runs' | 'ingest' | 'catalog' | 'evidence' | 'help';

const COMMANDS: Record<Command, { description: string; handler?: (options: CommandOptions) => Promise<number> }> = {
  run: { description: 'Run a pipeline against an input', handler: runCommand },
  status: { description: 'Show a run\'s replayed state', handler: statusCommand },
  resume: { description: 'Continue a failed or interrupted run', handler: resumeCommand },
  runs: { description: 'List recent runs', handler: runsCommand },
  ingest: { description: 'Register a source in the catalog', handler: ingestCommand },
  catalog: { description: 'List, search, look up or remove catalog entries', handler: catalogCommand },
  evidence: { description: 'Show, open, validate or ground evidence', handler: evidenceCommand },
  help: { description: 'Show help information' },
};

function isCommand(value: string): value is Command {
  return value in COMMANDS;
}

function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  if (useJson) {
    console.error(formatErrorJson(envelope));
  } else {
    console.error(formatErrorWithHints(envelope));
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const parsed = splitGlobalArgs(args);

  if (parsed.version) {
    console.log(`provenant ${PROVENANT_VERSION}`);
    return;
  }

  const { command } = parsed;
  if (!command || command === 'help') {
    showHelp(command === 'help' ? parsed.commandArgs[0] : undefined);
    return;
  }
  if (parsed.help) {
    showHelp(command);
    return;
  }

  if (parsed.verbose) {
    process.env.PROVENANT_VERBOSE = '1';
  }
  // stdout is reserved for the JSON payload; keep logs quiet unless a level was chosen.
  if (parsed.json && !process.env.PROVENANT_LOG_LEVEL) {
    process.env.PROVENANT_LOG_LEVEL = 'silent';
  }

  if (!isCommand(command)) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: [
        `Run 'provenant help' for usage information`,
        `Available commands: ${Object.keys(COMMANDS).join(', ')}`,
      ],
      context: { command },
    });
    outputStructuredError(envelope, parsed.json);
    process.exitCode = getExitCode(envelope);
    return;
  }

  const handler = COMMANDS[command].handler;
  if (!handler) {
    showHelp();
    return;
  }

  try {
    process.exitCode = await handler({
      workspace: path.resolve(parsed.workspace ?? process.cwd()),
      args: parsed.commandArgs,
      rawArgs: args,
    });
  } catch (error) {
    const envelope = classifyError(error);
    envelope.context.command = command;
    outputStructuredError(envelope, parsed.json);
    process.exitCode = getExitCode(envelope);
  }
}

main()
  .catch((error: unknown) => {
    const envelope = classifyError(error);
    outputStructuredError(envelope, process.argv.includes('--json'));
    process.exitCode = getExitCode(envelope);
  })
  .finally(() => {
    setImmediate(() => {
      process.exit(process.exitCode ?? 0);
    });
  });
