export interface GlobalArgs {
  command?: string;
  commandArgs: string[];
  workspace?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
  json: boolean;
}

/**
 * Separate global options from the command and its own arguments. Global
 * options may appear anywhere; everything else after the command token is
 * passed through untouched so each command can run its own `parseArgs`.
 */
export function splitGlobalArgs(args: readonly string[]): GlobalArgs {
  const result: GlobalArgs = { commandArgs: [], verbose: false, help: false, version: false, json: false };

  for (let index = 0; index < args.length; index++) {
    const token = args[index] ?? '';
    if (token === '-w' || token === '--workspace') {
      result.workspace = args[index + 1];
      index += 1;
      continue;
    }
    if (token.startsWith('--workspace=')) {
      result.workspace = token.slice('--workspace='.length);
      continue;
    }
    if (token === '--verbose') {
      result.verbose = true;
      continue;
    }
    if (token === '-h' || token === '--help') {
      result.help = true;
      continue;
    }
    if ((token === '-v' || token === '--version') && result.command === undefined) {
      result.version = true;
      continue;
    }
    if (token === '--json') result.json = true;
    if (result.command === undefined && !token.startsWith('-')) {
      result.command = token;
      continue;
    }
    result.commandArgs.push(token);
  }
  return result;
}
