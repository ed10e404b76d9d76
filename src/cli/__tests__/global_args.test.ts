import { describe, expect, it } from 'vitest';
import { splitGlobalArgs } from '../global_args.js';

describe('splitGlobalArgs', () => {
  it('separates the command from its arguments', () => {
    expect(splitGlobalArgs(['run', 'wisdom', '--input', 'a.txt'])).toEqual({
      command: 'run',
      commandArgs: ['wisdom', '--input', 'a.txt'],
      verbose: false,
      help: false,
      version: false,
      json: false,
    });
  });

  it('pulls global options from anywhere', () => {
    const parsed = splitGlobalArgs(['--verbose', 'status', '-w', '/ws', 'abc', '--help']);
    expect(parsed).toMatchObject({ command: 'status', commandArgs: ['abc'], workspace: '/ws', verbose: true, help: true });
    expect(splitGlobalArgs(['runs', '--workspace=/other']).workspace).toBe('/other');
  });

  it('keeps --json visible to the command', () => {
    expect(splitGlobalArgs(['--json', 'runs'])).toMatchObject({ command: 'runs', commandArgs: ['--json'], json: true });
    expect(splitGlobalArgs(['runs', '--json'])).toMatchObject({ command: 'runs', commandArgs: ['--json'], json: true });
  });

  it('treats -v as version only before the command', () => {
    expect(splitGlobalArgs(['-v']).version).toBe(true);
    expect(splitGlobalArgs(['evidence', 'show', '-v'])).toMatchObject({ version: false, commandArgs: ['show', '-v'] });
  });
});
