import { describe, expect, it } from 'vitest';
import { getCommandHelp } from '../help.js';

describe('help', () => {
  it('appends exit codes to every topic', () => {
    for (const topic of ['run', 'status', 'resume', 'evidence']) {
      const help = getCommandHelp(topic);
      expect(help).toContain('EXIT CODES:');
      expect(help).toContain('4  A safety limit stopped the run');
    }
  });

  it('documents the run input flags', () => {
    const help = getCommandHelp('run');
    expect(help).toContain('--input <file>');
    expect(help).toContain('--source <id>');
  });

  it('falls back to the main help for unknown topics', () => {
    const help = getCommandHelp('bogus');
    expect(help.startsWith('Unknown command: bogus\n')).toBe(true);
    expect(help).toContain('COMMANDS:');
  });
});
