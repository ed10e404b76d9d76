import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { logDebug, logError, logInfo, logWarning, shouldEmit } from '../logger.js';

const ENV_KEYS = ['PROVENANT_LOG_LEVEL', 'PROVENANT_VERBOSE', 'PROVENANT_NO_TELEMETRY'] as const;
let saved: Record<string, string | undefined> = {};

beforeEach(() => {
  saved = Object.fromEntries(ENV_KEYS.map((key) => [key, process.env[key]]));
  process.env.PROVENANT_LOG_LEVEL = 'debug';
  delete process.env.PROVENANT_VERBOSE;
  delete process.env.PROVENANT_NO_TELEMETRY;
});

afterEach(() => {
  vi.restoreAllMocks();
  for (const key of ENV_KEYS) {
    const value = saved[key];
    if (typeof value === 'string') process.env[key] = value;
    else delete process.env[key];
  }
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`writes ${level} to stderr with a prefix and drops empty context`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('[provenant] hello');
    });

    it(`passes context through for ${level}`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', { runId: 'run-1' });

      expect(spy).toHaveBeenCalledWith('[provenant] hello', { runId: 'run-1' });
    });
  }

  it('never writes to stdout', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    logInfo('a');
    logWarning('b');
    logError('c');
    logDebug('d');

    expect(logSpy).not.toHaveBeenCalled();
  });
});

describe('shouldEmit', () => {
  it('defaults to warn and above', () => {
    const env = {};
    expect(shouldEmit('info', env)).toBe(false);
    expect(shouldEmit('warn', env)).toBe(true);
    expect(shouldEmit('error', env)).toBe(true);
  });

  it('lowers the threshold to info when verbose', () => {
    const env = { PROVENANT_VERBOSE: '1' };
    expect(shouldEmit('debug', env)).toBe(false);
    expect(shouldEmit('info', env)).toBe(true);
  });

  it('honours explicit levels over verbose', () => {
    expect(shouldEmit('warn', { PROVENANT_LOG_LEVEL: 'error', PROVENANT_VERBOSE: '1' })).toBe(false);
    expect(shouldEmit('debug', { PROVENANT_LOG_LEVEL: 'DEBUG' })).toBe(true);
  });

  it('is silenced by silent levels and the telemetry switch', () => {
    expect(shouldEmit('error', { PROVENANT_LOG_LEVEL: 'silent' })).toBe(false);
    expect(shouldEmit('error', { PROVENANT_LOG_LEVEL: 'off' })).toBe(false);
    expect(shouldEmit('error', { PROVENANT_NO_TELEMETRY: 'true', PROVENANT_LOG_LEVEL: 'debug' })).toBe(false);
  });
});
