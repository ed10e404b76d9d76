import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EventLogError } from '../errors.js';
import { acquireFileLock, isPidAlive, withFileLock } from '../file_lock.js';

const DEAD_PID = 2_147_483_646;

describe('file lock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'provenant-lock-'));
    lockPath = path.join(dir, 'events.jsonl.lock');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates the lock file with the owner pid and removes it on release', async () => {
    const handle = await acquireFileLock(lockPath);
    const state: unknown = JSON.parse(await fs.readFile(lockPath, 'utf8'));
    expect(state).toMatchObject({ pid: process.pid });

    await handle.release();
    await expect(fs.access(lockPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('times out while a live process holds the lock', async () => {
    await fs.writeFile(lockPath, JSON.stringify({ pid: process.pid, startedAt: 'then', token: 'other' }));

    const attempt = acquireFileLock(lockPath, { timeoutMs: 60, retryIntervalMs: 10 });

    await expect(attempt).rejects.toBeInstanceOf(EventLogError);
    await expect(attempt).rejects.toThrow(`Lock acquisition timed out after 60ms (pid=${process.pid})`);
  });

  it('reclaims a lock left by a dead process', async () => {
    await fs.writeFile(lockPath, JSON.stringify({ pid: DEAD_PID, startedAt: 'then', token: 'stale' }));

    const handle = await acquireFileLock(lockPath, { timeoutMs: 500 });
    const state: unknown = JSON.parse(await fs.readFile(lockPath, 'utf8'));
    expect(state).toMatchObject({ pid: process.pid });
    await handle.release();
  });

  it('leaves a lock it no longer owns in place on release', async () => {
    const handle = await acquireFileLock(lockPath);
    const foreign = JSON.stringify({ pid: process.pid, startedAt: 'later', token: 'someone-else' });
    await fs.writeFile(lockPath, foreign);

    await handle.release();

    expect(await fs.readFile(lockPath, 'utf8')).toBe(foreign);
  });

  it('serializes critical sections and releases after failures', async () => {
    const order: string[] = [];
    let entered: () => void = () => {};
    const started = new Promise<void>((resolve) => {
      entered = resolve;
    });
    const slow = withFileLock(lockPath, async () => {
      order.push('a:start');
      entered();
      await new Promise((resolve) => setTimeout(resolve, 30));
      order.push('a:end');
    });
    await started;
    const fast = withFileLock(lockPath, async () => {
      order.push('b');
    });
    await Promise.all([slow, fast]);
    expect(order).toEqual(['a:start', 'a:end', 'b']);

    await expect(withFileLock(lockPath, async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(fs.access(lockPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('reports pid liveness', () => {
    expect(isPidAlive(process.pid)).toBe(true);
    expect(isPidAlive(DEAD_PID)).toBe(false);
    expect(isPidAlive(0)).toBe(false);
  });
});
