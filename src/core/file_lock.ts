import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import { logWarning } from '../telemetry/logger.js';
import { isErrno } from '../utils/atomic_write.js';
import { EventLogError } from './errors.js';

export const LOCK_ACQUIRE_TIMEOUT_MS = 5_000;
export const LOCK_RETRY_INTERVAL_MS = 25;

export interface FileLockState {
  pid: number;
  startedAt: string;
  token: string;
}

export interface FileLockOptions {
  timeoutMs?: number;
  retryIntervalMs?: number;
}

export interface FileLockHandle {
  readonly lockPath: string;
  release(): Promise<void>;
}

function parseLockState(raw: string): FileLockState | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== 'object') return null;
    const pid = 'pid' in parsed ? parsed.pid : undefined;
    const startedAt = 'startedAt' in parsed ? parsed.startedAt : undefined;
    const token = 'token' in parsed ? parsed.token : undefined;
    if (typeof pid !== 'number' || typeof startedAt !== 'string' || typeof token !== 'string') return null;
    return { pid, startedAt, token };
  } catch {
    // A half-written lock file is treated like a foreign one with no owner.
    return null;
  }
}

export function isPidAlive(pid: number): boolean {
  if (!Number.isFinite(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrno(error, 'EPERM');
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function readLockState(lockPath: string): Promise<FileLockState | null | 'missing'> {
  try {
    return parseLockState(await fs.readFile(lockPath, 'utf8'));
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return 'missing';
    throw error;
  }
}

async function releaseLock(lockPath: string, expected: FileLockState): Promise<void> {
  const observed = await readLockState(lockPath);
  if (observed === 'missing' || observed === null) return;
  if (
    observed.pid !== expected.pid
    || observed.startedAt !== expected.startedAt
    || observed.token !== expected.token
  ) {
    return;
  }
  try {
    await fs.unlink(lockPath);
  } catch (error) {
    if (!isErrno(error, 'ENOENT')) throw error;
  }
}

async function removeStaleLock(lockPath: string, observed: FileLockState): Promise<boolean> {
  // Re-read right before unlinking so a lock re-taken by a live process survives.
  const current = await readLockState(lockPath);
  if (current === 'missing') return true;
  if (current === null || current.token !== observed.token) return false;
  try {
    await fs.unlink(lockPath);
  } catch (error) {
    if (!isErrno(error, 'ENOENT')) throw error;
  }
  logWarning('Recovered stale lock left by a dead process', { path: lockPath, pid: observed.pid });
  return true;
}

/**
 * Take an exclusive PID lock file (`O_CREAT | O_EXCL`). Waits up to
 * `timeoutMs` for a live holder; locks owned by dead processes are reclaimed.
 */
export async function acquireFileLock(lockPath: string, options: FileLockOptions = {}): Promise<FileLockHandle> {
  const timeoutMs = options.timeoutMs ?? LOCK_ACQUIRE_TIMEOUT_MS;
  const retryIntervalMs = options.retryIntervalMs ?? LOCK_RETRY_INTERVAL_MS;
  const deadline = Date.now() + timeoutMs;

  while (true) {
    const state: FileLockState = {
      pid: process.pid,
      startedAt: new Date().toISOString(),
      token: randomUUID(),
    };
    try {
      await fs.writeFile(lockPath, JSON.stringify(state), { encoding: 'utf8', flag: 'wx' });
      return {
        lockPath,
        release: () => releaseLock(lockPath, state),
      };
    } catch (error) {
      if (!isErrno(error, 'EEXIST')) {
        throw new EventLogError(`Failed to create lock file ${lockPath}`, { path: lockPath }, { cause: error });
      }
    }

    const observed = await readLockState(lockPath);
    if (observed === 'missing') continue;
    if (observed !== null && !isPidAlive(observed.pid)) {
      if (await removeStaleLock(lockPath, observed)) continue;
    }

    if (Date.now() >= deadline) {
      const holder = observed === null ? 'unknown' : `pid=${observed.pid}`;
      throw new EventLogError(`Lock acquisition timed out after ${timeoutMs}ms (${holder})`, {
        path: lockPath,
        holder: observed,
      });
    }
    await sleep(retryIntervalMs);
  }
}

export async function withFileLock<T>(lockPath: string, fn: () => Promise<T>, options?: FileLockOptions): Promise<T> {
  const handle = await acquireFileLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await handle.release();
  }
}
