import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { isErrno, writeFileAtomic } from '../utils/atomic_write.js';
import { EventLogError, RunNotFoundError } from './errors.js';
import { RunEventSchema, nowTimestamp, type RunEvent, type RunEventInput } from './events.js';
import type { FileLockOptions } from './file_lock.js';
import { appendJsonLine, readJsonLines } from './jsonl_log.js';

export const EVENTS_FILE = 'events.jsonl';
export const INPUT_FILE = 'input.txt';
export const ARTIFACTS_DIR = 'artifacts';

const RUN_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}

export interface ReplayResult {
  events: RunEvent[];
  truncated: boolean;
}

/**
 * Per-run storage: `<runsDir>/<run_id>/events.jsonl` plus the run input and
 * step artifacts beside it.
 */
export class EventLog {
  constructor(
    readonly runsDir: string,
    private readonly lockOptions?: FileLockOptions,
  ) {}

  runDir(runId: string): string {
    if (!isRunId(runId)) {
      throw new RunNotFoundError(runId);
    }
    return path.join(this.runsDir, runId);
  }

  eventsPath(runId: string): string {
    return path.join(this.runDir(runId), EVENTS_FILE);
  }

  async append(runId: string, event: RunEventInput): Promise<RunEvent> {
    const parsed = RunEventSchema.safeParse({ ...event, timestamp: nowTimestamp(), run_id: runId });
    if (!parsed.success) {
      throw new EventLogError(`Refusing to append malformed ${event.type} event`, {
        runId,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    await appendJsonLine(this.eventsPath(runId), parsed.data, RunEventSchema, this.lockOptions);
    return parsed.data;
  }

  async replay(runId: string): Promise<ReplayResult> {
    const result = await readJsonLines(this.eventsPath(runId), RunEventSchema);
    if (!result) {
      throw new RunNotFoundError(runId);
    }
    return { events: result.records, truncated: result.truncated };
  }

  async exists(runId: string): Promise<boolean> {
    if (!isRunId(runId)) return false;
    try {
      await fs.access(this.eventsPath(runId));
      return true;
    } catch {
      return false;
    }
  }

  async listRunIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.runsDir);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return [];
      throw error;
    }
    const runIds: string[] = [];
    for (const entry of entries) {
      if (isRunId(entry) && (await this.exists(entry))) runIds.push(entry);
    }
    return runIds;
  }

  async writeInput(runId: string, input: string): Promise<void> {
    await writeFileAtomic(path.join(this.runDir(runId), INPUT_FILE), input);
  }

  async readInput(runId: string): Promise<string> {
    try {
      return await fs.readFile(path.join(this.runDir(runId), INPUT_FILE), 'utf8');
    } catch (error) {
      throw new EventLogError(`Run input missing for ${runId}`, { runId }, { cause: error });
    }
  }

  /** Returns the artifact path relative to the run directory. */
  async storeArtifact(runId: string, step: string, content: string): Promise<string> {
    const relative = path.posix.join(ARTIFACTS_DIR, `${step}.md`);
    await writeFileAtomic(path.join(this.runDir(runId), relative), content);
    return relative;
  }

  async loadArtifact(runId: string, relative: string): Promise<string> {
    try {
      return await fs.readFile(path.join(this.runDir(runId), relative), 'utf8');
    } catch (error) {
      throw new EventLogError(`Artifact ${relative} missing for run ${runId}`, { runId, artifact: relative }, { cause: error });
    }
  }

  async listArtifacts(runId: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(path.join(this.runDir(runId), ARTIFACTS_DIR));
      return entries.filter((entry) => entry.endsWith('.md')).sort();
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return [];
      throw error;
    }
  }
}
