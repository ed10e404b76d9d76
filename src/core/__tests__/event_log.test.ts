import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EventLogError, RunNotFoundError } from '../errors.js';
import { EventLog, isRunId } from '../event_log.js';

const RUN_ID = '00000000-0000-4000-8000-0000000000aa';

describe('EventLog', () => {
  let dir: string;
  let log: EventLog;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'provenant-events-'));
    log = new EventLog(dir);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('stamps appended events and replays them in order', async () => {
    const appended = await log.append(RUN_ID, { type: 'RunFailed', error: 'x', resumable: true });
    await log.append(RUN_ID, { type: 'RunCompleted', duration_ms: 3 });

    expect(appended.run_id).toBe(RUN_ID);
    expect(Number.isNaN(Date.parse(appended.timestamp))).toBe(false);

    const replay = await log.replay(RUN_ID);
    expect(replay.truncated).toBe(false);
    expect(replay.events.map((event) => event.type)).toEqual(['RunFailed', 'RunCompleted']);
    expect(await log.listRunIds()).toEqual([RUN_ID]);
  });

  it('refuses malformed events', async () => {
    await expect(log.append(RUN_ID, { type: 'RunCompleted', duration_ms: -1 })).rejects.toThrow(
      'Refusing to append malformed RunCompleted event',
    );
  });

  it('reports unknown and invalid run ids as not found', async () => {
    await expect(log.replay(RUN_ID)).rejects.toBeInstanceOf(RunNotFoundError);
    await expect(log.replay('../escape')).rejects.toThrow('Run not found: ../escape');
    expect(await log.exists('../escape')).toBe(false);
  });

  it('replays a log with a torn final line', async () => {
    await log.append(RUN_ID, { type: 'RunCompleted', duration_ms: 1 });
    await fs.appendFile(log.eventsPath(RUN_ID), '{"type":"RunFa');

    const replay = await log.replay(RUN_ID);

    expect(replay.truncated).toBe(true);
    expect(replay.events).toHaveLength(1);
  });

  it('keeps replaying after appending past a corrupt newline-terminated tail', async () => {
    await log.append(RUN_ID, { type: 'RunFailed', error: 'x', resumable: true });
    await fs.appendFile(log.eventsPath(RUN_ID), '{"type":"StepSta\n');
    expect((await log.replay(RUN_ID)).truncated).toBe(true);

    await log.append(RUN_ID, { type: 'RunCompleted', duration_ms: 2 });

    const replay = await log.replay(RUN_ID);
    expect(replay.truncated).toBe(false);
    expect(replay.events.map((event) => event.type)).toEqual(['RunFailed', 'RunCompleted']);
  });

  it('never loses a replayed event that lacked its newline', async () => {
    await log.append(RUN_ID, { type: 'RunFailed', error: 'x', resumable: true });
    const raw = await fs.readFile(log.eventsPath(RUN_ID), 'utf8');
    await fs.writeFile(log.eventsPath(RUN_ID), raw.trimEnd());
    expect((await log.replay(RUN_ID)).events).toHaveLength(1);

    await log.append(RUN_ID, { type: 'RunCompleted', duration_ms: 2 });

    expect((await log.replay(RUN_ID)).events.map((event) => event.type)).toEqual(['RunFailed', 'RunCompleted']);
  });

  it('stores input and artifacts beside the log', async () => {
    await log.writeInput(RUN_ID, 'hello');
    const relative = await log.storeArtifact(RUN_ID, 'summary', '# out');

    expect(relative).toBe('artifacts/summary.md');
    expect(await log.readInput(RUN_ID)).toBe('hello');
    expect(await log.loadArtifact(RUN_ID, relative)).toBe('# out');
    expect(await log.listArtifacts(RUN_ID)).toEqual(['summary.md']);
    await expect(log.loadArtifact(RUN_ID, 'artifacts/missing.md')).rejects.toBeInstanceOf(EventLogError);
  });

  it('recognises run ids', () => {
    expect(isRunId(RUN_ID)).toBe(true);
    expect(isRunId('run-1')).toBe(false);
  });
});
