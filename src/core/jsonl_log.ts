import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { z } from 'zod';
import { logWarning } from '../telemetry/logger.js';
import { isErrno } from '../utils/atomic_write.js';
import { EventLogError } from './errors.js';
import { withFileLock, type FileLockOptions } from './file_lock.js';

const NEWLINE = 0x0a;

export interface JsonlReadResult<T> {
  records: T[];
  /** True when a corrupt final line was dropped (the writer stopped mid-record). */
  truncated: boolean;
  corruptLine?: number;
}

export function lockPathFor(logPath: string): string {
  return `${logPath}.lock`;
}

/**
 * Append one record as a single JSON line under the log's lock file.
 * Sequence per write: open(append) → repair tail → write → datasync → close → unlock.
 * `schema` is the one replay uses, so both agree on what a bad tail is.
 */
export async function appendJsonLine<T>(
  logPath: string,
  record: T,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  lockOptions?: FileLockOptions,
): Promise<void> {
  const line = `${JSON.stringify(record)}\n`;
  try {
    await fs.mkdir(path.dirname(logPath), { recursive: true });
  } catch (error) {
    throw new EventLogError(`Failed to create log directory for ${logPath}`, { path: logPath }, { cause: error });
  }

  await withFileLock(lockPathFor(logPath), async () => {
    let handle: fs.FileHandle | undefined;
    try {
      handle = await fs.open(logPath, 'a+');
      const prefix = await repairTail(handle, logPath, schema);
      await handle.write(`${prefix}${line}`);
      await handle.datasync();
    } catch (error) {
      if (error instanceof EventLogError) throw error;
      throw new EventLogError(`Failed to append to ${logPath}`, { path: logPath }, { cause: error });
    } finally {
      await handle?.close();
    }
  }, lockOptions);
}

export type TailState =
  | { state: 'clean' }
  /** The final record parses but its newline never made it to disk. */
  | { state: 'unterminated' }
  /** The final line is where the writer stopped; `keep` is the byte length before it. */
  | { state: 'corrupt'; keep: number; line: number; reason: string };

/** Classify the last non-blank line the same way replay does. */
export function inspectTail<T>(content: Buffer, schema: z.ZodType<T, z.ZodTypeDef, unknown>): TailState {
  let last = content.length - 1;
  while (last >= 0 && isBlankByte(content[last])) last--;
  if (last < 0) return { state: 'clean' };

  const start = content.lastIndexOf(NEWLINE, last) + 1;
  const parsed = parseLine(content.subarray(start, last + 1).toString('utf8').trim(), schema);
  if (!parsed.ok) {
    return { state: 'corrupt', keep: start, line: countNewlines(content, start) + 1, reason: parsed.reason };
  }
  return content.indexOf(NEWLINE, last) === -1 ? { state: 'unterminated' } : { state: 'clean' };
}

/**
 * Bring the tail in line with what replay reported: a corrupt final line is
 * cut, a valid unterminated one gets its newline. Returns text to write ahead
 * of the next record.
 */
async function repairTail<T>(handle: fs.FileHandle, logPath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<string> {
  const { size } = await handle.stat();
  if (size === 0) return '';

  const tail = inspectTail(await handle.readFile(), schema);
  switch (tail.state) {
    case 'clean':
      return '';
    case 'unterminated':
      return '\n';
    case 'corrupt':
      await handle.truncate(tail.keep);
      logWarning('Dropped corrupt trailing record from log', {
        path: logPath,
        line: tail.line,
        reason: tail.reason,
        droppedBytes: size - tail.keep,
      });
      return '';
  }
}

function isBlankByte(byte: number | undefined): boolean {
  return byte === NEWLINE || byte === 0x0d || byte === 0x20 || byte === 0x09;
}

function countNewlines(content: Buffer, end: number): number {
  let count = 0;
  for (let index = content.indexOf(NEWLINE); index !== -1 && index < end; index = content.indexOf(NEWLINE, index + 1)) {
    count++;
  }
  return count;
}

/**
 * Read every record in order. Returns null when the log does not exist.
 *
 * A corrupt final line is treated as the point where the writer stopped; a
 * corrupt line followed by valid records is an integrity failure.
 */
export async function readJsonLines<T>(
  logPath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<JsonlReadResult<T> | null> {
  let raw: string;
  try {
    raw = await fs.readFile(logPath, 'utf8');
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return null;
    throw new EventLogError(`Failed to read ${logPath}`, { path: logPath }, { cause: error });
  }
  return parseJsonLines(raw, schema, logPath);
}

export function parseJsonLines<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  source = '<memory>',
): JsonlReadResult<T> {
  const lines = raw.split('\n');
  const lastContentIndex = findLastContentIndex(lines);
  const records: T[] = [];

  for (let index = 0; index <= lastContentIndex; index++) {
    const line = lines[index]?.trim() ?? '';
    if (!line) continue;
    const parsed = parseLine(line, schema);
    if (parsed.ok) {
      records.push(parsed.value);
      continue;
    }
    if (index === lastContentIndex) {
      logWarning('Ignoring corrupt trailing record; treating log as stopped here', {
        path: source,
        line: index + 1,
        reason: parsed.reason,
      });
      return { records, truncated: true, corruptLine: index + 1 };
    }
    throw new EventLogError(`Corrupt record at ${source}:${index + 1}: ${parsed.reason}`, {
      path: source,
      line: index + 1,
    });
  }

  return { records, truncated: false };
}

function findLastContentIndex(lines: string[]): number {
  for (let index = lines.length - 1; index >= 0; index--) {
    if ((lines[index] ?? '').trim()) return index;
  }
  return -1;
}

type LineParse<T> = { ok: true; value: T } | { ok: false; reason: string };

function parseLine<T>(line: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): LineParse<T> {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : 'invalid JSON' };
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    return { ok: false, reason: issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'schema mismatch' };
  }
  return { ok: true, value: result.data };
}
