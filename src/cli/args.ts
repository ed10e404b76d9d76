import * as fs from 'node:fs/promises';
import { createError } from './errors.js';

export interface CommandOptions {
  workspace: string;
  args: string[];
  rawArgs: string[];
}

/** `parseArgs` with `strict: false` types every value loosely; keep only real strings. */
export function stringValue(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

export function stringValues(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
}

export function requirePositional(positionals: string[], index: number, usage: string): string {
  const value = (positionals[index] ?? '').trim();
  if (!value) {
    throw createError('INVALID_ARGUMENT', `Missing argument. Usage: ${usage}`);
  }
  return value;
}

export function parsePositiveInt(raw: string | undefined, flag: string, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0 || String(value) !== raw.trim()) {
    throw createError('INVALID_ARGUMENT', `${flag} must be a positive integer (got "${raw}")`);
  }
  return value;
}

export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function readTextFile(filePath: string, flag: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw createError('INVALID_ARGUMENT', `${flag} ${filePath} could not be read: ${error instanceof Error ? error.message : String(error)}`);
  }
}
