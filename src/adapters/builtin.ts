import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { BuiltinAction } from '../core/pipeline.js';
import { AdapterError, errorMessage } from '../core/errors.js';

export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * In-process actions. `read_file` treats its (trimmed) input as a path and
 * returns the file's text.
 */
export async function runBuiltin(action: BuiltinAction, input: string, cwd: string): Promise<string> {
  switch (action) {
    case 'identity':
      return input;
    case 'normalize_whitespace':
      return normalizeWhitespace(input);
    case 'read_file': {
      const target = input.trim();
      if (!target) {
        throw new AdapterError('read_file expects a file path as input');
      }
      const resolved = path.resolve(cwd, target);
      try {
        return await fs.readFile(resolved, 'utf8');
      } catch (error) {
        throw new AdapterError(`read_file could not read ${resolved}: ${errorMessage(error)}`, { cause: error });
      }
    }
  }
}
