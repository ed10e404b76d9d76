import * as path from 'node:path';
import { writeFileAtomic } from '../utils/atomic_write.js';

export function formatJson(payload: unknown): string {
  return `${JSON.stringify(payload, null, 2)}\n`;
}

/** Write a `--json` payload to stdout, or to `outPath` when one is given. */
export async function emitJsonOutput(payload: unknown, outPath?: string): Promise<void> {
  const json = formatJson(payload);
  if (outPath) {
    const resolved = path.resolve(outPath);
    await writeFileAtomic(resolved, json);
    process.stderr.write(`JSON written to ${resolved}\n`);
    return;
  }
  if (process.stdout.write(json)) return;
  await new Promise<void>((resolve) => {
    process.stdout.once('drain', resolve);
  });
}
