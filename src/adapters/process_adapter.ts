import { execa } from 'execa';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { AdapterError, errorMessage } from '../core/errors.js';

const STDERR_TAIL_CHARS = 500;

export interface ProcessInvocation {
  command: string;
  args: string[];
  input: string;
  timeoutMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function tail(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > STDERR_TAIL_CHARS ? `...${trimmed.slice(-STDERR_TAIL_CHARS)}` : trimmed;
}

/**
 * Run an external text transformer: input on stdin, result on stdout. The
 * process is killed when it outlives `timeoutMs`.
 */
export async function runProcess(invocation: ProcessInvocation): Promise<string> {
  const { command, args, input, timeoutMs } = invocation;
  logDebug('Adapter: spawning process', { command, args, inputBytes: Buffer.byteLength(input, 'utf8'), timeoutMs });

  let output: { exitCode?: number; stdout?: string; stderr?: string; timedOut?: boolean; failed?: boolean };
  try {
    output = await execa(command, args, {
      input,
      cwd: invocation.cwd,
      env: invocation.env,
      timeout: timeoutMs > 0 ? timeoutMs : undefined,
      reject: false,
      stripFinalNewline: false,
    });
  } catch (error) {
    throw new AdapterError(`Failed to start ${command}: ${errorMessage(error)}`, { cause: error });
  }

  const stderr = String(output.stderr ?? '');
  if (output.timedOut) {
    logWarning('Adapter: process timed out', { command, timeoutMs });
    throw new AdapterError(`${command} timed out after ${timeoutMs}ms`, { timedOut: true, stderr: tail(stderr) });
  }
  const exitCode = Number(output.exitCode ?? 1);
  if (output.failed || exitCode !== 0) {
    const detail = tail(stderr) || 'no stderr output';
    throw new AdapterError(`${command} exited with code ${exitCode}: ${detail}`, { exitCode, stderr: tail(stderr) });
  }
  return String(output.stdout ?? '');
}
