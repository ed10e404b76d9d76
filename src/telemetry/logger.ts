import { isTelemetryDisabled, isVerbose } from '../utils/runtime_controls.js';

export type LogContext = Record<string, unknown>;
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LoggerFn = (message: string, context?: LogContext) => void;

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHTS;
}

export function shouldEmit(level: LogLevel, env: NodeJS.ProcessEnv = process.env): boolean {
  if (isTelemetryDisabled(env)) {
    return false;
  }

  const envLevel = String(env.PROVENANT_LOG_LEVEL ?? '').toLowerCase().trim();
  if (envLevel === 'silent' || envLevel === 'none' || envLevel === 'off' || envLevel === 'quiet') {
    return false;
  }
  const threshold = isLogLevel(envLevel)
    ? LEVEL_WEIGHTS[envLevel]
    : (isVerbose(env) ? LEVEL_WEIGHTS.info : LEVEL_WEIGHTS.warn);

  return LEVEL_WEIGHTS[level] >= threshold;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (!shouldEmit(level)) return;

  // stdout carries command output and `--json` payloads; logs stay on stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(`[provenant] ${message}`, context);
    return;
  }
  logger(`[provenant] ${message}`);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
