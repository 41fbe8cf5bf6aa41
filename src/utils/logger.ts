import process from 'process';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LOG_PREFIX = '[slides-to-docx]';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === 'string') return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Write one log line to stderr. stdout is reserved for command output.
 */
export function logToStderr(level: LogLevel, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  process.stderr.write(`${LOG_PREFIX} [${level}] ${message}\n`);
}

function log(level: LogLevel, args: unknown[]): void {
  logToStderr(level, args.map(formatArg).join(' '));
}

export const logger = {
  debug: (...args: unknown[]) => log('debug', args),
  info: (...args: unknown[]) => log('info', args),
  warning: (...args: unknown[]) => log('warning', args),
  error: (...args: unknown[]) => log('error', args),
};
