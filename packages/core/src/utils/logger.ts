/**
 * Logger - Console monkey-patch for log level filtering
 *
 * Modules log through `console.debug/info/warn/error` with a `[scope]` prefix.
 * `patchConsole()` makes those calls respect LOG_LEVEL (or `setLogLevel()`), and
 * sends debug/info to stderr so stdout stays reserved for command output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const original = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';
let patched = false;

/**
 * Parse a log level name (case-insensitive). `warning` is accepted as `warn`.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'warning') {
    return 'warn';
  }
  return LOG_LEVELS.find((level) => level === normalized);
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function shouldLog(level: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[currentLevel];
}

/**
 * Patch console methods to respect the current log level.
 *
 * Safe to call more than once; only the first call patches.
 */
export function patchConsole(): void {
  if (patched) {
    return;
  }
  patched = true;

  console.debug = (...args: unknown[]) => {
    if (shouldLog('debug')) original.error(...args);
  };
  console.info = (...args: unknown[]) => {
    if (shouldLog('info')) original.error(...args);
  };
  console.warn = (...args: unknown[]) => {
    if (shouldLog('warn')) original.warn(...args);
  };
  console.error = (...args: unknown[]) => {
    if (shouldLog('error')) original.error(...args);
  };
}
