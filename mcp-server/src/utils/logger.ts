/**
 * Scoped console logger.
 *
 * Everything is written to stderr: stdout belongs to the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const SECRET_KEY_PATTERN = /key|secret|token|password/i;

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return normalized;
    default:
      return 'info';
  }
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Replace the value of every secret-looking key with `***`.
 */
export function maskSecrets(values: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    masked[key] = SECRET_KEY_PATTERN.test(key) ? '***' : value;
  }
  return masked;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    console.error(`[${level.toUpperCase()}] [${scope}] ${message}`, ...args);
  };

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
  };
}
