/**
 * Leveled logger that writes to stderr.
 * The threshold comes from LOG_LEVEL (debug | info | warn | error | silent).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function writeArgs(args: unknown[]): void {
  if (args.length > 0) {
    process.stderr.write(`${JSON.stringify(args.length === 1 ? args[0] : args, null, 2)}\n`);
  }
}

export const logger = {
  setLevel(level: LogLevel): void {
    threshold = level;
  },

  info: (message: string, ...args: unknown[]) => {
    if (!enabled('info')) return;
    process.stderr.write(`[INFO] ${message}\n`);
    writeArgs(args);
  },

  error: (message: string, error?: unknown) => {
    if (!enabled('error')) return;
    process.stderr.write(`[ERROR] ${message}\n`);
    if (error) {
      process.stderr.write(
        `${error instanceof Error ? error.stack : JSON.stringify(error, null, 2)}\n`
      );
    }
  },

  debug: (message: string, ...args: unknown[]) => {
    if (!enabled('debug')) return;
    process.stderr.write(`[DEBUG] ${message}\n`);
    writeArgs(args);
  },

  warn: (message: string, ...args: unknown[]) => {
    if (!enabled('warn')) return;
    process.stderr.write(`[WARN] ${message}\n`);
    writeArgs(args);
  },
};
