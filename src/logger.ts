/**
 * Console Logger
 *
 * Created once per entry point and handed to each component through its
 * constructor. `child` adds context that is repeated on every line.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/** Anything with console's leveled methods. */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface LoggerOptions {
  level?: LogLevel;
  context?: LogContext;
  sink?: LogSink;
  now?: () => Date;
}

const serializable = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;

function formatContext(context: LogContext): string {
  const entries = Object.entries(context).map(([key, value]) => [
    key,
    value instanceof Error ? (value.stack ?? value.message) : value,
  ]);
  if (entries.length === 0) {
    return '';
  }
  try {
    return ` ${JSON.stringify(Object.fromEntries(entries), serializable)}`;
  } catch (error) {
    // circular context; keep the line, drop the context
    const reason = error instanceof Error ? error.message : String(error);
    return ` ${JSON.stringify({ contextError: reason })}`;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const baseContext = options.context ?? {};
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (entryLevel: LogLevel, message: string, context: LogContext = {}): void => {
    if (LOG_LEVELS.indexOf(entryLevel) < threshold) {
      return;
    }
    const line = `${now().toISOString()} ${entryLevel.toUpperCase().padEnd(5)} ${message}${formatContext({
      ...baseContext,
      ...context,
    })}`;
    sink[entryLevel](line);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (context) =>
      createLogger({ level, context: { ...baseContext, ...context }, sink, now }),
  };
}
