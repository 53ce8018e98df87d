import pino, { type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
}

/** Named pino logger; level defaults to LOG_LEVEL, then `info`. */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  return pino({
    name,
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
  });
}

/** Logger that discards everything; handy as a default for library callers. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
