import pino, { Logger } from 'pino';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Root logger for the process. Components take a child with a `component` binding.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', name = 'assistant-thread-broker' } = options;
  return pino({ level, name });
}

/**
 * Logger that discards everything (tests, library use)
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
