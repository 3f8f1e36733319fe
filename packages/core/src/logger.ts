import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from '@tollgate/shared';

export type { Logger };

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Defaults to stderr so command output on stdout stays clean */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.TOLLGATE_LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  return pino(
    { name: options.name ?? 'tollgate', level },
    options.destination ?? pino.destination(2),
  );
}

let rootLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

export function setLogger(logger: Logger): void {
  rootLogger = logger;
}
