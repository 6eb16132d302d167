import pino from 'pino';

export type Logger = pino.Logger;

export type LogLevel = pino.LevelWithSilent;

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Write to this stream instead of stdout */
  destination?: pino.DestinationStream;
}

const LOG_LEVELS: ReadonlyArray<LogLevel> = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the level from `OPENDOTA_LOG_LEVEL`, falling back to `warn` so a
 * library consumer sees nothing unless something goes wrong.
 */
export function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.OPENDOTA_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? defaultLogLevel(),
    name: options.name ?? 'opendota',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  return options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
}
