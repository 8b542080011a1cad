/**
 * Logger
 *
 * Pino-based structured logger shared by every workspace. Until
 * `configureLogger` is called with validated settings, the level and
 * environment come from the process environment, with unknown values
 * falling back to the defaults.
 */

import { destination, pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerSettings {
  level: LogLevel;
  nodeEnv: string;
}

export type Logger = PinoLogger;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  return isLogLevel(value) ? value : 'info';
}

function createRootLogger(settings: LoggerSettings): Logger {
  // pino-pretty only makes sense for a human watching a terminal
  const usePretty = settings.nodeEnv === 'development' && process.stderr.isTTY === true;

  const options: LoggerOptions = {
    level: settings.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'ghidra-dmg',
      env: settings.nodeEnv,
    },
  };

  // Logs go to stderr; stdout belongs to the build summary
  return usePretty
    ? pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            destination: 2,
            ignore: 'pid,hostname,service,env',
          },
        },
      })
    : pino(options, destination(2));
}

let root: Logger | undefined;

function rootLogger(): Logger {
  root ??= createRootLogger({
    level: resolveLogLevel(process.env['LOG_LEVEL']),
    nodeEnv: process.env['NODE_ENV'] ?? 'development',
  });
  return root;
}

/**
 * Rebuild the shared logger; child loggers created afterwards use it
 */
export function configureLogger(settings: LoggerSettings): void {
  root = createRootLogger(settings);
}

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return rootLogger().child(context);
}

/**
 * Logger that discards everything, for callers that want no output
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
