/**
 * Structured JSON logger.
 *
 * Uses Pino for JSON logging that log collectors can parse line by line.
 */

import pino from 'pino';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const loggers = new Set<pino.Logger>();

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'info' if not specified or not a known level.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @returns Configured Pino logger
 */
export function setupLogger(name: string = 'ecs-exporter', level?: string): pino.Logger {
  const requested = (level || process.env.LOG_LEVEL || 'info').toLowerCase();
  const logLevel: LogLevel = isLogLevel(requested) ? requested : 'info';

  const logger = pino({
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  loggers.add(logger);
  return logger;
}

/**
 * Change the level of every logger created so far.
 *
 * Module-level loggers are created at import time, before the command line
 * is parsed, so the configured level is applied here afterwards.
 *
 * @param level - New log level (case-insensitive); unknown levels are ignored
 * @returns Whether the level was applied
 */
export function setLogLevel(level: string): boolean {
  const requested = level.toLowerCase();
  if (!isLogLevel(requested)) {
    return false;
  }
  for (const logger of loggers) {
    logger.level = requested;
  }
  return true;
}
