/**
 * Logging
 *
 * Structured pino loggers for the toolkit's components.
 *
 * @packageDocumentation
 */

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import { LOGGER_NAME } from '@dispatch-perf/types';
import { loadConfig } from './config';
import type { LogLevel } from './config';

export type { Logger } from 'pino';

/**
 * Logger creation options
 */
export interface LoggerOptions {
  /**
   * Minimum level written
   * @default level from loadConfig()
   */
  level?: LogLevel;

  /**
   * Where lines go
   * @default stdout
   */
  destination?: DestinationStream;
}

/**
 * Create a logger with the toolkit's base fields and formatters
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? loadConfig().logLevel;
  const pinoOptions: pino.LoggerOptions = {
    name: LOGGER_NAME,
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

let rootLogger: Logger | undefined;

/**
 * Shared logger, created on first use
 */
export function getLogger(): Logger {
  rootLogger ??= createLogger();
  return rootLogger;
}

/**
 * Logger for one component of the toolkit
 */
export function childLogger(component: string, parent: Logger = getLogger()): Logger {
  return parent.child({ component });
}
