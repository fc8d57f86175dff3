import pino from 'pino';
import type { BaseLogger } from 'pino';
import type { LogLevel } from '../config/settings.js';

export const SERVICE_NAME = 'cloudevent-mailer';

/**
 * pino options shared by the Fastify server logger.
 *
 * ISO timestamps and a fixed `name` so lines from this service can be
 * picked out of aggregated logs.
 */
export function loggerOptions(level: LogLevel): {
  level: LogLevel;
  name: string;
  timestamp: () => string;
} {
  return {
    level,
    name: SERVICE_NAME,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export type ConfigureLogging = (log: BaseLogger, level: LogLevel) => void;

/**
 * Build an idempotent logging configurator.
 *
 * Every call updates the level; the startup line is logged once for the
 * lifetime of the returned function.
 */
export function createLoggingConfigurator(): ConfigureLogging {
  let announced = false;

  return (log, level) => {
    log.level = level;

    if (!announced) {
      announced = true;
      log.info({ level }, `${SERVICE_NAME} started (ready to receive events)`);
    }
  };
}

/** Process-wide configurator. */
export const configureLogging: ConfigureLogging = createLoggingConfigurator();
