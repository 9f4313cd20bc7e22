/**
 * Service Logger
 *
 * Structured logging for the ledger services.
 */

import pino from 'pino';

export type ServiceLogger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const level = process.env.LOG_LEVEL ?? 'info';

export const logger = pino({
  name: 'tidelock',
  level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Set the root level. Child loggers take the level in force when they are
 * created, so call this before building services.
 */
export function setLogLevel(next: LogLevel): void {
  logger.level = next;
}

/**
 * Create a child logger for a service or component
 */
export function createServiceLogger(component: string): ServiceLogger {
  return logger.child({ component });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Structured log helpers for common ledger events
 */
export const log = {
  methodEntry: (log: ServiceLogger, method: string, context: Record<string, unknown> = {}) => {
    log.debug({ method, ...context, msg: `${method} called` });
  },

  methodExit: (log: ServiceLogger, method: string, context: Record<string, unknown> = {}) => {
    log.debug({ method, ...context, msg: `${method} completed` });
  },

  methodError: (
    log: ServiceLogger,
    method: string,
    error: unknown,
    context: Record<string, unknown> = {}
  ) => {
    log.warn({ method, ...context, error: errorMessage(error), msg: `${method} failed` });
  },

  operationCommitted: (log: ServiceLogger, operation: string, events: number) => {
    log.info({ operation, events, msg: 'Ledger operation committed' });
  },

  operationRolledBack: (
    log: ServiceLogger,
    operation: string,
    undoSteps: number,
    error: unknown
  ) => {
    log.warn({ operation, undoSteps, error: errorMessage(error), msg: 'Ledger operation rolled back' });
  },

  parameterChanged: (log: ServiceLogger, name: string, value: string) => {
    log.info({ name, value, msg: 'Ledger parameter changed' });
  },
};
