import pino, { type Logger } from 'pino';

export type { Logger };

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveLevel(): LogLevel {
  const fromEnv = process.env.BACKUP_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Root logger for the engine. Components receive children of this logger
 * (or an injected one) bound to their component name.
 */
export const logger: Logger = pino({
  name: 'strata-backup',
  level: resolveLevel(),
});

export function createLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
