import { logger } from '@appium/support';

export const LOG_LEVELS = [
  'error',
  'warn',
  'info',
  'debug',
  'verbose',
  'silly',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = ReturnType<typeof logger.getLogger>;

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
const loggers = new Set<Logger>();

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function getLogger(name: string): Logger {
  const log = logger.getLogger(name);
  log.level = currentLevel;
  loggers.add(log);
  return log;
}

/** Applies the level to every logger handed out so far and to later ones. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  for (const log of loggers) {
    log.level = level;
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}
