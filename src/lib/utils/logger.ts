/**
 * Logger utility using Pino
 */

import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

const rootLogger = pino({
  level,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

const children = new Set<pino.Logger>();

export function createLogger(name: string) {
  const child = rootLogger.child({ name });
  children.add(child);
  return child;
}

export type Logger = ReturnType<typeof createLogger>;
export type LogLevel = pino.LevelWithSilent;

/** Applies `level` to the root logger and every component logger already created. */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

export { rootLogger as logger };
