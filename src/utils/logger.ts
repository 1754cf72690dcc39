/**
 * Structured diagnostics (pino). Written to stderr so stdout only carries
 * the run log and the report.
 */

import pino, { type Logger } from 'pino';

const defaultLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

export const logger: Logger = pino(
  {
    level: process.env.LOG_LEVEL || defaultLevel,
    base: { app: 'tts-batch' }
  },
  pino.destination(2)
);

// pino children copy the level at creation; module loggers exist before .env is read
const children: Logger[] = [];

export function createLogger(bindings: Record<string, unknown>): Logger {
  const child = logger.child(bindings);
  children.push(child);
  return child;
}

export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
