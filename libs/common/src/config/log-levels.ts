import { LogLevel } from '@nestjs/common';

const ORDERED_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Expands a single threshold (e.g. `warn`) into the Nest levels at or above it.
 * `info` is accepted as an alias of `log`.
 */
export function logLevelsFor(level: string): LogLevel[] {
  const normalized = level.trim().toLowerCase() === 'info' ? 'log' : level.trim().toLowerCase();
  const index = ORDERED_LEVELS.findIndex((candidate) => candidate === normalized);
  return ORDERED_LEVELS.slice(0, index === -1 ? ORDERED_LEVELS.indexOf('log') + 1 : index + 1);
}
