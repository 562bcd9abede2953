import { LogLevel } from '@nestjs/common';

const ORDER: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Nest log levels enabled for a LOG_LEVEL setting.
 * `info` is Nest's `log`; unknown values fall back to `info`.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = (level ?? 'info').toLowerCase();
  const target = normalized === 'info' ? 'log' : normalized;
  const index = ORDER.findIndex(candidate => candidate === target);

  return ORDER.slice(0, (index === -1 ? ORDER.indexOf('log') : index) + 1);
}
