import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger, LevelWithSilent };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

function isLogLevel(value: string | undefined): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LevelWithSilent {
  if (process.env['VITEST'] !== undefined) return 'silent';
  const level = process.env['LOG_LEVEL'];
  return isLogLevel(level) ? level : 'info';
}

let root: Logger = pino({ name: 'polyodm', level: defaultLevel() });

export function rootLogger(): Logger {
  return root;
}

/** Replaces the root logger, e.g. to apply a configured level. */
export function configureLogger(options: { level: LevelWithSilent }): Logger {
  root = pino({ name: 'polyodm', level: options.level });
  return root;
}

export function childLogger(bindings: Record<string, unknown>): Logger {
  return root.child(bindings);
}
