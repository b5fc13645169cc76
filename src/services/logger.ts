// src/services/logger.ts: structured logging for the backend
import { Logger } from 'tslog';
import type { ILogObj } from 'tslog';

// tslog levels: 0 silly … 6 fatal
const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function resolveMinLevel(): number {
  if (process.env.NODE_ENV === 'test' || process.env.VITEST) return LEVELS.fatal;
  return LEVELS[(process.env.LOG_LEVEL ?? 'info').toLowerCase()] ?? LEVELS.info;
}

export const logger: Logger<ILogObj> = new Logger<ILogObj>({
  name: 'turn-orchestrator',
  minLevel: resolveMinLevel(),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: 'pretty',
});

/** Re-applies the level once config is loaded; unknown names fall back to info. */
export function setLogLevel(level: string): void {
  logger.settings.minLevel = LEVELS[level.toLowerCase()] ?? LEVELS.info;
}
