// src/services/logger.ts — structured logging for the orchestrator service
import { Logger } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export interface LogSettings {
  minLevel: number;
  type: 'pretty' | 'hidden';
}

/** `silent` hides all output; unknown names fall back to info. */
export function resolveLogSettings(raw: string | undefined): LogSettings {
  const name = raw?.trim().toLowerCase();
  if (name === 'silent') return { minLevel: LEVELS.fatal, type: 'hidden' };
  const minLevel = name && Object.hasOwn(LEVELS, name) ? LEVELS[name] : undefined;
  return { minLevel: minLevel ?? LEVELS.info, type: 'pretty' };
}

const initial = resolveLogSettings(process.env.LOG_LEVEL);

export const logger = new Logger({
  name: 'angle-orchestrator',
  minLevel: initial.minLevel,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: initial.type,
});

/** Re-reads the level once `.env` has been loaded. */
export function applyLogLevel(raw: string | undefined): LogSettings {
  const next = resolveLogSettings(raw);
  logger.settings.minLevel = next.minLevel;
  logger.settings.type = next.type;
  return next;
}
