// src/services/logger.ts — structured logging for the research service
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

function resolveType(): 'pretty' | 'json' | 'hidden' {
  if (process.env.NODE_ENV === 'test') return 'hidden';
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty';
}

export const logger = new Logger({
  name: 'research-orchestrator',
  minLevel: LEVELS[(process.env.LOG_LEVEL ?? 'info').toLowerCase()] ?? 3,
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: resolveType(),
});

export function componentLogger(name: string) {
  return logger.getSubLogger({ name });
}
