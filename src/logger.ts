import pino from 'pino';

const LEVEL_ALIASES: Record<string, string> = {
  warning: 'warn',
  critical: 'fatal',
};

/**
 * Normalise a LOG_LEVEL value to a pino level, falling back to `info`.
 */
export function resolveLogLevel(value: string | undefined, fallback = 'info'): string {
  if (!value) {
    return fallback;
  }
  const lowered = value.trim().toLowerCase();
  const level = LEVEL_ALIASES[lowered] ?? lowered;
  return Object.hasOwn(pino.levels.values, level) || level === 'silent' ? level : fallback;
}

// stdout carries the MCP stdio transport, so logs go to stderr
export const logger = pino(
  {
    name: 'schoolconnect-mcp',
    level: resolveLogLevel(process.env.LOG_LEVEL, process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  },
  pino.destination(2)
);

export default logger;
