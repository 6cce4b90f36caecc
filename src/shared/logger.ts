import pino from 'pino';

const DEFAULT_LEVEL = 'warn';

/** Returns `requested` when pino knows the level, otherwise the default. */
export function resolveLogLevel(requested: string | undefined): string {
  if (requested === undefined) return DEFAULT_LEVEL;
  const level = requested.trim().toLowerCase();
  if (level === 'silent' || Object.hasOwn(pino.levels.values, level)) return level;
  return DEFAULT_LEVEL;
}

// Logs go to stderr: stdout belongs to the command echo and the children's own output.
export const logger = pino(
  {
    name: 'taskrun',
    level: resolveLogLevel(process.env['LOG_LEVEL']),
  },
  pino.destination({ dest: 2, sync: true })
);
