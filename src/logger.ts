/**
 * Stages log through a console-shaped object so callers (and tests) can swap it.
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
