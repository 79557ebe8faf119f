/**
 * Logger seam. Components write `[component] message` lines through this
 * interface; the default is the global console.
 */
export type Logger = Pick<Console, 'info' | 'warn' | 'error' | 'debug'>;

/** Logger that drops everything; used by tests and quiet CLI runs. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
