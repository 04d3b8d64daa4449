/**
 * TROTLINE - Logging
 *
 * Components log through the console with a bracketed tag, e.g.
 * `[Ratings] 2024-05-04 Pinewood R3: 8 horses rated`. Anything with the
 * console's log/warn/error shape can be passed in instead.
 */

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};
