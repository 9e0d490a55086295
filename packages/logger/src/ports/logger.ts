/**
 * Leveled logger.
 *
 * Every method formats `message` printf-style with `args` (see `util.format`).
 * The plain methods end the line with "\n"; the underscore methods write the same
 * bytes without it so the caller can continue the line.
 *
 * Implementations must never throw from a logging method.
 */
export interface Logger {
  error(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  debug(message: string, ...args: unknown[]): void
  trace(message: string, ...args: unknown[]): void

  _error(message: string, ...args: unknown[]): void
  _warn(message: string, ...args: unknown[]): void
  _info(message: string, ...args: unknown[]): void
  _debug(message: string, ...args: unknown[]): void
  _trace(message: string, ...args: unknown[]): void
}
