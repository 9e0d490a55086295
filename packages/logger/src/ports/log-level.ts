export const logLevelNames = ["error", "warn", "info", "debug", "trace"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric verbosity ranks.
 *
 * These values define the ordering of log levels for comparison
 * and filtering (higher = more verbose).
 */
export const LogLevels = {
  /** Failures of the current operation. Emitted at every threshold. */
  Error: 1,
  /** Indications of potential issues or unexpected situations. */
  Warn: 2,
  /** High-level informational messages about normal operation. */
  Info: 3,
  /** Debug-level information useful during development and investigation. */
  Debug: 4,
  /** Finest-grained diagnostic information. */
  Trace: 5,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export const LEVEL_RANK: Readonly<Record<LogLevelName, LogLevel>> = {
  error: LogLevels.Error,
  warn: LogLevels.Warn,
  info: LogLevels.Info,
  debug: LogLevels.Debug,
  trace: LogLevels.Trace,
}
