export type LoggerErrorCode = "invalid_logger_config" | "logger_already_initialized"

/**
 * Contextual metadata attached to errors.
 * Carries structured data (offending fields, values) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type LoggerErrorOptions<C extends LoggerErrorCode = LoggerErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
}>

/**
 * Serialized error shape, JSON.stringify-safe.
 */
export type SerializedLoggerError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
}>

export class LoggerError<C extends LoggerErrorCode = LoggerErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext

  constructor(message: string, options: LoggerErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedLoggerError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
    }
  }
}

export type ConfigIssue = Readonly<{
  /** Dotted path of the offending field, e.g. "level" or "externalMarkers.0". */
  path: string
  message: string
}>

/** Construction of a logger configuration failed; nothing was coerced. */
export class LoggerConfigError extends LoggerError<"invalid_logger_config"> {
  readonly issues: readonly ConfigIssue[]

  constructor(message: string, issues: readonly ConfigIssue[], cause?: unknown) {
    super(message, { code: "invalid_logger_config", context: { issues }, cause })
    this.issues = issues
  }
}

/** `initLogger()` was called after a configuration had already been installed. */
export class LoggerInitError extends LoggerError<"logger_already_initialized"> {
  constructor() {
    super("Logger is already initialized; initLogger() may only be called once", {
      code: "logger_already_initialized",
    })
  }
}

export function isLoggerError(e: unknown): e is LoggerError {
  return e instanceof LoggerError
}
