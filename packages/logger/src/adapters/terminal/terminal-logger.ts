import { Chalk, type ChalkInstance } from "chalk"
import { defaultLoggerConfig } from "../../core/config"
import { isLevelEnabled } from "../../core/level-filter"
import { classifyOrigin } from "../../core/origin"
import { formatMessage, renderLine } from "../../core/render"
import type { CallSiteProvider, LogEntryPoint } from "../../ports/call-site"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerConfig } from "../../ports/logger-options"
import type { LogSink, OutputStream } from "../../ports/sink"
import type { TimeSource } from "../../ports/time-source"
import { StackCallSiteProvider } from "../call-site/stack-call-site-provider"
import { SystemClock } from "../clock/system-clock"
import { ProcessSink } from "../sinks/process-sink"

export type TerminalLoggerDeps = {
  sink?: LogSink
  clock?: TimeSource
  callSites?: CallSiteProvider
}

export type EmitOptions = {
  /** Append "\n". Default: true */
  newline?: boolean
  /** Public function the caller invoked; used to locate the call site. */
  boundary?: LogEntryPoint
}

const LEVEL_TO_STREAM: Record<LogLevelName, OutputStream> = {
  error: "stderr",
  warn: "stderr",
  info: "stdout",
  debug: "stdout",
  trace: "stdout",
}

export class TerminalLogger implements Logger {
  readonly config: LoggerConfig

  private readonly sink: LogSink
  private readonly clock: TimeSource
  private readonly callSites: CallSiteProvider
  private readonly palettes: Record<OutputStream, ChalkInstance>
  private dropped = 0

  constructor(config: LoggerConfig = defaultLoggerConfig(), deps: TerminalLoggerDeps = {}) {
    this.config = config
    this.sink = deps.sink ?? new ProcessSink()
    this.clock = deps.clock ?? new SystemClock()
    this.callSites = deps.callSites ?? new StackCallSiteProvider()
    this.palettes = {
      stdout: this.palette("stdout"),
      stderr: this.palette("stderr"),
    }
  }

  /** Lines lost to a failure while formatting or writing. */
  get droppedCount(): number {
    return this.dropped
  }

  // Bound to the instance: usable detached, e.g. `promise.catch(logger.error)`.
  readonly error = (message: string, ...args: unknown[]): void => {
    this.emit("error", message, args, { boundary: this.error })
  }

  readonly warn = (message: string, ...args: unknown[]): void => {
    this.emit("warn", message, args, { boundary: this.warn })
  }

  readonly info = (message: string, ...args: unknown[]): void => {
    this.emit("info", message, args, { boundary: this.info })
  }

  readonly debug = (message: string, ...args: unknown[]): void => {
    this.emit("debug", message, args, { boundary: this.debug })
  }

  readonly trace = (message: string, ...args: unknown[]): void => {
    this.emit("trace", message, args, { boundary: this.trace })
  }

  readonly _error = (message: string, ...args: unknown[]): void => {
    this.emit("error", message, args, { newline: false, boundary: this._error })
  }

  readonly _warn = (message: string, ...args: unknown[]): void => {
    this.emit("warn", message, args, { newline: false, boundary: this._warn })
  }

  readonly _info = (message: string, ...args: unknown[]): void => {
    this.emit("info", message, args, { newline: false, boundary: this._info })
  }

  readonly _debug = (message: string, ...args: unknown[]): void => {
    this.emit("debug", message, args, { newline: false, boundary: this._debug })
  }

  readonly _trace = (message: string, ...args: unknown[]): void => {
    this.emit("trace", message, args, { newline: false, boundary: this._trace })
  }

  /**
   * Filters, renders and writes one record. Never throws: a failure drops the line
   * and increments {@link droppedCount}.
   */
  emit(
    level: LogLevelName,
    message: string,
    args: readonly unknown[] = [],
    opts: EmitOptions = {},
  ): void {
    try {
      if (!isLevelEnabled(this.config.level, level)) return

      const site = this.callSites.capture(opts.boundary ?? this.emit)

      if (this.config.onlyProjectLogs && classifyOrigin(site.file, this.config) === "external") {
        return
      }

      const stream = LEVEL_TO_STREAM[level]
      const line = renderLine(
        { level, message: formatMessage(message, args), time: this.clock.now(), site },
        this.config,
        this.palettes[stream],
      )

      this.sink.write(stream, opts.newline === false ? line : `${line}\n`)
    } catch {
      this.dropped += 1
    }
  }

  private palette(stream: OutputStream): ChalkInstance {
    const colored =
      this.config.color === "always" ||
      (this.config.color === "auto" && this.sink.supportsColor(stream))

    return new Chalk({ level: colored ? 1 : 0 })
  }
}

export function createLogger(
  config: LoggerConfig = defaultLoggerConfig(),
  deps: TerminalLoggerDeps = {},
): TerminalLogger {
  return new TerminalLogger(config, deps)
}
