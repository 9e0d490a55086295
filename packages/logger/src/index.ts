export { StackCallSiteProvider } from "./adapters/call-site/stack-call-site-provider"
export { FixedCallSiteProvider } from "./adapters/call-site/fixed-call-site-provider"
export { FakeClock } from "./adapters/clock/fake-clock"
export { SystemClock } from "./adapters/clock/system-clock"
export { MemorySink, type CapturedChunk } from "./adapters/sinks/memory-sink"
export {
  ProcessSink,
  type ProcessSinkOptions,
  type WritableTarget,
} from "./adapters/sinks/process-sink"
export {
  createLogger,
  TerminalLogger,
  type EmitOptions,
  type TerminalLoggerDeps,
} from "./adapters/terminal/terminal-logger"
export {
  DEFAULT_EXTERNAL_MARKERS,
  DEFAULT_PATH_DEPTH,
  DEFAULT_TIME_FORMAT,
  defaultLoggerConfig,
  LoggerBuilder,
  parseLoggerConfig,
} from "./core/config"
export {
  type ConfigIssue,
  isLoggerError,
  LoggerConfigError,
  LoggerError,
  type LoggerErrorCode,
  LoggerInitError,
} from "./core/errors"
export {
  _debug,
  _error,
  _info,
  _trace,
  _warn,
  debug,
  error,
  getLogger,
  info,
  initLogger,
  isLoggerInitialized,
  trace,
  warn,
} from "./core/global"
export { compareLevels, isLevelEnabled } from "./core/level-filter"
export { classifyOrigin, externalPackageName, type Origin, type OriginPolicy } from "./core/origin"
export { LoggerRegistry } from "./core/registry"
export { displayPath } from "./core/source-path"
export type { CallSite, CallSiteProvider, LogEntryPoint } from "./ports/call-site"
export { type LogLevel, type LogLevelName, LogLevels, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerConfig, LoggerConfigInput } from "./ports/logger-options"
export { type ColorMode, type LoggerPreset, loggerPresets } from "./ports/preset"
export type { LogSink, OutputStream } from "./ports/sink"
export type { TimeSource } from "./ports/time-source"
