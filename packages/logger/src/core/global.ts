import type { Logger } from "../ports/logger"
import type { LoggerConfig } from "../ports/logger-options"
import type { LoggerBuilder } from "./config"
import { LoggerRegistry } from "./registry"

const registry = new LoggerRegistry()

/**
 * Installs the process-wide logger. May be called once.
 *
 * @throws LoggerConfigError when given a builder with invalid settings
 * @throws LoggerInitError on a second call
 */
export function initLogger(config?: LoggerConfig | LoggerBuilder): void {
  registry.init(config)
}

export function isLoggerInitialized(): boolean {
  return registry.isInitialized()
}

/** The installed logger, or the default-config logger before `initLogger()`. */
export function getLogger(): Logger {
  return registry.current()
}

export function error(message: string, ...args: unknown[]): void {
  registry.current().emit("error", message, args, { boundary: error })
}

export function warn(message: string, ...args: unknown[]): void {
  registry.current().emit("warn", message, args, { boundary: warn })
}

export function info(message: string, ...args: unknown[]): void {
  registry.current().emit("info", message, args, { boundary: info })
}

export function debug(message: string, ...args: unknown[]): void {
  registry.current().emit("debug", message, args, { boundary: debug })
}

export function trace(message: string, ...args: unknown[]): void {
  registry.current().emit("trace", message, args, { boundary: trace })
}

export function _error(message: string, ...args: unknown[]): void {
  registry.current().emit("error", message, args, { newline: false, boundary: _error })
}

export function _warn(message: string, ...args: unknown[]): void {
  registry.current().emit("warn", message, args, { newline: false, boundary: _warn })
}

export function _info(message: string, ...args: unknown[]): void {
  registry.current().emit("info", message, args, { newline: false, boundary: _info })
}

export function _debug(message: string, ...args: unknown[]): void {
  registry.current().emit("debug", message, args, { newline: false, boundary: _debug })
}

export function _trace(message: string, ...args: unknown[]): void {
  registry.current().emit("trace", message, args, { newline: false, boundary: _trace })
}
