import { TerminalLogger, type TerminalLoggerDeps } from "../adapters/terminal/terminal-logger"
import type { LoggerConfig } from "../ports/logger-options"
import { defaultLoggerConfig, LoggerBuilder } from "./config"
import { LoggerInitError } from "./errors"

/**
 * Holds the single installed logger of a process.
 *
 * @remarks
 * - `init()` succeeds once; later calls throw and keep the first logger.
 * - Before `init()`, `current()` returns a logger built from the default config.
 *   Using it does not count as initialization.
 */
export class LoggerRegistry {
  private installed: TerminalLogger | undefined
  private fallback: TerminalLogger | undefined

  constructor(private readonly deps: TerminalLoggerDeps = {}) {}

  /** @throws LoggerInitError when a logger is already installed */
  init(config: LoggerConfig | LoggerBuilder = defaultLoggerConfig()): TerminalLogger {
    if (this.installed) throw new LoggerInitError()

    const resolved = config instanceof LoggerBuilder ? config.build() : config
    this.installed = new TerminalLogger(resolved, this.deps)

    return this.installed
  }

  isInitialized(): boolean {
    return this.installed !== undefined
  }

  current(): TerminalLogger {
    if (this.installed) return this.installed

    if (!this.fallback) {
      this.fallback = new TerminalLogger(defaultLoggerConfig(), this.deps)
    }

    return this.fallback
  }
}
