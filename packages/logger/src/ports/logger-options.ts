import type { LogLevelName } from "./log-level"
import type { ColorMode, LoggerPreset } from "./preset"

/**
 * Configuration of a logger.
 *
 * @remarks
 * These options define *policy*, not behavior:
 * - which log levels and call sites are emitted
 * - how a line is laid out for humans
 *
 * A config is produced by `parseLoggerConfig()` or `LoggerBuilder.build()` and is frozen.
 */
export type LoggerConfig = Readonly<{
  /**
   * Most verbose level to emit.
   *
   * Example: "info" suppresses "debug" and "trace".
   */
  level: LogLevelName

  /** Suppress calls made from files classified as external (dependency code). */
  onlyProjectLogs: boolean

  /**
   * Number of trailing path segments shown for the call-site file.
   * `0` shows the base name only.
   */
  pathDepth: number

  /** strftime pattern for the timestamp of `FULL` lines. */
  timeFormat: string

  preset: LoggerPreset

  /**
   * Root directory of the host program.
   *
   * @remarks
   * - Call-site paths inside it are displayed relative to it.
   * - When set, files outside it are classified as external.
   */
  projectRoot?: string

  /** Path segments that mark a file as external, e.g. "node_modules". */
  externalMarkers: readonly string[]

  /**
   * `auto` colors a stream only when it supports ANSI colors.
   */
  color: ColorMode
}>

/**
 * Loose, string-typed input accepted by `parseLoggerConfig()`.
 * Level and preset are matched case-insensitively.
 */
export type LoggerConfigInput = {
  level?: string
  onlyProjectLogs?: boolean
  pathDepth?: number
  timeFormat?: string
  preset?: string
  projectRoot?: string
  externalMarkers?: readonly string[]
  color?: string
}
