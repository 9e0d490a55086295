import { z } from "zod"
import { logLevelNames } from "../ports/log-level"
import type { LoggerConfig, LoggerConfigInput } from "../ports/logger-options"
import { colorModes, loggerPresets } from "../ports/preset"
import { type ConfigIssue, LoggerConfigError } from "./errors"

export const DEFAULT_TIME_FORMAT = "%Y-%m-%d %H:%M:%S"
export const DEFAULT_PATH_DEPTH = 2
export const DEFAULT_EXTERNAL_MARKERS: readonly string[] = Object.freeze(["node_modules"])

const DEFAULTS: LoggerConfig = Object.freeze({
  level: "info",
  onlyProjectLogs: false,
  pathDepth: DEFAULT_PATH_DEPTH,
  timeFormat: DEFAULT_TIME_FORMAT,
  preset: "FULL",
  externalMarkers: DEFAULT_EXTERNAL_MARKERS,
  color: "auto",
})

const loggerConfigSchema = z.strictObject({
  level: z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .pipe(z.enum(logLevelNames)),
  onlyProjectLogs: z.boolean(),
  pathDepth: z.number().int().min(0),
  timeFormat: z.string().min(1),
  preset: z
    .string()
    .transform((s) => s.trim().toUpperCase())
    .pipe(z.enum(loggerPresets)),
  projectRoot: z.string().min(1).optional(),
  externalMarkers: z.array(z.string().min(1)),
  color: z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .pipe(z.enum(colorModes)),
})

export function defaultLoggerConfig(): LoggerConfig {
  return DEFAULTS
}

/**
 * Validates `input` and merges it over the defaults.
 *
 * @throws LoggerConfigError listing every invalid field. Values are never coerced to a
 * fallback.
 */
export function parseLoggerConfig(input: LoggerConfigInput = {}): LoggerConfig {
  const merged: Record<string, unknown> = { ...DEFAULTS }

  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) merged[key] = value
  }

  const result = loggerConfigSchema.safeParse(merged)

  if (!result.success) {
    const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))

    throw new LoggerConfigError(
      `Invalid logger configuration:\n${z.prettifyError(result.error)}`,
      issues,
      result.error,
    )
  }

  const { projectRoot, externalMarkers, ...rest } = result.data

  return Object.freeze({
    ...rest,
    ...(projectRoot !== undefined && { projectRoot }),
    externalMarkers: Object.freeze([...externalMarkers]),
  })
}

/**
 * Fluent construction of a {@link LoggerConfig}.
 *
 * @example
 * ```ts
 * const config = LoggerBuilder.default().level("debug").preset("SIMPLE").build()
 * initLogger(config)
 * ```
 */
export class LoggerBuilder {
  private readonly input: LoggerConfigInput

  constructor(input: LoggerConfigInput = {}) {
    this.input = { ...input }
  }

  static default(): LoggerBuilder {
    return new LoggerBuilder()
  }

  level(level: string): this {
    this.input.level = level
    return this
  }

  onlyProjectLogs(enabled = true): this {
    this.input.onlyProjectLogs = enabled
    return this
  }

  pathDepth(depth: number): this {
    this.input.pathDepth = depth
    return this
  }

  timeFormat(format: string): this {
    this.input.timeFormat = format
    return this
  }

  preset(preset: string): this {
    this.input.preset = preset
    return this
  }

  projectRoot(root: string): this {
    this.input.projectRoot = root
    return this
  }

  externalMarkers(markers: readonly string[]): this {
    this.input.externalMarkers = markers
    return this
  }

  color(mode: string): this {
    this.input.color = mode
    return this
  }

  /** @throws LoggerConfigError */
  build(): LoggerConfig {
    return parseLoggerConfig(this.input)
  }
}
