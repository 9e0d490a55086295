import { format } from "node:util"
import type { ChalkInstance } from "chalk"
import strftime from "strftime"
import type { CallSite } from "../ports/call-site"
import type { LogLevelName } from "../ports/log-level"
import type { LoggerConfig } from "../ports/logger-options"
import { classifyOrigin, externalPackageName } from "./origin"
import { displayPath, normalizeFile, relativeToRoot } from "./source-path"

export type LogRecord = Readonly<{
  level: LogLevelName
  message: string
  time: Date
  site: CallSite
}>

type LevelColor = "red" | "yellow" | "green" | "blue" | "magenta"

const LEVEL_TAGS: Record<LogLevelName, string> = {
  error: "ERROR",
  warn: "WARN ",
  info: "INFO ",
  debug: "DEBUG",
  trace: "TRACE",
}

const LEVEL_COLORS: Record<LogLevelName, LevelColor> = {
  error: "red",
  warn: "yellow",
  info: "green",
  debug: "blue",
  trace: "magenta",
}

export function formatMessage(message: string, args: readonly unknown[]): string {
  return args.length > 0 ? format(message, ...args) : message
}

export function levelTag(level: LogLevelName, c: ChalkInstance): string {
  return c[LEVEL_COLORS[level]].bold(LEVEL_TAGS[level])
}

export function formatTimestamp(time: Date, pattern: string): string {
  return strftime(pattern, time)
}

function threadTag(thread: string, c: ChalkInstance): string {
  const name = thread === "main" ? c.greenBright(thread) : c.blueBright(thread)
  return `[${name}]`
}

function locationTag(site: CallSite, config: LoggerConfig, c: ChalkInstance): string {
  const file = relativeToRoot(normalizeFile(site.file), config.projectRoot)
  const shown = c.yellow(displayPath(file, config.pathDepth))
  const line = c.yellow(String(site.line))

  const pkg =
    classifyOrigin(site.file, config) === "external"
      ? externalPackageName(site.file, config.externalMarkers)
      : undefined

  return pkg === undefined ? `[${shown}:${line}]` : `[[${c.yellow(pkg)}] ${shown}:${line}]`
}

/**
 * Renders a record as one line, without a terminator.
 *
 * ```text
 * FULL    2024-01-15 10:30:05 INFO  [main] [core/config.ts:42] message
 * THREAD  INFO  [main] [core/config.ts:42] message
 * SIMPLE  INFO  message
 * ```
 */
export function renderLine(record: LogRecord, config: LoggerConfig, c: ChalkInstance): string {
  const level = levelTag(record.level, c)

  switch (config.preset) {
    case "SIMPLE":
      return `${level} ${record.message}`
    case "THREAD":
      return [
        level,
        threadTag(record.site.thread, c),
        locationTag(record.site, config, c),
        record.message,
      ].join(" ")
    case "FULL":
      return [
        c.cyan(formatTimestamp(record.time, config.timeFormat)),
        level,
        threadTag(record.site.thread, c),
        locationTag(record.site, config, c),
        record.message,
      ].join(" ")
  }
}
