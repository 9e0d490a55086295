import { LEVEL_RANK, type LogLevelName } from "../ports/log-level"

/** Negative when `a` is less verbose than `b`, zero when equal. */
export function compareLevels(a: LogLevelName, b: LogLevelName): number {
  return LEVEL_RANK[a] - LEVEL_RANK[b]
}

export function isLevelEnabled(threshold: LogLevelName, level: LogLevelName): boolean {
  return compareLevels(level, threshold) <= 0
}
