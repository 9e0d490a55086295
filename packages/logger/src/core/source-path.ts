import path from "node:path"
import { fileURLToPath } from "node:url"

export const UNKNOWN_FILE = "unknown"

/** Converts `file://` URLs (ESM stack frames) to filesystem paths. */
export function normalizeFile(file: string): string {
  if (!file.startsWith("file://")) return file

  try {
    return fileURLToPath(file)
  } catch {
    return file
  }
}

export function pathSegments(file: string): string[] {
  return file.split(/[\\/]/).filter((s) => s.length > 0)
}

export function isInside(root: string, file: string): boolean {
  const rel = path.relative(root, file)

  return !path.isAbsolute(rel) && pathSegments(rel)[0] !== ".."
}

/** Path of `file` relative to `root` when it lies inside it, otherwise `file` itself. */
export function relativeToRoot(file: string, root?: string): string {
  if (root === undefined || file === UNKNOWN_FILE) return file
  if (!isInside(root, file)) return file

  const rel = path.relative(root, file)
  return rel === "" ? file : rel
}

/**
 * Keeps the last `depth` segments of `file`, joined with the platform separator.
 *
 * - `depth = 0` keeps the base name only
 * - a depth at or above the number of segments returns `file` unchanged
 */
export function displayPath(file: string, depth: number): string {
  const segments = pathSegments(file)
  const last = segments.at(-1)

  if (last === undefined) return file
  if (depth === 0) return last
  if (depth >= segments.length) return file

  return segments.slice(-depth).join(path.sep)
}
