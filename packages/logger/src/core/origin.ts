import type { LoggerConfig } from "../ports/logger-options"
import { isInside, normalizeFile, pathSegments, UNKNOWN_FILE } from "./source-path"

export type Origin = "project" | "external"

export type OriginPolicy = Pick<LoggerConfig, "projectRoot" | "externalMarkers">

/**
 * Classifies a call-site file.
 *
 * 1. a path segment equal to one of `externalMarkers` makes it external
 * 2. else, with `projectRoot` set, a file outside the root is external
 * 3. anything else, including an unknown location, is project code
 */
export function classifyOrigin(file: string, policy: OriginPolicy): Origin {
  if (file === UNKNOWN_FILE) return "project"

  const normalized = normalizeFile(file)
  const segments = pathSegments(normalized)

  if (segments.some((s) => policy.externalMarkers.includes(s))) return "external"

  if (policy.projectRoot !== undefined && !isInside(policy.projectRoot, normalized)) {
    return "external"
  }

  return "project"
}

/**
 * Name of the package that follows the last marker segment.
 *
 * @example
 * ```ts
 * externalPackageName("/app/node_modules/@acme/http/dist/index.js", ["node_modules"])
 * // "@acme/http"
 * ```
 */
export function externalPackageName(
  file: string,
  markers: readonly string[],
): string | undefined {
  const segments = pathSegments(normalizeFile(file))

  let markerIndex = -1
  segments.forEach((s, i) => {
    if (markers.includes(s)) markerIndex = i
  })

  if (markerIndex === -1) return undefined

  const name = segments[markerIndex + 1]
  if (name === undefined) return undefined
  if (!name.startsWith("@")) return name

  const scoped = segments[markerIndex + 2]
  return scoped === undefined ? name : `${name}/${scoped}`
}
