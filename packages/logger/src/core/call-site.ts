import { isMainThread, threadId } from "node:worker_threads"
import type { CallSite } from "../ports/call-site"
import { UNKNOWN_FILE } from "./source-path"

export type StackLocation = Pick<CallSite, "file" | "line" | "column">

const FRAME = /^\s*at (?:.*? \()?(.+?):(\d+):(\d+)\)?$/

/**
 * Parses one V8 stack frame line.
 *
 * @example
 * ```ts
 * parseStackFrame("    at main (file:///app/src/main.ts:12:5)")
 * // { file: "file:///app/src/main.ts", line: 12, column: 5 }
 * ```
 */
export function parseStackFrame(frame: string): StackLocation | undefined {
  const match = FRAME.exec(frame)
  if (!match) return undefined

  const [, file, line, column] = match
  if (file === undefined || line === undefined || column === undefined) return undefined

  return { file, line: Number(line), column: Number(column) }
}

/** First located frame of a V8 stack, skipping the header and native frames. */
export function firstLocatedFrame(stack: string): StackLocation | undefined {
  for (const frame of stack.split("\n")) {
    if (!/^\s*at /.test(frame)) continue

    const location = parseStackFrame(frame)
    if (location) return location
  }

  return undefined
}

export function currentThreadName(): string {
  return isMainThread ? "main" : `worker-${threadId}`
}

export function unknownLocation(): StackLocation {
  return { file: UNKNOWN_FILE, line: 0, column: 0 }
}
