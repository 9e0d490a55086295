export type CallSite = {
  /** Absolute path (or file URL) of the calling source file, or "unknown". */
  file: string
  line: number
  column: number
  /** "main" on the main thread, "worker-<id>" in a worker thread. */
  thread: string
}

/** A public logging function; frames above and including it are not the caller. */
export type LogEntryPoint = (...args: never[]) => unknown

export interface CallSiteProvider {
  /** Describes the code that called `boundary`. */
  capture(boundary: LogEntryPoint): CallSite
}
