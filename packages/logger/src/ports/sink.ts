export type OutputStream = "stdout" | "stderr"

/**
 * Destination of rendered lines.
 *
 * Each call receives one complete line (with or without its terminator) and must
 * hand it to the underlying stream in a single write.
 */
export interface LogSink {
  write(stream: OutputStream, chunk: string): void

  /** Whether lines written to `stream` may contain ANSI color codes. */
  supportsColor(stream: OutputStream): boolean
}
