import type { LogSink, OutputStream } from "../../ports/sink"

export type CapturedChunk = {
  stream: OutputStream
  chunk: string
}

/** Keeps every chunk in memory. Intended for tests. */
export class MemorySink implements LogSink {
  private readonly captured: CapturedChunk[] = []

  constructor(private readonly color = false) {}

  write(stream: OutputStream, chunk: string): void {
    this.captured.push({ stream, chunk })
  }

  supportsColor(_stream: OutputStream): boolean {
    return this.color
  }

  chunks(): CapturedChunk[] {
    return [...this.captured]
  }

  /** Concatenated output, optionally of a single stream. */
  output(stream?: OutputStream): string {
    return this.captured
      .filter((c) => stream === undefined || c.stream === stream)
      .map((c) => c.chunk)
      .join("")
  }

  clear(): void {
    this.captured.length = 0
  }
}
