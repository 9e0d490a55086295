import { supportsColor, supportsColorStderr } from "chalk"
import type { LogSink, OutputStream } from "../../ports/sink"

export type WritableTarget = Pick<NodeJS.WritableStream, "write" | "on">

export type ProcessSinkOptions = {
  /** Defaults to `process.stdout` / `process.stderr`. */
  streams?: Partial<Record<OutputStream, WritableTarget>>
  /**
   * Overrides color detection per stream. Process streams are detected by chalk;
   * any other stream is treated as plain text.
   */
  colorSupport?: Partial<Record<OutputStream, boolean>>
}

const OUTPUT_STREAMS: readonly OutputStream[] = ["stdout", "stderr"]

// Shared by every sink writing to the same stream; one "error" listener per stream.
const watchedStreams = new WeakSet<WritableTarget>()
const brokenStreams = new WeakSet<WritableTarget>()

function watch(target: WritableTarget): void {
  if (watchedStreams.has(target)) return

  watchedStreams.add(target)
  target.on("error", () => {
    brokenStreams.add(target)
  })
}

/**
 * Writes lines to the process streams.
 *
 * A stream that throws on write or emits `error` (EPIPE, closed descriptor) is marked
 * broken for every sink that writes to it; later lines for it are dropped.
 */
export class ProcessSink implements LogSink {
  private readonly streams: Record<OutputStream, WritableTarget>
  private readonly colors: Record<OutputStream, boolean>

  constructor(opts: ProcessSinkOptions = {}) {
    this.streams = {
      stdout: opts.streams?.stdout ?? process.stdout,
      stderr: opts.streams?.stderr ?? process.stderr,
    }

    this.colors = {
      stdout:
        opts.colorSupport?.stdout ??
        (opts.streams?.stdout === undefined && supportsColor !== false),
      stderr:
        opts.colorSupport?.stderr ??
        (opts.streams?.stderr === undefined && supportsColorStderr !== false),
    }

    for (const name of OUTPUT_STREAMS) watch(this.streams[name])
  }

  write(stream: OutputStream, chunk: string): void {
    const target = this.streams[stream]
    if (brokenStreams.has(target)) return

    try {
      target.write(chunk)
    } catch {
      brokenStreams.add(target)
    }
  }

  supportsColor(stream: OutputStream): boolean {
    return this.colors[stream]
  }

  isBroken(stream: OutputStream): boolean {
    return brokenStreams.has(this.streams[stream])
  }
}
