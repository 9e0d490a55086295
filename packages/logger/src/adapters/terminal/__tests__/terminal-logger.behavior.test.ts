import { parseLoggerConfig } from "../../../core/config"
import type { CallSite } from "../../../ports/call-site"
import type { LoggerConfigInput } from "../../../ports/logger-options"
import type { LogSink } from "../../../ports/sink"
import { FixedCallSiteProvider } from "../../call-site/fixed-call-site-provider"
import { FakeClock } from "../../clock/fake-clock"
import { MemorySink } from "../../sinks/memory-sink"
import { TerminalLogger } from "../terminal-logger"

const TIME = new Date(2024, 0, 15, 10, 30, 5)

describe("TerminalLogger behavior", () => {
  function make(
    input: LoggerConfigInput = {},
    site: Partial<CallSite> & Pick<CallSite, "file"> = {
      file: "/app/src/core/config.ts",
      line: 42,
    },
    sink = new MemorySink(),
  ) {
    const callSites = new FixedCallSiteProvider(site)
    const logger = new TerminalLogger(
      parseLoggerConfig({ color: "never", projectRoot: "/app", ...input }),
      { sink, clock: new FakeClock(TIME), callSites },
    )

    return { logger, sink, callSites }
  }

  describe("presets", () => {
    it("FULL renders time, level, thread, location and message", () => {
      const { logger, sink } = make()

      logger.info("hello")

      expect(sink.output("stdout")).toBe(
        "2024-01-15 10:30:05 INFO  [main] [core/config.ts:42] hello\n",
      )
    })

    it("THREAD drops the timestamp", () => {
      const { logger, sink } = make(
        { preset: "THREAD" },
        { file: "/app/src/core/config.ts", line: 42, thread: "worker-3" },
      )

      logger.info("hello")

      expect(sink.output("stdout")).toBe("INFO  [worker-3] [core/config.ts:42] hello\n")
    })

    it("SIMPLE renders level and message only", () => {
      const { logger, sink } = make({ preset: "SIMPLE" })

      logger.debug("hello")
      logger.info("hello")

      expect(sink.output("stdout")).toBe("INFO  hello\n")
    })

    it("pads every level tag to five characters", () => {
      const { logger, sink } = make({ preset: "SIMPLE", level: "trace" })

      logger.error("m")
      logger.warn("m")
      logger.info("m")
      logger.debug("m")
      logger.trace("m")

      expect(sink.chunks().map((c) => c.chunk)).toEqual([
        "ERROR m\n",
        "WARN  m\n",
        "INFO  m\n",
        "DEBUG m\n",
        "TRACE m\n",
      ])
    })
  })

  describe("message formatting", () => {
    it("applies printf-style arguments", () => {
      const { logger, sink } = make({ preset: "SIMPLE" })

      logger.info("took %d ms for %s", 12, "job")

      expect(sink.output()).toBe("INFO  took 12 ms for job\n")
    })

    it("leaves a message without arguments untouched", () => {
      const { logger, sink } = make({ preset: "SIMPLE" })

      logger.info("100%% sure %s")

      expect(sink.output()).toBe("INFO  100%% sure %s\n")
    })

    it("honors a custom time format", () => {
      const { logger, sink } = make({ timeFormat: "%H:%M" })

      logger.warn("late")

      expect(sink.output("stderr")).toBe("10:30 WARN  [main] [core/config.ts:42] late\n")
    })
  })

  describe("streams", () => {
    it("sends error and warn to stderr, the rest to stdout", () => {
      const { logger, sink } = make({ preset: "SIMPLE", level: "trace" })

      logger.error("e")
      logger.warn("w")
      logger.info("i")
      logger.debug("d")
      logger.trace("t")

      expect(sink.chunks().map((c) => c.stream)).toEqual([
        "stderr",
        "stderr",
        "stdout",
        "stdout",
        "stdout",
      ])
    })

    it("underscore variants let the caller continue the line", () => {
      const { logger, sink } = make({ preset: "SIMPLE" })

      logger._info("downloading...")
      logger.info("done")

      expect(sink.output()).toBe("INFO  downloading...INFO  done\n")
    })
  })

  describe("source paths", () => {
    it("pathDepth 0 shows the base name", () => {
      const { logger, sink } = make({ preset: "THREAD", pathDepth: 0 })

      logger.info("x")

      expect(sink.output()).toBe("INFO  [main] [config.ts:42] x\n")
    })

    it("a depth beyond the path length shows the whole project-relative path", () => {
      const { logger, sink } = make({ preset: "THREAD", pathDepth: 10 })

      logger.info("x")

      expect(sink.output()).toBe("INFO  [main] [src/core/config.ts:42] x\n")
    })

    it("converts file URLs from ESM stack frames", () => {
      const { logger, sink } = make(
        { preset: "THREAD" },
        { file: "file:///app/src/main.ts", line: 9 },
      )

      logger.info("x")

      expect(sink.output()).toBe("INFO  [main] [src/main.ts:9] x\n")
    })

    it("tags dependency call sites with their package name", () => {
      const { logger, sink } = make(
        { preset: "THREAD" },
        { file: "/app/node_modules/@acme/http/dist/index.js", line: 42 },
      )

      logger.error("boom")

      expect(sink.output()).toBe("ERROR [main] [[@acme/http] dist/index.js:42] boom\n")
    })

    it("shows files outside the project root without a package tag", () => {
      const { logger, sink } = make(
        { preset: "THREAD" },
        { file: "/opt/tools/lib/x.js", line: 42 },
      )

      logger.info("x")

      expect(sink.output()).toBe("INFO  [main] [lib/x.js:42] x\n")
    })
  })

  describe("onlyProjectLogs", () => {
    it("suppresses dependency call sites at every level", () => {
      const { logger, sink } = make(
        { onlyProjectLogs: true, level: "trace" },
        { file: "/app/node_modules/left-pad/index.js" },
      )

      logger.error("e")
      logger.warn("w")
      logger.info("i")

      expect(sink.chunks()).toEqual([])
    })

    it("suppresses files outside the project root", () => {
      const { logger, sink } = make({ onlyProjectLogs: true }, { file: "/opt/tools/x.js" })

      logger.error("e")

      expect(sink.chunks()).toEqual([])
    })

    it("keeps project call sites", () => {
      const { logger, sink } = make({ onlyProjectLogs: true, preset: "SIMPLE" })

      logger.info("kept")

      expect(sink.output()).toBe("INFO  kept\n")
    })

    it("when disabled, never suppresses by origin", () => {
      const { logger, sink } = make(
        { onlyProjectLogs: false, preset: "SIMPLE" },
        { file: "/app/node_modules/left-pad/index.js" },
      )

      logger.info("kept")

      expect(sink.output()).toBe("INFO  kept\n")
    })
  })

  describe("colors", () => {
    it("color always wraps the level tag in ANSI codes", () => {
      const { logger, sink } = make({ preset: "SIMPLE", color: "always" })

      logger.error("x")

      expect(sink.output()).toBe("\u001b[31m\u001b[1mERROR\u001b[22m\u001b[39m x\n")
    })

    it("color auto follows the sink's color support", () => {
      const colored = make({ preset: "SIMPLE", color: "auto" }, undefined, new MemorySink(true))
      const plain = make({ preset: "SIMPLE", color: "auto" }, undefined, new MemorySink(false))

      colored.logger.info("x")
      plain.logger.info("x")

      expect(colored.sink.output()).toBe("\u001b[32m\u001b[1mINFO \u001b[22m\u001b[39m x\n")
      expect(plain.sink.output()).toBe("INFO  x\n")
    })

    it("color never renders plain text on a color-capable sink", () => {
      const { logger, sink } = make(
        { preset: "SIMPLE", color: "never" },
        undefined,
        new MemorySink(true),
      )

      logger.warn("x")

      expect(sink.output()).toBe("WARN  x\n")
    })
  })

  describe("failures", () => {
    it("drops the line and counts it when the sink throws", () => {
      const failing: LogSink = {
        write: () => {
          throw new Error("write EPIPE")
        },
        supportsColor: () => false,
      }
      const broken = new TerminalLogger(parseLoggerConfig({ color: "never" }), { sink: failing })

      expect(() => broken.info("x")).not.toThrow()
      expect(() => broken._error("y")).not.toThrow()
      expect(broken.droppedCount).toBe(2)
    })

    it("drops the line when formatting an argument throws", () => {
      const { logger, sink } = make()
      const hostile = {
        toString(): string {
          throw new Error("boom")
        },
      }

      logger.info("value %s", hostile)

      expect(sink.chunks()).toEqual([])
      expect(logger.droppedCount).toBe(1)
    })
  })

  it("does not capture the call site for filtered levels", () => {
    const { logger, callSites } = make({ level: "info" })
    const capture = vi.spyOn(callSites, "capture")

    logger.debug("skipped")
    logger.info("kept")

    expect(capture).toHaveBeenCalledTimes(1)
  })

  it("emit() writes a record for an explicit level", () => {
    const { logger, sink } = make({ preset: "SIMPLE" })

    logger.emit("warn", "disk at %d%%", [91], { newline: false })

    expect(sink.chunks()).toEqual([{ stream: "stderr", chunk: "WARN  disk at 91%" }])
  })
})

describe("TerminalLogger with stack call sites", () => {
  it("reports the file that made the logging call", () => {
    const sink = new MemorySink()
    const logger = new TerminalLogger(
      parseLoggerConfig({ preset: "THREAD", pathDepth: 0, color: "never" }),
      { sink },
    )

    logger.info("here")

    expect(sink.output()).toMatch(
      /^INFO {2}\[(main|worker-\d+)\] \[terminal-logger\.behavior\.test\.ts:\d+\] here\n$/,
    )
  })

  it("a detached method still reports its caller", () => {
    const sink = new MemorySink()
    const { warn } = new TerminalLogger(
      parseLoggerConfig({ preset: "THREAD", pathDepth: 0, color: "never" }),
      { sink },
    )

    warn("detached")

    expect(sink.output("stderr")).toMatch(
      /^WARN {2}\[(main|worker-\d+)\] \[terminal-logger\.behavior\.test\.ts:\d+\] detached\n$/,
    )
  })
})
