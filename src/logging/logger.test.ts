import { describe, expect, it } from "vitest";
import { formatTimestamp, Logger, LogLevel, parseLogLevel } from "./logger";

const clock = () => new Date(2024, 0, 2, 3, 4, 5);

function capture(level: LogLevel) {
  const lines: string[] = [];
  const logger = new Logger({ level, clock, sink: line => lines.push(line) });
  return { logger, lines };
}

describe("Logger", () => {
  it("prefixes each line with a local timestamp and the level", () => {
    const { logger, lines } = capture(LogLevel.INFO);
    logger.info("hello");
    logger.warn("careful");
    expect(lines).toEqual(["[2024-01-02 03:04:05] INFO: hello", "[2024-01-02 03:04:05] WARN: careful"]);
  });

  it("drops entries below the threshold", () => {
    const { logger, lines } = capture(LogLevel.WARN);
    logger.debug("noise");
    logger.info("progress");
    logger.error("broken");
    expect(lines).toEqual(["[2024-01-02 03:04:05] ERROR: broken"]);
    expect(logger.getLogs()).toHaveLength(1);
  });

  it("prints the stack only when debugging", () => {
    const error = new Error("boom");
    error.stack = "Error: boom\n    at test";

    const quiet = capture(LogLevel.INFO);
    quiet.logger.error("failed", error);
    expect(quiet.lines).toEqual(["[2024-01-02 03:04:05] ERROR: failed"]);

    const verbose = capture(LogLevel.DEBUG);
    verbose.logger.error("failed", error);
    expect(verbose.lines).toEqual(["[2024-01-02 03:04:05] ERROR: failed", "Error: boom\n    at test"]);
  });

  it("filters and clears retained entries", () => {
    const { logger } = capture(LogLevel.DEBUG);
    logger.debug("a");
    logger.info("b");
    logger.info("c", { node: 100 });
    expect(logger.getLogs(LogLevel.INFO).map(e => e.message)).toEqual(["b", "c"]);
    expect(logger.getLogs(LogLevel.INFO)[1].context).toEqual({ node: 100 });
    logger.clearLogs();
    expect(logger.getLogs()).toEqual([]);
  });
});

describe("parseLogLevel", () => {
  it("accepts any case", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("Warn")).toBe(LogLevel.WARN);
  });

  it("rejects unknown names", () => {
    expect(() => parseLogLevel("verbose")).toThrow("Unknown log level: verbose");
  });
});

describe("formatTimestamp", () => {
  it("zero-pads every field", () => {
    expect(formatTimestamp(new Date(2025, 8, 9, 7, 0, 3))).toBe("2025-09-09 07:00:03");
  });
});
