import { describe, expect, test } from "vitest";
import { Logger, type LogSink } from "../logger.js";

// ============================================================================
// Helpers
// ============================================================================

function memorySink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write(_level, line) {
      lines.push(line);
    },
  };
}

// ============================================================================
// Logger
// ============================================================================

describe("Logger", () => {
  test("formats level, context and message", () => {
    const sink = memorySink();
    const logger = new Logger({ level: "debug", context: "coordinator", sink });

    logger.info("saved User");

    expect(sink.lines).toEqual(["[info] (coordinator) saved User"]);
  });

  test("drops lines below its level", () => {
    const sink = memorySink();
    const logger = new Logger({ level: "warn", sink });

    logger.debug("noise");
    logger.info("noise");
    logger.warn("careful");

    expect(sink.lines).toEqual(["[warn] careful"]);
  });

  test("appends inspected data", () => {
    const sink = memorySink();
    const logger = new Logger({ level: "debug", sink });

    logger.debug("query", { sql: "SELECT 1" });

    expect(sink.lines).toEqual(["[debug] query { sql: 'SELECT 1' }"]);
  });

  test("child loggers nest their context", () => {
    const sink = memorySink();
    const logger = new Logger({ context: "runtime", sink }).child("sqlite");

    logger.error("closed");

    expect(logger.context).toBe("runtime:sqlite");
    expect(sink.lines).toEqual(["[error] (runtime:sqlite) closed"]);
  });

  test("silent() writes nothing", () => {
    const logger = Logger.silent();
    expect(logger.enabled("error")).toBe(false);
  });
});
