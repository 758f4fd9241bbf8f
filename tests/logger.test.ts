import { describe, expect, test } from "vitest";
import { createLogger, createMemorySink, formatLogLine } from "../src/logger.js";

const NOW = () => new Date("2026-01-02T03:04:05.000Z");

describe("logger", () => {
  test("formats service, hash and extra fields on one line", () => {
    const line = formatLogLine({
      timestamp: "2026-01-02T03:04:05.000Z",
      level: "info",
      message: "Function added",
      context: { service: "pool", hash: "abc", language: "eng", skipped: undefined },
    });

    expect(line).toBe('[2026-01-02T03:04:05.000Z] [INFO ] [pool] [abc] Function added {"language":"eng"}');
  });

  test("children merge context and share the sink", () => {
    const memory = createMemorySink();
    const root = createLogger({ service: "funcpool" }, { sink: memory.sink, minLevel: "debug", now: NOW });

    root.child({ service: "migration", hash: "def" }).debug("Already on the current schema");
    root.warn("Plain warning");

    expect(memory.lines).toEqual([
      "[2026-01-02T03:04:05.000Z] [DEBUG] [migration] [def] Already on the current schema",
      "[2026-01-02T03:04:05.000Z] [WARN ] [funcpool] [-] Plain warning",
    ]);
  });

  test("drops records below the minimum level and flattens errors", () => {
    const memory = createMemorySink();
    const log = createLogger({}, { sink: memory.sink, minLevel: "warn", now: NOW });

    log.info("hidden");
    log.error("Resolution failed", new TypeError("bad binding"), { hash: "abc" });

    expect(memory.records).toHaveLength(1);
    expect(memory.records[0].context).toEqual({ hash: "abc", errorName: "TypeError", errorMessage: "bad binding" });
    expect(memory.lines[0]).toBe(
      '[2026-01-02T03:04:05.000Z] [ERROR] [-] [abc] Resolution failed {"errorName":"TypeError","errorMessage":"bad binding"}',
    );
  });
});
