import { describe, expect, it } from "vitest";
import { Logger, parseLogLevel } from "../logger.js";
import { DimensionMismatchError } from "../../core/errors.js";

function collecting(level: Parameters<typeof parseLogLevel>[0] = "debug") {
  const lines: string[] = [];
  const log = new Logger(parseLogLevel(level), (line) => lines.push(line));
  const events = () => lines.map((l) => JSON.parse(l) as Record<string, unknown>);
  return { log, events };
}

describe("Logger", () => {
  it("writes one JSON object per event", () => {
    const { log, events } = collecting();
    log.info("ingest.batch", { ingested: 3, failed: 0 });
    expect(events()).toEqual([
      { ts: expect.any(String), level: "info", event: "ingest.batch", ingested: 3, failed: 0 },
    ]);
  });

  it("drops events below the minimum level", () => {
    const { log, events } = collecting("warn");
    log.debug("a");
    log.info("b");
    log.warn("c");
    log.error("d");
    expect(events().map((e) => e.event)).toEqual(["c", "d"]);
  });

  it("records the code of a failed operation", () => {
    const { log, events } = collecting();
    log.failure("search.branch_failed", new DimensionMismatchError(3, 2), { branch: "dense" });
    log.failure("search.branch_failed", new Error("boom"));
    expect(events()).toMatchObject([
      {
        level: "error",
        branch: "dense",
        err_code: "DIMENSION_MISMATCH",
        err_message: "Vector dimension mismatch: index expects 3, got 2",
      },
      { err_code: "UNKNOWN", err_message: "boom" },
    ]);
  });

  it("can be switched off", () => {
    const { log, events } = collecting();
    log.setEnabled(false);
    log.error("ignored");
    expect(events()).toEqual([]);
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels in any case and falls back to info", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});
