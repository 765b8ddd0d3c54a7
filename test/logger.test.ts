import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { log, resetLogSink, setLogLevel, setLogSink } from "../src/utils/logger.js";
import type { LogLevel } from "../src/utils/logger.js";

describe("logger", () => {
  const lines: Array<[LogLevel, string]> = [];

  beforeEach(() => {
    lines.length = 0;
    setLogSink((level, line) => lines.push([level, line]));
  });

  afterEach(() => {
    resetLogSink();
    setLogLevel("info");
  });

  it("formats a timestamped line with level", () => {
    log.info("hello");

    expect(lines).toHaveLength(1);
    expect(lines[0][0]).toBe("info");
    expect(lines[0][1]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] hello$/);
  });

  it("appends data as JSON", () => {
    log.warn("slow", { ms: 12 });

    expect(lines[0][1].endsWith('[WARN] slow {"ms":12}')).toBe(true);
  });

  it("omits empty data", () => {
    log.error("failed", {});

    expect(lines[0][1].endsWith("[ERROR] failed")).toBe(true);
  });

  it("drops lines below the level", () => {
    log.debug("hidden");
    setLogLevel("debug");
    log.debug("shown");

    expect(lines.map(([, line]) => line.split("] ").pop())).toEqual(["shown"]);
  });

  it("nests child scopes", () => {
    log.child("scheduler").child("cleanup").info("done");

    expect(lines[0][1].endsWith("[INFO] [scheduler:cleanup] done")).toBe(true);
  });
});
