import { describe, it, expect } from "vitest";
import type { LogEntry } from "@mcpstack/core";
import { formatTraceTable, parseSince } from "./trace.js";

const NOW = Date.UTC(2024, 4, 1, 12, 0, 0);

describe("parseSince", () => {
  it("subtracts relative durations from now", () => {
    expect(parseSince("30m", NOW)).toBe(NOW - 30 * 60_000);
    expect(parseSince("1h", NOW)).toBe(NOW - 3_600_000);
    expect(parseSince("7d", NOW)).toBe(NOW - 7 * 86_400_000);
  });

  it("accepts ISO dates", () => {
    expect(parseSince("2024-05-01T00:00:00.000Z", NOW)).toBe(Date.UTC(2024, 4, 1));
  });

  it("rejects anything else", () => {
    expect(() => parseSince("yesterday", NOW)).toThrow('expected 30m, 1h, 7d or an ISO date, found "yesterday"');
  });
});

describe("formatTraceTable", () => {
  it("prints one aligned row per entry", () => {
    const entries: LogEntry[] = [
      {
        ts: Date.UTC(2024, 4, 1, 10, 0, 0),
        traceId: "rebuild-0a1b2c3d",
        level: "info",
        cmd: "rebuild",
        scope: "install",
        op: "package",
        phase: "install",
        item: "memory",
        msg: "Installed",
      },
      {
        ts: Date.UTC(2024, 4, 1, 10, 0, 1, 500),
        traceId: "doctor-0a1b2c3d",
        level: "warn",
        cmd: "doctor",
        scope: "doctor",
        op: "check",
        msg: "npm missing",
      },
    ];

    expect(formatTraceTable(entries).split("\n")).toEqual([
      "TIME                     LEVEL  CMD       SCOPE       PHASE        ITEM           MSG",
      "─".repeat(100),
      "2024-05-01T10:00:00.000  info   rebuild   install     install      memory         Installed",
      "2024-05-01T10:00:01.500  warn   doctor    doctor      -            -              npm missing",
    ]);
  });
});
