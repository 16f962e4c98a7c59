import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { RebuildLog } from "@mcpstack/core";
import { deepFreeze, freezeRebuildLog, writeRebuildLog } from "./rebuild-log.js";

function sampleLog(root: string): RebuildLog {
  return {
    runId: "rebuild-0a1b2c3d",
    startedAt: "2024-05-01T10:00:00.000Z",
    finishedAt: "2024-05-01T10:00:05.000Z",
    status: "success",
    platform: "linux",
    nodeVersion: "20.11.1",
    paths: { root, packagesDir: "/offline", desktopConfig: "/home/u/.config/Claude/claude_desktop_config.json" },
    packages: [],
    validation: [],
    warnings: [],
  };
}

describe("deepFreeze", () => {
  it("freezes nested objects and arrays", () => {
    const value = { a: { b: [1, { c: 2 }] } };
    deepFreeze(value);
    expect(Object.isFrozen(value.a)).toBe(true);
    expect(Object.isFrozen(value.a.b)).toBe(true);
    expect(Object.isFrozen(value.a.b[1])).toBe(true);
  });
});

describe("rebuild log", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "mcpstack-log-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("writes the log as indented JSON under logs/", async () => {
    const file = await writeRebuildLog(root, "T1", freezeRebuildLog(sampleLog(root)));

    expect(file).toBe(path.join(root, "logs", "rebuild-T1.json"));
    const text = await fs.readFile(file, "utf-8");
    expect(text).toBe(JSON.stringify(sampleLog(root), null, 2) + "\n");
  });

  it("never overwrites an existing log", async () => {
    await writeRebuildLog(root, "T2", freezeRebuildLog(sampleLog(root)));
    await expect(writeRebuildLog(root, "T2", freezeRebuildLog(sampleLog(root)))).rejects.toMatchObject({ code: "EEXIST" });
  });
});
