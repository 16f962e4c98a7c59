import { describe, it, expect } from "vitest";
import type { RebuildLog, ServerValidation } from "@mcpstack/core";
import { freezeRebuildLog } from "../core/rebuild-log.js";
import { formatRebuildSummary } from "./rebuild.js";

function validation(name: string, passed: boolean, detail: string): ServerValidation {
  return { name, command: "/usr/bin/node", args: [`/stack/bin/${name}.mjs`], passed, exitCode: 0, timedOut: !passed, detail, durationMs: 10 };
}

function baseLog(overrides: Partial<RebuildLog>): RebuildLog {
  return {
    runId: "rebuild-0a1b2c3d",
    startedAt: "2024-05-01T10:00:00.000Z",
    finishedAt: "2024-05-01T10:00:05.000Z",
    status: "success",
    platform: "linux",
    nodeVersion: "20.11.1",
    paths: { root: "/stack", packagesDir: "/offline", desktopConfig: "/cfg.json" },
    packages: [],
    validation: [],
    warnings: [],
    ...overrides,
  };
}

describe("formatRebuildSummary", () => {
  it("lists packages, servers and artifacts of a successful run", () => {
    const log = freezeRebuildLog(
      baseLog({
        paths: {
          root: "/stack",
          packagesDir: "/offline",
          desktopConfig: "/cfg.json",
          backupArchive: "/stack/backups/pre.tgz",
          snapshotArchive: "/stack/backups/snap.tgz",
        },
        packages: [
          {
            name: "memory",
            packageName: "@fixture/server-memory",
            version: "0.5.1",
            archive: "/offline/server-memory-0.5.1.tgz",
            installDir: "/stack/packages/node_modules/@fixture/server-memory",
            entryPoint: "/stack/packages/node_modules/@fixture/server-memory/dist/index.js",
            wrapperPath: "/stack/bin/memory.mjs",
          },
        ],
        validation: [
          validation("memory", true, "2 tool(s): echo, read"),
          validation("filesystem", false, "expected a tools/list response within 1000 ms, found none"),
        ],
      })
    );

    expect(formatRebuildSummary(log, "/stack/logs/rebuild-T.json").split("\n")).toEqual([
      "mcpstack rebuild",
      "================",
      "Root:           /stack",
      "Desktop config: /cfg.json",
      "",
      "Packages:",
      "  memory  @fixture/server-memory@0.5.1",
      "",
      "Servers:",
      "  \u001b[32m✔\u001b[0m memory: 2 tool(s): echo, read",
      "  \u001b[31m✘\u001b[0m filesystem: expected a tools/list response within 1000 ms, found none",
      "",
      "Backup:         /stack/backups/pre.tgz",
      "Snapshot:       /stack/backups/snap.tgz",
      "Log:            /stack/logs/rebuild-T.json",
      "",
      "\u001b[32m✔ Rebuild complete: 1/2 server(s) responded\u001b[0m",
    ]);
  });

  it("ends a failed run with its phase, code and message", () => {
    const log = freezeRebuildLog(
      baseLog({
        status: "failed",
        paths: { root: "/stack", packagesDir: "/offline", desktopConfig: "/cfg.json", configBackup: "/cfg.json.T.bak" },
        warnings: ["CONFIG_UNPARSEABLE: bad"],
        error: { code: "INSTALL_FAILED", message: "npm exited 1", phase: "install" },
      })
    );

    expect(formatRebuildSummary(log, null).split("\n")).toEqual([
      "mcpstack rebuild",
      "================",
      "Root:           /stack",
      "Desktop config: /cfg.json",
      "",
      "\u001b[33m⚠ CONFIG_UNPARSEABLE: bad\u001b[0m",
      "",
      "Config backup:  /cfg.json.T.bak",
      "",
      "\u001b[31m✘ Rebuild failed during install: [INSTALL_FAILED] npm exited 1\u001b[0m",
    ]);
  });
});
