import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import * as tar from "tar";
import { createBackupArchive, createSnapshotArchive, verifyArchive, type BackupManifest } from "./snapshot.js";
import { listArchive } from "../__tests__/fixtures.js";

describe("snapshot archives", () => {
  let tmpDir: string;
  let root: string;
  let desktopConfig: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "mcpstack-snapshot-"));
    root = path.join(tmpDir, "ClaudeStack");
    desktopConfig = path.join(tmpDir, "claude_desktop_config.json");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function seed(rel: string, content = "x"): Promise<void> {
    const file = path.join(root, rel);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
  }

  async function readManifest(archive: string): Promise<BackupManifest> {
    const out = path.join(tmpDir, "extracted");
    await fs.mkdir(out, { recursive: true });
    await tar.x({ file: archive, cwd: out });
    return JSON.parse(await fs.readFile(path.join(out, "backup-manifest.json"), "utf-8"));
  }

  it("writes a manifest-only backup when nothing exists yet", async () => {
    const archive = await createBackupArchive({ root, desktopConfig, timestamp: "T1" });

    expect(archive).toBe(path.join(root, "backups", "pre-rebuild-T1.tgz"));
    expect(await listArchive(archive)).toEqual(["backup-manifest.json"]);

    const manifest = await readManifest(archive);
    expect(manifest.entries).toEqual([]);
    expect(manifest.desktopConfig).toEqual({ path: desktopConfig, included: false });
  });

  it("captures root state and the desktop config but skips backups and quarantine", async () => {
    await seed("packages/node_modules/a/index.js");
    await seed("logs/rebuild-old.json", "{}");
    await seed("backups/pre-rebuild-old.tgz");
    await seed("quarantine/old/packages/x.js");
    await fs.writeFile(desktopConfig, '{"mcpServers":{}}');

    const archive = await createBackupArchive({ root, desktopConfig, timestamp: "T2" });
    const paths = await listArchive(archive);

    expect(paths[0]).toBe("backup-manifest.json");
    expect(paths).toContain("desktop-config/claude_desktop_config.json");
    expect(paths).toContain("packages/node_modules/a/index.js");
    expect(paths).toContain("logs/rebuild-old.json");
    expect(paths.some((p) => p.startsWith("backups"))).toBe(false);
    expect(paths.some((p) => p.startsWith("quarantine"))).toBe(false);

    const manifest = await readManifest(archive);
    expect(manifest.entries).toEqual(["logs", "packages"]);
    expect(manifest.desktopConfig.included).toBe(true);
  });

  it("snapshots everything except backups", async () => {
    await seed("bin/memory.mjs");
    await seed("quarantine/old/plugins/p.txt");
    await seed("backups/pre-rebuild-T3.tgz");

    const archive = await createSnapshotArchive(root, "T3");
    const paths = await listArchive(archive);

    expect(archive).toBe(path.join(root, "backups", "snapshot-T3.tgz"));
    expect(paths).toContain("bin/memory.mjs");
    expect(paths).toContain("quarantine/old/plugins/p.txt");
    expect(paths.some((p) => p.startsWith("backups"))).toBe(false);
  });

  it("refuses to snapshot an empty root", async () => {
    await expect(createSnapshotArchive(root, "T4")).rejects.toMatchObject({ code: "BACKUP_FAILED" });
  });

  it("rejects a zero-byte archive", async () => {
    const file = path.join(tmpDir, "empty.tgz");
    await fs.writeFile(file, "");
    await expect(verifyArchive(file)).rejects.toMatchObject({
      code: "BACKUP_FAILED",
      message: `Archive empty: expected ${file} to have a non-zero size, found 0 bytes`,
    });
  });
});
