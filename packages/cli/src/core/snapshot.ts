/**
 * Snapshot: gzip tar archives of the stack root
 *
 * Two kinds per run: a pre-rebuild backup (root minus backups/ and
 * quarantine/, plus the desktop config and a manifest) and a post-run
 * snapshot (root minus backups/).
 */
import * as fs from "node:fs/promises";
import { createReadStream, createWriteStream } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import * as tar from "tar";

import { StackError, errorMessage } from "@mcpstack/core";
import type { TraceLogger } from "./tracer.js";
import { errnoCode, mkdirp } from "./fs-helpers.js";

export const BACKUP_MANIFEST_NAME = "backup-manifest.json";
export const DESKTOP_CONFIG_DIR = "desktop-config";

export interface BackupManifest {
  kind: "pre-rebuild";
  createdAt: string;
  root: string;
  /** Top-level root entries captured in the archive */
  entries: string[];
  desktopConfig: {
    path: string;
    included: boolean;
  };
}

export interface BackupOptions {
  root: string;
  desktopConfig: string;
  timestamp: string;
  log?: TraceLogger;
}

// ============================================================================
// Helpers
// ============================================================================

async function listRootEntries(root: string, exclude: string[]): Promise<string[]> {
  try {
    const names = await fs.readdir(root);
    return names.filter((name) => !exclude.includes(name)).sort();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return [];
    throw err;
  }
}

async function gzipFile(src: string, dest: string): Promise<void> {
  await pipeline(createReadStream(src), createGzip(), createWriteStream(dest, { flags: "wx" }));
}

/**
 * Fail unless the archive exists and is non-empty.
 */
export async function verifyArchive(file: string): Promise<number> {
  let size: number;
  try {
    size = (await fs.stat(file)).size;
  } catch (err) {
    throw new StackError("BACKUP_FAILED", `Archive missing: expected ${file} to exist (${errorMessage(err)})`);
  }
  if (size === 0) {
    throw new StackError("BACKUP_FAILED", `Archive empty: expected ${file} to have a non-zero size, found 0 bytes`);
  }
  return size;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Archive prior mutable state to <root>/backups/pre-rebuild-<ts>.tgz.
 * The manifest is always present, so the archive is never empty.
 */
export async function createBackupArchive(opts: BackupOptions): Promise<string> {
  const { root, desktopConfig, timestamp, log } = opts;
  const backupsDir = path.join(root, "backups");
  const archive = path.join(backupsDir, `pre-rebuild-${timestamp}.tgz`);
  const stage = await fs.mkdtemp(path.join(os.tmpdir(), "mcpstack-backup-"));
  const tarFile = path.join(stage, "backup.tar");
  const started = Date.now();

  try {
    await mkdirp(backupsDir);
    const entries = await listRootEntries(root, ["backups", "quarantine"]);

    const staged = [BACKUP_MANIFEST_NAME];
    let included = false;
    try {
      await mkdirp(path.join(stage, "files", DESKTOP_CONFIG_DIR));
      await fs.copyFile(desktopConfig, path.join(stage, "files", DESKTOP_CONFIG_DIR, path.basename(desktopConfig)));
      included = true;
      staged.push(DESKTOP_CONFIG_DIR);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") throw err;
    }

    const manifest: BackupManifest = {
      kind: "pre-rebuild",
      createdAt: new Date().toISOString(),
      root,
      entries,
      desktopConfig: { path: desktopConfig, included },
    };
    await fs.writeFile(path.join(stage, "files", BACKUP_MANIFEST_NAME), JSON.stringify(manifest, null, 2) + "\n");

    await tar.c({ file: tarFile, cwd: path.join(stage, "files"), portable: true }, staged);
    if (entries.length > 0) {
      await tar.r({ file: tarFile, cwd: root, portable: true }, entries);
    }
    await gzipFile(tarFile, archive);
  } catch (err) {
    log?.error({ scope: "backup", op: "archive", phase: "backup", path: archive, msg: "Backup archive failed", error: errorMessage(err) });
    throw new StackError("BACKUP_FAILED", `Could not write backup archive ${archive}: ${errorMessage(err)}`);
  } finally {
    await fs.rm(stage, { recursive: true, force: true });
  }

  const size = await verifyArchive(archive);
  log?.info({ scope: "backup", op: "archive", phase: "backup", path: archive, dur: Date.now() - started, msg: `Backup archive written (${size} bytes)` });
  return archive;
}

/**
 * Archive the whole root, minus backups/, to <root>/backups/snapshot-<ts>.tgz.
 */
export async function createSnapshotArchive(root: string, timestamp: string, log?: TraceLogger): Promise<string> {
  const backupsDir = path.join(root, "backups");
  const archive = path.join(backupsDir, `snapshot-${timestamp}.tgz`);
  const started = Date.now();

  try {
    await mkdirp(backupsDir);
    const entries = await listRootEntries(root, ["backups"]);
    if (entries.length === 0) {
      throw new Error(`nothing to archive under ${root}`);
    }
    await tar.c({ gzip: true, file: archive, cwd: root, portable: true }, entries);
  } catch (err) {
    log?.error({ scope: "snapshot", op: "archive", phase: "snapshot", path: archive, msg: "Snapshot failed", error: errorMessage(err) });
    throw new StackError("BACKUP_FAILED", `Could not write snapshot archive ${archive}: ${errorMessage(err)}`);
  }

  const size = await verifyArchive(archive);
  log?.info({ scope: "snapshot", op: "archive", phase: "snapshot", path: archive, dur: Date.now() - started, msg: `Snapshot written (${size} bytes)` });
  return archive;
}
