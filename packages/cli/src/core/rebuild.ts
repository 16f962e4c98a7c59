/**
 * Stack Rebuild
 *
 * Runs the five phases in order, each one completing or aborting the run:
 *   1. Backup & quarantine   2. Directory rebuild   3. Offline install
 *   4. Config merge          5. Validation & snapshot
 * Preflight runs first and touches nothing on disk.
 */

import * as path from "node:path";
import { randomBytes } from "node:crypto";
import {
  type InstalledPackage,
  type RebuildLog,
  type RebuildPhase,
  type ServerDefinition,
  type ServerValidation,
  type StackConfig,
  errorMessage,
  fileTimestamp,
  isStackError,
} from "@mcpstack/core";
import type { TraceLogger } from "./tracer.js";
import { type HostInfo, currentHost, runPreflight } from "./preflight.js";
import { createBackupArchive, createSnapshotArchive } from "./snapshot.js";
import { quarantinePriorState } from "./quarantine.js";
import { rebuildDirectories } from "./directory-rebuild.js";
import { type PackageInstaller, createInstaller, installPackages } from "./package-installer.js";
import { buildServerDefinition, commitDesktopConfig, mergeDesktopConfig, readDesktopConfigText } from "./config-merger.js";
import { validateServers } from "./handshake.js";
import { type FrozenRebuildLog, freezeRebuildLog, writeRebuildLog } from "./rebuild-log.js";

export interface RebuildOptions {
  config: StackConfig;
  log?: TraceLogger;
  /** Defaults to the installer named in the config */
  installer?: PackageInstaller;
  host?: HostInfo;
  /** Interpreter written into server definitions */
  execPath?: string;
  now?: () => Date;
}

export interface RebuildOutcome {
  log: FrozenRebuildLog;
  /** Null when the run failed before logs/ existed */
  logPath: string | null;
}

/**
 * Run the whole procedure. Fatal errors end up in the returned log with
 * status "failed"; this only rejects if recording the failure itself fails.
 */
export async function runRebuild(opts: RebuildOptions): Promise<RebuildOutcome> {
  const { config, log } = opts;
  const now = opts.now ?? (() => new Date());
  const host = opts.host ?? currentHost();
  const started = now();
  const timestamp = fileTimestamp(started);
  const runId = log?.traceId ?? `rebuild-${randomBytes(4).toString("hex")}`;

  const paths: RebuildLog["paths"] = {
    root: config.root,
    packagesDir: config.packagesDir,
    desktopConfig: config.desktopConfig,
  };
  const warnings: string[] = [];
  let packages: InstalledPackage[] = [];
  let validation: ServerValidation[] = [];
  let phase: RebuildPhase = "preflight";
  let logsReady = false;

  const record = (status: RebuildLog["status"], error?: RebuildLog["error"]): FrozenRebuildLog =>
    freezeRebuildLog({
      runId,
      startedAt: started.toISOString(),
      finishedAt: now().toISOString(),
      status,
      platform: host.platform,
      nodeVersion: host.nodeVersion,
      paths: { ...paths },
      packages,
      validation,
      warnings,
      ...(error ? { error } : {}),
    });

  log?.info({ scope: "rebuild", op: "start", phase, path: config.root, msg: `Rebuilding ${config.root}`, data: { runId, target: config.target } });

  try {
    const resolved = await runPreflight(config, log, host);

    phase = "backup";
    paths.backupArchive = await createBackupArchive({ root: config.root, desktopConfig: config.desktopConfig, timestamp, log });
    const quarantine = await quarantinePriorState(config.root, config.quarantine, timestamp, log);
    if (quarantine.batchDir) paths.quarantineBatch = quarantine.batchDir;

    phase = "directories";
    await rebuildDirectories(config.root, config.directories, log);
    logsReady = true;

    phase = "install";
    const installer = opts.installer ?? createInstaller(config.installer);
    packages = await installPackages(resolved, installer, {
      prefix: path.join(config.root, "packages"),
      cacheDir: path.join(config.root, "cache", "npm"),
      binDir: path.join(config.root, "bin"),
      log,
    });

    phase = "merge";
    const servers: Record<string, ServerDefinition> = {};
    for (const [i, pkg] of packages.entries()) {
      servers[pkg.name] = buildServerDefinition(pkg, resolved[i].spec, opts.execPath);
    }
    const prior = await readDesktopConfigText(config.desktopConfig);
    const merged = mergeDesktopConfig(prior, servers, { key: config.serversKey, mode: config.serverMode });
    for (const warning of merged.warnings) {
      warnings.push(warning);
      log?.warn({ scope: "config", op: "parse", phase, path: config.desktopConfig, msg: warning });
    }
    const commit = await commitDesktopConfig(config.desktopConfig, merged.text, timestamp, log);
    if (commit.backupPath) paths.configBackup = commit.backupPath;

    phase = "validate";
    validation = await validateServers(servers, config.validation.timeoutMs, log);

    phase = "snapshot";
    paths.snapshotArchive = await createSnapshotArchive(config.root, timestamp, log);

    const final = record("success");
    const logPath = await writeRebuildLog(config.root, timestamp, final);
    const passed = validation.filter((v) => v.passed).length;
    log?.info({
      scope: "rebuild",
      op: "done",
      phase,
      path: logPath,
      dur: Date.now() - started.getTime(),
      msg: `Rebuild complete: ${packages.length} package(s), ${passed}/${validation.length} server(s) passed`,
    });
    return { log: final, logPath };
  } catch (err) {
    const code = isStackError(err) ? err.code : "UNEXPECTED";
    const failed = record("failed", { code, message: errorMessage(err), phase });
    log?.error({ scope: "rebuild", op: "fail", phase, msg: errorMessage(err), error: code });

    let logPath: string | null = null;
    if (logsReady) {
      logPath = await writeRebuildLog(config.root, timestamp, failed);
    }
    return { log: failed, logPath };
  }
}
