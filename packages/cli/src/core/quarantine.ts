/**
 * Quarantine: move prior state aside, never copy or delete it.
 *
 * All targets move into one batch directory or none do: a locked target
 * rolls back the moves already made and aborts the run.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { StackError, errorMessage, pathExists } from "@mcpstack/core";
import type { TraceLogger } from "./tracer.js";
import { errnoCode, mkdirp } from "./fs-helpers.js";

const LOCK_CODES = new Set(["EBUSY", "EPERM", "EACCES", "ENOTEMPTY"]);

export interface QuarantineMove {
  from: string;
  to: string;
}

export interface QuarantineResult {
  /** Null when no target existed */
  batchDir: string | null;
  moves: QuarantineMove[];
}

export type RenameFn = (from: string, to: string) => Promise<void>;

async function rollback(moves: QuarantineMove[], rename: RenameFn, log?: TraceLogger): Promise<string[]> {
  const failures: string[] = [];
  for (const move of [...moves].reverse()) {
    try {
      await rename(move.to, move.from);
    } catch (err) {
      log?.error({ scope: "quarantine", op: "rollback", phase: "backup", path: move.to, msg: "Rollback failed", error: errorMessage(err) });
      failures.push(`${move.to} -> ${move.from}: ${errorMessage(err)}`);
    }
  }
  return failures;
}

/**
 * Remove empty directories left in the batch after a full rollback.
 */
async function pruneEmpty(dir: string): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isDirectory()) await pruneEmpty(path.join(dir, entry.name));
  }
  await fs.rmdir(dir);
}

export async function quarantinePriorState(
  root: string,
  targets: string[],
  timestamp: string,
  log?: TraceLogger,
  rename: RenameFn = fs.rename,
): Promise<QuarantineResult> {
  const present: string[] = [];
  for (const target of targets) {
    if (await pathExists(path.join(root, target))) present.push(target);
  }

  if (present.length === 0) {
    log?.debug({ scope: "quarantine", op: "skip", phase: "backup", path: root, msg: "Nothing to quarantine" });
    return { batchDir: null, moves: [] };
  }

  const batchDir = path.join(root, "quarantine", timestamp);
  const moves: QuarantineMove[] = [];

  for (const [i, target] of present.entries()) {
    const move = { from: path.join(root, target), to: path.join(batchDir, target) };
    try {
      await mkdirp(path.dirname(move.to));
      await rename(move.from, move.to);
      moves.push(move);
      log?.info({ scope: "quarantine", op: "move", phase: "backup", item: target, path: move.to, progress: `${i + 1}/${present.length}`, msg: "Quarantined" });
    } catch (err) {
      const code = errnoCode(err);
      const failures = await rollback(moves, rename, log);
      if (failures.length === 0 && await pathExists(batchDir)) await pruneEmpty(batchDir);

      log?.error({ scope: "quarantine", op: "move", phase: "backup", item: target, path: move.from, msg: "Move failed", error: code ?? errorMessage(err) });

      const rollbackNote = failures.length === 0
        ? `rolled back ${moves.length} earlier move(s)`
        : `rollback incomplete: ${failures.join("; ")}`;

      if (code !== undefined && LOCK_CODES.has(code)) {
        throw new StackError(
          "QUARANTINE_LOCKED",
          `Cannot quarantine ${move.from}: expected it to be movable, found it locked (${code}); ${rollbackNote}`,
          { target: move.from, code, rollbackFailures: failures }
        );
      }
      throw new StackError(
        "BACKUP_FAILED",
        `Cannot quarantine ${move.from}: ${errorMessage(err)}; ${rollbackNote}`,
        { target: move.from, rollbackFailures: failures }
      );
    }
  }

  return { batchDir, moves };
}
