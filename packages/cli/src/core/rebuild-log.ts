/**
 * Rebuild Log: one immutable JSON record per run.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { RebuildLog } from "@mcpstack/core";
import { mkdirp } from "./fs-helpers.js";

export type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type FrozenRebuildLog = DeepReadonly<RebuildLog>;

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function rebuildLogPath(root: string, timestamp: string): string {
  return path.join(root, "logs", `rebuild-${timestamp}.json`);
}

/**
 * Write the log with exclusive create; an existing file is never replaced.
 */
export async function writeRebuildLog(root: string, timestamp: string, log: FrozenRebuildLog): Promise<string> {
  const file = rebuildLogPath(root, timestamp);
  await mkdirp(path.dirname(file));
  await fs.writeFile(file, JSON.stringify(log, null, 2) + "\n", { flag: "wx" });
  return file;
}

export function freezeRebuildLog(log: RebuildLog): FrozenRebuildLog {
  return deepFreeze(log);
}
