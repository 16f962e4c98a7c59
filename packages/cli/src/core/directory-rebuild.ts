/**
 * Directory Rebuild: `mkdir -p` every required directory under the root.
 * Same code path on fresh and repeat runs; no presence checks.
 */
import * as path from "node:path";
import type { TraceLogger } from "./tracer.js";
import { mkdirp } from "./fs-helpers.js";

export async function rebuildDirectories(root: string, directories: string[], log?: TraceLogger): Promise<string[]> {
  const created: string[] = [];
  for (const dir of directories) {
    const abs = path.join(root, dir);
    await mkdirp(abs);
    created.push(abs);
  }
  log?.info({ scope: "directories", op: "mkdir", phase: "directories", path: root, msg: `Ensured ${created.length} directories`, data: { directories } });
  return created;
}
