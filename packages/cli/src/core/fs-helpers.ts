/**
 * Shared filesystem helpers used across CLI modules.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomBytes } from "node:crypto";
import { getStackHomePath } from "@mcpstack/core";

export const STACK_HOME = getStackHomePath();

export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
}

export async function mkdirp(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Permission bits of an existing file, or null when there is none */
async function existingMode(filePath: string): Promise<number | null> {
  try {
    return (await fs.stat(filePath)).mode & 0o777;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
}

/**
 * Write via a temp file in the target's directory, fsync, then rename over
 * the target. Readers see either the old file or the new one. A replaced
 * file keeps its permission bits; a new one is created 0600.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await mkdirp(dir);
  const mode = (await existingMode(filePath)) ?? 0o600;
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`);

  try {
    const handle = await fs.open(tmpPath, "wx", 0o600);
    try {
      // open() applies the umask; chmod does not
      await handle.chmod(mode);
      await handle.writeFile(content, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}
