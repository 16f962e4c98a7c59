/**
 * Utility functions for mcpstack
 */

import * as os from "node:os";
import * as path from "node:path";

/**
 * Expand ~ to home directory and %APPDATA% to the roaming app-data directory
 */
export function expandPath(p: string): string {
  if (p.startsWith("%APPDATA%")) {
    const appData = process.env.APPDATA ?? path.join(os.homedir(), "AppData", "Roaming");
    return path.join(appData, p.slice("%APPDATA%".length));
  }
  if (p.startsWith("~")) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

/**
 * Normalize every backslash to a forward slash. Desktop clients accept
 * forward slashes on every platform, so server definitions only carry those.
 */
export function toPosixPath(p: string): string {
  return p.replace(/\\/g, "/");
}

/**
 * Get the mcpstack home directory (traces, default stack.yaml)
 */
export function getStackHomePath(): string {
  return expandPath("~/.mcpstack");
}

/**
 * Filesystem-safe timestamp, e.g. 2024-05-01T10-20-30-123Z
 */
export function fileTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/[:.]/g, "-");
}

/**
 * Resolve environment variables in a string (e.g., ${VAR_NAME})
 */
export function resolveEnvVars(
  str: string,
  env: Record<string, string | undefined> = process.env
): string {
  return str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || "";
  });
}

/**
 * Deep structural equality for JSON values
 */
export function jsonEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== typeof b || a === null || b === null) return false;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => jsonEqual(item, b[i]));
  }

  if (isJsonObject(a) && isJsonObject(b)) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key) => Object.hasOwn(b, key) && jsonEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Check if a value is a plain JSON object (not an array, not null)
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check if a path exists
 */
export async function pathExists(p: string): Promise<boolean> {
  const fs = await import("node:fs/promises");
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}
