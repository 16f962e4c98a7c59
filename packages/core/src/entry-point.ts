/**
 * Entry-point resolution for installed packages.
 *
 * Priority: bin > main > exports default. Returns a package-relative
 * forward-slash path, or null when nothing resolves.
 */

import * as path from "node:path";
import type { PackageManifest } from "./types.js";
import { isJsonObject, toPosixPath } from "./utils.js";

const EXPORT_CONDITIONS = ["default", "import", "node", "require"];

export type EntryPointSource = "bin" | "main" | "exports";

export interface ResolvedEntryPoint {
  source: EntryPointSource;
  path: string;
}

/**
 * Normalize a manifest path to "dir/file.js" form; null if it is empty or
 * points outside the package.
 */
function normalizeRelative(p: string | undefined | null): string | null {
  if (typeof p !== "string" || p.trim() === "") return null;
  const normalized = path.posix.normalize(toPosixPath(p.trim()));
  if (normalized === "." || normalized.startsWith("../") || normalized === ".." || path.posix.isAbsolute(normalized)) {
    return null;
  }
  return normalized.replace(/^\.\//, "");
}

function unscopedName(name: string): string {
  const slash = name.lastIndexOf("/");
  return slash === -1 ? name : name.slice(slash + 1);
}

export function resolveBin(manifest: PackageManifest): string | null {
  const { bin } = manifest;
  if (bin === undefined) return null;
  if (typeof bin === "string") return normalizeRelative(bin);

  const own = bin[unscopedName(manifest.name)];
  if (own !== undefined) return normalizeRelative(own);

  for (const target of Object.values(bin)) {
    const resolved = normalizeRelative(target);
    if (resolved) return resolved;
  }
  return null;
}

export function resolveExportsDefault(exportsField: unknown): string | null {
  if (typeof exportsField === "string") return normalizeRelative(exportsField);

  if (Array.isArray(exportsField)) {
    for (const candidate of exportsField) {
      const resolved = resolveExportsDefault(candidate);
      if (resolved) return resolved;
    }
    return null;
  }

  if (!isJsonObject(exportsField)) return null;

  const keys = Object.keys(exportsField);
  if (keys.length > 0 && keys.every((k) => k.startsWith("."))) {
    // Subpath map: only the package root counts
    return resolveExportsDefault(exportsField["."]);
  }

  for (const condition of EXPORT_CONDITIONS) {
    if (condition in exportsField) {
      const resolved = resolveExportsDefault(exportsField[condition]);
      if (resolved) return resolved;
    }
  }
  return null;
}

export function resolveEntryPoint(manifest: PackageManifest): ResolvedEntryPoint | null {
  const bin = resolveBin(manifest);
  if (bin) return { source: "bin", path: bin };

  const main = normalizeRelative(manifest.main);
  if (main) return { source: "main", path: main };

  const exported = resolveExportsDefault(manifest.exports);
  if (exported) return { source: "exports", path: exported };

  return null;
}
