/**
 * Package Resolver
 *
 * Maps each PackageSpec to exactly one archive in the offline packages
 * directory. Read-only: runs before anything on disk is touched.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { minimatch } from "minimatch";
import { type PackageSpec, type ResolvedPackage, StackError } from "@mcpstack/core";
import type { TraceLogger } from "./tracer.js";
import { errnoCode } from "./fs-helpers.js";

async function listArchiveCandidates(packagesDir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(packagesDir, { withFileTypes: true });
    return entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new StackError(
        "PACKAGE_NOT_FOUND",
        `Packages directory not found: expected ${packagesDir} to exist and hold one archive per required package`
      );
    }
    throw err;
  }
}

export function matchArchives(fileNames: string[], pattern: string): string[] {
  return fileNames.filter((name) => minimatch(name, pattern, { nocase: process.platform === "win32" }));
}

export async function resolvePackages(
  packagesDir: string,
  specs: PackageSpec[],
  log?: TraceLogger,
): Promise<ResolvedPackage[]> {
  const fileNames = await listArchiveCandidates(packagesDir);
  const resolved: ResolvedPackage[] = [];

  for (const spec of specs) {
    const matches = matchArchives(fileNames, spec.pattern);

    if (matches.length === 0) {
      log?.error({ scope: "resolve", op: "match", phase: "preflight", item: spec.name, path: packagesDir, msg: "No archive matched", error: "PACKAGE_NOT_FOUND" });
      throw new StackError(
        "PACKAGE_NOT_FOUND",
        `Package "${spec.name}": expected exactly one file matching "${spec.pattern}" in ${packagesDir}, found none`,
        { pattern: spec.pattern, matches }
      );
    }

    if (matches.length > 1) {
      log?.error({ scope: "resolve", op: "match", phase: "preflight", item: spec.name, path: packagesDir, msg: "Several archives matched", error: "PACKAGE_AMBIGUOUS", data: { matches } });
      throw new StackError(
        "PACKAGE_AMBIGUOUS",
        `Package "${spec.name}": expected exactly one file matching "${spec.pattern}" in ${packagesDir}, found ${matches.length}: ${matches.join(", ")}`,
        { pattern: spec.pattern, matches }
      );
    }

    const archive = path.join(packagesDir, matches[0]);
    log?.debug({ scope: "resolve", op: "match", phase: "preflight", item: spec.name, path: archive, msg: "Resolved archive" });
    resolved.push({ spec, archive });
  }

  return resolved;
}
