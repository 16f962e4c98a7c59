/**
 * Config Merger Module
 *
 * Merges managed server definitions into a desktop client config:
 * - Pure merge: prior text in, new text out, nothing touches disk
 * - Textual edits via jsonc-parser, so bytes outside the servers key stay as they were
 * - Commit: timestamped .bak copy first, then an atomic write
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as jsonc from "jsonc-parser";
import {
  type DesktopConfig,
  type InstalledPackage,
  type PackageSpec,
  type ServerDefinition,
  type ServerMode,
  StackError,
  errorMessage,
  isJsonObject,
  jsonEqual,
  serverDefinitionSchema,
  toPosixPath,
} from "@mcpstack/core";
import type { TraceLogger } from "./tracer.js";
import { errnoCode, readFileIfExists, writeFileAtomic } from "./fs-helpers.js";

export interface MergeOptions {
  key: string;
  mode: ServerMode;
}

export interface MergeResult {
  text: string;
  document: DesktopConfig;
  warnings: string[];
}

// ============================================================================
// Server Definitions
// ============================================================================

function normalizeArg(arg: string): string {
  return path.isAbsolute(arg) ? toPosixPath(arg) : arg;
}

/**
 * Definition for one installed package: the runtime interpreter runs the
 * package's wrapper, followed by the package entry's own args.
 */
export function buildServerDefinition(
  pkg: InstalledPackage,
  spec: PackageSpec,
  execPath: string = process.execPath,
): ServerDefinition {
  const definition: ServerDefinition = {
    command: toPosixPath(execPath),
    args: [toPosixPath(pkg.wrapperPath), ...spec.args.map(normalizeArg)],
  };
  if (spec.env && Object.keys(spec.env).length > 0) {
    definition.env = { ...spec.env };
  }
  return definition;
}

// ============================================================================
// Merge
// ============================================================================

function parsePrior(priorText: string | null, warnings: string[]): { text: string | null; config: DesktopConfig } {
  if (priorText === null) return { text: null, config: {} };

  let parsed: unknown;
  try {
    parsed = JSON.parse(priorText);
  } catch (err) {
    warnings.push(`CONFIG_UNPARSEABLE: prior desktop config is not valid JSON (${errorMessage(err)}); starting from {}`);
    return { text: null, config: {} };
  }

  if (!isJsonObject(parsed)) {
    warnings.push(`CONFIG_UNPARSEABLE: prior desktop config is not a JSON object (found ${Array.isArray(parsed) ? "array" : typeof parsed}); starting from {}`);
    return { text: null, config: {} };
  }
  return { text: priorText, config: parsed };
}

/**
 * Edits are left unformatted: the formatter widens an insert to whole
 * lines, which would rewrite caller-owned bytes sharing that line.
 */
function applyModify(text: string, jsonPath: jsonc.JSONPath, value: unknown): string {
  const edits = jsonc.modify(text, jsonPath, value, {});
  return jsonc.applyEdits(text, edits);
}

function roundTripFailure(reason: string): StackError {
  return new StackError("CONFIG_ROUNDTRIP_FAILED", `Merged desktop config failed verification: ${reason}`);
}

/**
 * Re-parse the merged text and confirm the servers key holds exactly the
 * expected definitions and every other top-level value is unchanged.
 */
function verifyRoundTrip(text: string, prior: DesktopConfig, key: string, expected: Record<string, unknown>): DesktopConfig {
  let document: unknown;
  try {
    document = JSON.parse(JSON.stringify(JSON.parse(text)));
  } catch (err) {
    throw roundTripFailure(`expected valid JSON, found ${errorMessage(err)}`);
  }
  if (!isJsonObject(document)) {
    throw roundTripFailure("expected a JSON object at the top level");
  }
  if (!jsonEqual(document[key], expected)) {
    throw roundTripFailure(`expected "${key}" to hold exactly ${Object.keys(expected).join(", ") || "no servers"}`);
  }

  const otherKeys = new Set([...Object.keys(prior), ...Object.keys(document)]);
  otherKeys.delete(key);
  for (const other of otherKeys) {
    if (!jsonEqual(prior[other], document[other])) {
      throw roundTripFailure(`expected "${other}" to be unchanged`);
    }
  }
  return document;
}

/**
 * Merge managed servers into the prior config text.
 *
 * `merge` overwrites only the managed names and keeps user-added entries;
 * `replace` makes the servers key exactly the managed set.
 */
export function mergeDesktopConfig(
  priorText: string | null,
  servers: Record<string, ServerDefinition>,
  opts: MergeOptions,
): MergeResult {
  const warnings: string[] = [];
  const prior = parsePrior(priorText, warnings);
  const existing = prior.config[opts.key];

  let text: string;
  let expected: Record<string, unknown>;

  if (prior.text === null) {
    text = JSON.stringify({ [opts.key]: servers }, null, 2) + "\n";
    expected = { ...servers };
  } else if (opts.mode === "replace" || !isJsonObject(existing)) {
    text = applyModify(prior.text, [opts.key], servers);
    expected = { ...servers };
  } else {
    text = prior.text;
    for (const [name, definition] of Object.entries(servers)) {
      text = applyModify(text, [opts.key, name], definition);
    }
    expected = { ...existing, ...servers };
  }

  const document = verifyRoundTrip(text, prior.config, opts.key, expected);
  return { text, document, warnings };
}

// ============================================================================
// Reading
// ============================================================================

export async function readDesktopConfigText(configPath: string): Promise<string | null> {
  return readFileIfExists(configPath);
}

/**
 * Server entries under the servers key that parse as definitions.
 * Returns an empty map for a missing, unparseable or key-less config.
 */
export function readServerEntries(text: string | null, key: string): Record<string, ServerDefinition> {
  if (text === null) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {};
  }
  if (!isJsonObject(parsed)) return {};
  const section = parsed[key];
  if (!isJsonObject(section)) return {};

  const entries: Record<string, ServerDefinition> = {};
  for (const [name, value] of Object.entries(section)) {
    const result = serverDefinitionSchema.safeParse(value);
    if (result.success) entries[name] = result.data;
  }
  return entries;
}

// ============================================================================
// Commit
// ============================================================================

export interface CommitResult {
  configPath: string;
  /** Null when there was no prior file to back up */
  backupPath: string | null;
}

export async function backupDesktopConfig(configPath: string, timestamp: string): Promise<string | null> {
  const backupPath = `${configPath}.${timestamp}.bak`;
  try {
    await fs.copyFile(configPath, backupPath, fs.constants.COPYFILE_EXCL);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
  return backupPath;
}

/**
 * Back up the current file, then atomically replace it with `text`.
 */
export async function commitDesktopConfig(
  configPath: string,
  text: string,
  timestamp: string,
  log?: TraceLogger,
): Promise<CommitResult> {
  const backupPath = await backupDesktopConfig(configPath, timestamp);
  if (backupPath) {
    log?.info({ scope: "config", op: "backup", phase: "merge", path: backupPath, msg: "Backed up desktop config" });
  }

  await writeFileAtomic(configPath, text);
  log?.info({ scope: "config", op: "write", phase: "merge", path: configPath, method: "atomic-rename", msg: "Desktop config written" });

  return { configPath, backupPath };
}
