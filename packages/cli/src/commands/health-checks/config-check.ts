/**
 * Config file validation checks for doctor command.
 */

import { type StackConfig, errorMessage, isJsonObject } from "@mcpstack/core";
import { readFileIfExists } from "../../core/fs-helpers.js";
import { resolvePackages } from "../../core/package-resolver.js";
import type { DiagnosticResult } from "./types.js";

function describeJson(value: unknown): string {
  if (value === null) return "null";
  return Array.isArray(value) ? "array" : typeof value;
}

/**
 * Report where the stack config came from, or why it failed to load
 */
export function checkStackConfig(source: string | null | undefined, error?: string): DiagnosticResult {
  if (error !== undefined) {
    return {
      name: "Stack Configuration",
      status: "fail",
      message: error,
      fix: "Fix stack.yaml or pass --config <file>",
    };
  }

  return {
    name: "Stack Configuration",
    status: "pass",
    message: source ? `Loaded ${source}` : "No stack.yaml found, using built-in defaults",
  };
}

/**
 * Check that every package spec matches exactly one archive
 */
export async function checkPackagesResolve(config: StackConfig): Promise<DiagnosticResult> {
  try {
    const resolved = await resolvePackages(config.packagesDir, config.packages);
    return {
      name: "Offline Packages",
      status: "pass",
      message: `${resolved.length} archive(s) resolved in ${config.packagesDir}`,
    };
  } catch (error) {
    return {
      name: "Offline Packages",
      status: "fail",
      message: errorMessage(error),
      fix: `Place exactly one archive per package in ${config.packagesDir}`,
    };
  }
}

/**
 * Check that the desktop config parses as a JSON object
 */
export async function checkDesktopConfigJson(configPath: string): Promise<DiagnosticResult> {
  const content = await readFileIfExists(configPath);

  if (content === null) {
    return {
      name: "Desktop Config",
      status: "warn",
      message: `${configPath} not found`,
      fix: "Run: mcpstack rebuild",
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return {
      name: "Desktop Config",
      status: "fail",
      message: `Invalid JSON syntax in ${configPath}: ${errorMessage(error)}`,
      fix: "Fix the syntax, or run: mcpstack rebuild (the current file is backed up first)",
    };
  }

  if (!isJsonObject(parsed)) {
    return {
      name: "Desktop Config",
      status: "fail",
      message: `Expected a JSON object in ${configPath}, found ${describeJson(parsed)}`,
    };
  }

  return {
    name: "Desktop Config",
    status: "pass",
    message: `${configPath} is valid JSON`,
  };
}
