/**
 * Orchestrates running all doctor health checks.
 */

import { currentHost } from "../../core/preflight.js";
import { checkStackConfig, checkPackagesResolve, checkDesktopConfigJson } from "./config-check.js";
import { checkManagedServers } from "./mcp-check.js";
import { checkHostTools, checkNodeRuntime, checkPlatform, checkNpmAvailable } from "./runtime-check.js";
import type { DiagnosticResult, DoctorOptions, DoctorResult } from "./types.js";

export function summarize(checks: DiagnosticResult[]): DoctorResult {
  const summary = {
    passed: checks.filter((c) => c.status === "pass").length,
    failed: checks.filter((c) => c.status === "fail").length,
    warnings: checks.filter((c) => c.status === "warn").length,
  };

  return {
    success: summary.failed === 0,
    checks,
    summary,
  };
}

/**
 * Run all diagnostic checks
 */
export async function runAllChecks(opts: DoctorOptions): Promise<DoctorResult> {
  const host = opts.host ?? currentHost();
  const checks: DiagnosticResult[] = [];

  // 1. Host
  checks.push(checkNodeRuntime(host));
  checks.push(checkPlatform(host));
  checks.push(...(await checkHostTools(host, opts.readVersion)));

  // 2. Stack config; everything after depends on it
  checks.push(checkStackConfig(opts.configSource, opts.configError));
  const { config } = opts;
  if (!config) return summarize(checks);

  checks.push(await checkNpmAvailable(config.installer, opts.readVersion));

  // 3. Inputs and outputs of a rebuild
  checks.push(await checkPackagesResolve(config));
  checks.push(await checkDesktopConfigJson(config.desktopConfig));
  checks.push(...(await checkManagedServers(config)));

  return summarize(checks);
}
