/**
 * Preflight: host checks plus read-only package resolution. Nothing on
 * disk changes until this passes.
 */

import {
  type ResolvedPackage,
  type StackConfig,
  SUPPORTED_PLATFORMS,
  StackError,
} from "@mcpstack/core";
import type { TraceLogger } from "./tracer.js";
import { resolvePackages } from "./package-resolver.js";

export const MIN_NODE_MAJOR = 20;

export interface HostInfo {
  platform: NodeJS.Platform;
  nodeVersion: string;
}

export function currentHost(): HostInfo {
  return { platform: process.platform, nodeVersion: process.versions.node };
}

export function nodeMajor(version: string): number {
  return Number.parseInt(version.replace(/^v/, "").split(".")[0], 10);
}

export function checkHost(host: HostInfo = currentHost(), log?: TraceLogger): void {
  if (!SUPPORTED_PLATFORMS.includes(host.platform)) {
    log?.error({ scope: "preflight", op: "platform", phase: "preflight", msg: `Unsupported platform ${host.platform}`, error: "UNSUPPORTED_PLATFORM" });
    throw new StackError(
      "UNSUPPORTED_PLATFORM",
      `Unsupported platform: expected one of ${SUPPORTED_PLATFORMS.join(", ")}, found ${host.platform}`
    );
  }

  const major = nodeMajor(host.nodeVersion);
  if (!Number.isFinite(major) || major < MIN_NODE_MAJOR) {
    log?.error({ scope: "preflight", op: "runtime", phase: "preflight", msg: `Node.js ${host.nodeVersion} too old`, error: "UNSUPPORTED_RUNTIME" });
    throw new StackError(
      "UNSUPPORTED_RUNTIME",
      `Unsupported Node.js: expected major version ${MIN_NODE_MAJOR} or newer, found ${host.nodeVersion}`
    );
  }
}

export async function runPreflight(
  config: StackConfig,
  log?: TraceLogger,
  host: HostInfo = currentHost(),
): Promise<ResolvedPackage[]> {
  checkHost(host, log);
  const resolved = await resolvePackages(config.packagesDir, config.packages, log);
  log?.info({ scope: "preflight", op: "done", phase: "preflight", msg: `Resolved ${resolved.length} package(s)` });
  return resolved;
}
