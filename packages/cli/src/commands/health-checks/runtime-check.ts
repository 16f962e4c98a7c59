/**
 * Host runtime checks for doctor command.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { type InstallerKind, SUPPORTED_PLATFORMS, errorMessage } from "@mcpstack/core";
import { type HostInfo, MIN_NODE_MAJOR, currentHost, nodeMajor } from "../../core/preflight.js";
import type { DiagnosticResult, VersionReader } from "./types.js";

const execFileAsync = promisify(execFile);

/**
 * Check the running Node.js major version
 */
export function checkNodeRuntime(host: HostInfo = currentHost()): DiagnosticResult {
  const major = nodeMajor(host.nodeVersion);
  if (Number.isFinite(major) && major >= MIN_NODE_MAJOR) {
    return {
      name: "Node.js Runtime",
      status: "pass",
      message: `Node.js ${host.nodeVersion}`,
    };
  }

  return {
    name: "Node.js Runtime",
    status: "fail",
    message: `Expected Node.js ${MIN_NODE_MAJOR} or newer, found ${host.nodeVersion}`,
    fix: `Install Node.js ${MIN_NODE_MAJOR} or newer`,
  };
}

export function checkPlatform(host: HostInfo = currentHost()): DiagnosticResult {
  if (SUPPORTED_PLATFORMS.includes(host.platform)) {
    return { name: "Platform", status: "pass", message: host.platform };
  }

  return {
    name: "Platform",
    status: "fail",
    message: `Expected one of ${SUPPORTED_PLATFORMS.join(", ")}, found ${host.platform}`,
  };
}

export const readCommandVersion: VersionReader = async (command) => {
  // npm is a .cmd shim on Windows, which only a shell can start
  const shim = process.platform === "win32" && command === "npm";
  const { stdout } = await execFileAsync(shim ? "npm.cmd" : command, ["--version"], {
    timeout: 10_000,
    shell: shim,
    windowsHide: true,
  });
  return stdout.trim().split(/\r?\n/)[0] ?? "";
};

/**
 * npm is only required by the npm installer; with the extract installer a
 * missing npm is a warning.
 */
export async function checkNpmAvailable(
  installer: InstallerKind,
  readVersion: VersionReader = readCommandVersion
): Promise<DiagnosticResult> {
  try {
    const version = await readVersion("npm");
    return { name: "npm", status: "pass", message: `npm ${version}` };
  } catch (error) {
    return {
      name: "npm",
      status: installer === "npm" ? "fail" : "warn",
      message: `npm could not run: ${errorMessage(error)}`,
      fix: installer === "npm" ? "Install npm, or set installer: extract in stack.yaml" : undefined,
    };
  }
}

interface HostTool {
  command: string;
  fix: string;
  /** Only checked on these platforms */
  platforms?: NodeJS.Platform[];
}

const HOST_TOOLS: HostTool[] = [
  { command: "git", fix: "Install git" },
  { command: "python3", fix: "Install Python 3 for servers that run on it" },
  { command: "docker", fix: "Install Docker for servers that run in containers" },
  { command: "brew", fix: "Install Homebrew from https://brew.sh", platforms: ["darwin"] },
];

/**
 * Tools the servers of a stack commonly lean on. A rebuild runs none of
 * them, so a missing one is a warning.
 */
export async function checkHostTools(
  host: HostInfo = currentHost(),
  readVersion: VersionReader = readCommandVersion
): Promise<DiagnosticResult[]> {
  const results: DiagnosticResult[] = [];
  for (const tool of HOST_TOOLS) {
    if (tool.platforms && !tool.platforms.includes(host.platform)) continue;
    try {
      results.push({ name: tool.command, status: "pass", message: await readVersion(tool.command) });
    } catch (error) {
      results.push({
        name: tool.command,
        status: "warn",
        message: `${tool.command} could not run: ${errorMessage(error)}`,
        fix: tool.fix,
      });
    }
  }
  return results;
}
