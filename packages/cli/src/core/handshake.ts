/**
 * Handshake Validation
 *
 * Spawns each managed server, speaks just enough MCP over stdio to list its
 * tools, and records pass/fail. Failures are recorded, never thrown.
 */

import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { LATEST_PROTOCOL_VERSION, ListToolsResultSchema } from "@modelcontextprotocol/sdk/types.js";
import {
  type BoundedRunResult,
  type ServerDefinition,
  type ServerValidation,
  errorMessage,
  isJsonObject,
} from "@mcpstack/core";
import type { TraceFields, TraceLogger } from "./tracer.js";
import { errnoCode } from "./fs-helpers.js";
import { VERSION } from "../version.js";

export const CLIENT_INFO = { name: "mcpstack", version: VERSION };

const TOOLS_LIST_ID = 2;
const MAX_CAPTURE = 1_000_000;
const EXIT_DRAIN_MS = 100;
// Process groups exist only on POSIX; Windows kills the child alone
const KILL_GROUP = process.platform !== "win32";

// ============================================================================
// Bounded subprocess
// ============================================================================

/**
 * Run a process with piped stdio, write `input` and close stdin, collect
 * output until it exits or `timeoutMs` passes (then SIGKILL to its whole
 * process group). Never rejects.
 *
 * Settles on `exit` plus a short drain rather than on `close`: a grandchild
 * that inherited the pipes would otherwise hold the run open until it exits.
 */
export function runBounded(
  executable: string,
  args: string[],
  input: string,
  timeoutMs: number,
  env?: Record<string, string>,
): Promise<BoundedRunResult> {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let spawnError: string | undefined;
    let settled = false;

    const append = (buf: string, chunk: string): string =>
      buf.length >= MAX_CAPTURE ? buf : (buf + chunk).slice(0, MAX_CAPTURE);

    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(executable, args, {
        env: { ...process.env, ...env },
        shell: false,
        windowsHide: true,
        detached: KILL_GROUP,
      });
    } catch (err) {
      resolve({ stdout, stderr, exitCode: null, signal: null, timedOut, error: errorMessage(err) });
      return;
    }

    let drainTimer: NodeJS.Timeout | undefined;

    const settle = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(drainTimer);
      // Reap anything the server left behind in its group
      if (KILL_GROUP && child.pid !== undefined) killTree(child);
      child.stdout.destroy();
      child.stderr.destroy();
      resolve({ stdout, stderr, exitCode, signal, timedOut, error: spawnError });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killTree(child);
      child.stdout.destroy();
      child.stderr.destroy();
    }, timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => { stdout = append(stdout, chunk); });
    child.stderr.on("data", (chunk: string) => { stderr = append(stderr, chunk); });

    // A server that exits before reading its input closes the pipe under us
    child.stdin.on("error", (err) => { stderr = append(stderr, `[stdin] ${err.message}\n`); });
    child.on("error", (err) => {
      spawnError = err.message;
      // No exit event follows a failed spawn
      if (child.pid === undefined) settle(null, null);
    });

    child.on("exit", (code, signal) => {
      // Output already written may still sit in the pipes
      drainTimer = setTimeout(() => settle(code, signal), EXIT_DRAIN_MS);
    });
    child.on("close", (code, signal) => settle(code, signal));

    child.stdin.end(input);
  });
}

/** SIGKILL the child's process group where there is one, else the child alone. */
function killTree(child: ChildProcessWithoutNullStreams): void {
  if (KILL_GROUP && child.pid !== undefined) {
    try {
      process.kill(-child.pid, "SIGKILL");
      return;
    } catch (err) {
      // ESRCH: the group is already gone
      if (errnoCode(err) !== "ESRCH") child.kill("SIGKILL");
      return;
    }
  }
  child.kill("SIGKILL");
}

// ============================================================================
// MCP handshake
// ============================================================================

/**
 * initialize, notifications/initialized, tools/list: newline-delimited JSON-RPC.
 */
export function buildHandshakeInput(): string {
  const messages = [
    {
      jsonrpc: "2.0",
      id: 1,
      method: "initialize",
      params: { protocolVersion: LATEST_PROTOCOL_VERSION, capabilities: {}, clientInfo: CLIENT_INFO },
    },
    { jsonrpc: "2.0", method: "notifications/initialized" },
    { jsonrpc: "2.0", id: TOOLS_LIST_ID, method: "tools/list" },
  ];
  return messages.map((m) => JSON.stringify(m)).join("\n") + "\n";
}

function findResponse(stdout: string, id: number): Record<string, unknown> | null {
  for (const line of stdout.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("{")) continue;
    let message: unknown;
    try {
      message = JSON.parse(trimmed);
    } catch {
      continue;
    }
    if (isJsonObject(message) && message.id === id && ("result" in message || "error" in message)) {
      return message;
    }
  }
  return null;
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  const last = lines[lines.length - 1] ?? "";
  return last.length > 200 ? `${last.slice(0, 200)}...` : last;
}

function describeMissing(run: BoundedRunResult, timeoutMs: number): string {
  let detail: string;
  if (run.error) {
    detail = `failed to start: ${run.error}`;
  } else if (run.timedOut) {
    detail = `expected a tools/list response within ${timeoutMs} ms, found none`;
  } else if (run.stdout.trim() === "") {
    detail = `expected a tools/list response, found no output (exit ${run.exitCode ?? run.signal})`;
  } else {
    detail = `expected a tools/list response, found none in the output (exit ${run.exitCode ?? run.signal})`;
  }
  const stderr = lastLine(run.stderr);
  return stderr ? `${detail}; stderr: ${stderr}` : detail;
}

/**
 * Pass iff stdout holds a tools/list result that validates against the MCP
 * schema, whether or not the process exited on its own afterwards.
 */
export function evaluateHandshake(
  name: string,
  definition: ServerDefinition,
  run: BoundedRunResult,
  timeoutMs: number,
  durationMs: number,
): ServerValidation {
  const base = {
    name,
    command: definition.command,
    args: definition.args,
    exitCode: run.exitCode,
    timedOut: run.timedOut,
    durationMs,
  };

  const response = findResponse(run.stdout, TOOLS_LIST_ID);
  if (!response) {
    return { ...base, passed: false, detail: describeMissing(run, timeoutMs) };
  }

  if ("error" in response) {
    const error = response.error;
    const message = isJsonObject(error) && typeof error.message === "string" ? error.message : JSON.stringify(error);
    return { ...base, passed: false, detail: `tools/list returned an error: ${message}` };
  }

  const parsed = ListToolsResultSchema.safeParse(response.result);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      ...base,
      passed: false,
      detail: `tools/list result does not match the MCP schema: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid"}`,
    };
  }

  const names = parsed.data.tools.map((t) => t.name);
  return {
    ...base,
    passed: true,
    toolCount: names.length,
    detail: `${names.length} tool(s)${names.length > 0 ? `: ${names.join(", ")}` : ""}`,
  };
}

export async function validateServer(
  name: string,
  definition: ServerDefinition,
  timeoutMs: number,
  log?: TraceLogger,
): Promise<ServerValidation> {
  const started = Date.now();
  const run = await runBounded(definition.command, definition.args, buildHandshakeInput(), timeoutMs, definition.env);
  const result = evaluateHandshake(name, definition, run, timeoutMs, Date.now() - started);

  const fields: TraceFields = {
    scope: "validate",
    op: "handshake",
    phase: "validate",
    item: name,
    dur: result.durationMs,
    msg: result.detail,
    data: { exitCode: run.exitCode, signal: run.signal, timedOut: run.timedOut },
  };
  if (result.passed) log?.info(fields);
  else log?.warn({ ...fields, error: "HANDSHAKE_FAILED" });

  return result;
}

/**
 * Validate servers one at a time, in the given order.
 */
export async function validateServers(
  servers: Record<string, ServerDefinition>,
  timeoutMs: number,
  log?: TraceLogger,
): Promise<ServerValidation[]> {
  const results: ServerValidation[] = [];
  for (const [name, definition] of Object.entries(servers)) {
    results.push(await validateServer(name, definition, timeoutMs, log));
  }
  return results;
}
