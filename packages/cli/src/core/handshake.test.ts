import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import type { BoundedRunResult, ServerDefinition } from "@mcpstack/core";
import { FORKING_SERVER, ORPHANING_SERVER, RESPONSIVE_SERVER, SILENT_SERVER } from "../__tests__/fixtures.js";
import { buildHandshakeInput, evaluateHandshake, runBounded, validateServer, validateServers } from "./handshake.js";

const definition: ServerDefinition = { command: "/usr/bin/node", args: ["/stack/bin/memory.mjs"] };

function run(partial: Partial<BoundedRunResult>): BoundedRunResult {
  return { stdout: "", stderr: "", exitCode: 0, signal: null, timedOut: false, ...partial };
}

describe("buildHandshakeInput", () => {
  it("writes initialize, initialized and tools/list as JSON lines", () => {
    const input = buildHandshakeInput();
    expect(input.endsWith("\n")).toBe(true);

    const messages = input.trim().split("\n").map((line) => JSON.parse(line));
    expect(messages).toEqual([
      {
        jsonrpc: "2.0",
        id: 1,
        method: "initialize",
        params: {
          protocolVersion: LATEST_PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: { name: "mcpstack", version: "0.1.0" },
        },
      },
      { jsonrpc: "2.0", method: "notifications/initialized" },
      { jsonrpc: "2.0", id: 2, method: "tools/list" },
    ]);
  });
});

describe("runBounded", () => {
  it("feeds stdin and captures stdout", async () => {
    const result = await runBounded(process.execPath, ["-e", "process.stdin.pipe(process.stdout)"], "hello\n", 5_000);
    expect(result).toEqual({ stdout: "hello\n", stderr: "", exitCode: 0, signal: null, timedOut: false, error: undefined });
  });

  it("passes extra environment variables", async () => {
    const result = await runBounded(
      process.execPath,
      ["-e", "process.stdout.write(process.env.MCPSTACK_TEST_VALUE ?? '')"],
      "",
      5_000,
      { MCPSTACK_TEST_VALUE: "placeholder" }
    );
    expect(result.stdout).toBe("placeholder");
  });

  it("kills a process that outlives the timeout", async () => {
    const result = await runBounded(process.execPath, ["-e", "setInterval(() => {}, 1000)"], "", 300);
    expect(result.timedOut).toBe(true);
    expect(result.signal).toBe("SIGKILL");
    expect(result.exitCode).toBeNull();
  });

  describe("with a child process holding the output pipes", () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "mcpstack-bounded-"));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it("still returns at the timeout", async () => {
      const script = path.join(tmpDir, "forking.cjs");
      await fs.writeFile(script, FORKING_SERVER);

      const started = Date.now();
      const result = await runBounded(process.execPath, [script], "", 500);

      expect(Date.now() - started).toBeLessThan(3_000);
      expect(result.timedOut).toBe(true);
      expect(result.signal).toBe("SIGKILL");
    });

    it("returns once the server exits", async () => {
      const script = path.join(tmpDir, "orphaning.cjs");
      await fs.writeFile(script, ORPHANING_SERVER);

      const started = Date.now();
      const result = await runBounded(process.execPath, [script], "", 5_000);

      expect(Date.now() - started).toBeLessThan(3_000);
      expect(result).toMatchObject({ stdout: "ready\n", exitCode: 0, signal: null, timedOut: false });
    });
  });

  it("reports a spawn failure instead of throwing", async () => {
    const result = await runBounded(path.join(os.tmpdir(), "mcpstack-missing-binary"), [], "", 1_000);
    expect(result.error).toMatch(/ENOENT/);
    expect(result.timedOut).toBe(false);
  });
});

describe("evaluateHandshake", () => {
  const toolsLine = JSON.stringify({ jsonrpc: "2.0", id: 2, result: { tools: [{ name: "echo", inputSchema: { type: "object" } }] } });

  it("passes on a schema-valid tools/list result, ignoring noise lines", () => {
    const result = evaluateHandshake("memory", definition, run({ stdout: `starting up\n${toolsLine}\n` }), 1_000, 12);
    expect(result).toEqual({
      name: "memory",
      command: "/usr/bin/node",
      args: ["/stack/bin/memory.mjs"],
      exitCode: 0,
      timedOut: false,
      durationMs: 12,
      passed: true,
      toolCount: 1,
      detail: "1 tool(s): echo",
    });
  });

  it("still passes when the result arrived before a timeout", () => {
    const result = evaluateHandshake("memory", definition, run({ stdout: toolsLine, exitCode: null, signal: "SIGKILL", timedOut: true }), 1_000, 1_000);
    expect(result.passed).toBe(true);
    expect(result.timedOut).toBe(true);
  });

  it("fails on a JSON-RPC error response", () => {
    const stdout = JSON.stringify({ jsonrpc: "2.0", id: 2, error: { code: -32601, message: "Method not found" } });
    expect(evaluateHandshake("memory", definition, run({ stdout }), 1_000, 5).detail).toBe(
      "tools/list returned an error: Method not found"
    );
  });

  it("fails when the result does not match the schema", () => {
    const stdout = JSON.stringify({ jsonrpc: "2.0", id: 2, result: { tools: "none" } });
    const result = evaluateHandshake("memory", definition, run({ stdout }), 1_000, 5);
    expect(result.passed).toBe(false);
    expect(result.detail.startsWith("tools/list result does not match the MCP schema: tools: ")).toBe(true);
  });

  it("ignores responses to other ids", () => {
    const stdout = JSON.stringify({ jsonrpc: "2.0", id: 1, result: { tools: [] } });
    const result = evaluateHandshake("memory", definition, run({ stdout, exitCode: 0 }), 1_000, 5);
    expect(result.detail).toBe("expected a tools/list response, found none in the output (exit 0)");
  });

  it("describes an empty run with the last stderr line", () => {
    const result = evaluateHandshake("memory", definition, run({ exitCode: 1, stderr: "loading\nError: boom\n" }), 1_000, 5);
    expect(result.detail).toBe("expected a tools/list response, found no output (exit 1); stderr: Error: boom");
  });

  it("describes a timeout", () => {
    const result = evaluateHandshake("memory", definition, run({ exitCode: null, signal: "SIGKILL", timedOut: true }), 750, 750);
    expect(result.detail).toBe("expected a tools/list response within 750 ms, found none");
  });
});

describe("validateServer", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "mcpstack-handshake-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function script(name: string, source: string): Promise<ServerDefinition> {
    const file = path.join(tmpDir, name);
    await fs.writeFile(file, source);
    return { command: process.execPath, args: [file] };
  }

  it("passes a server that lists its tools", async () => {
    const def = await script("responsive.cjs", RESPONSIVE_SERVER);
    const result = await validateServer("memory", def, 10_000);

    expect(result.passed).toBe(true);
    expect(result.toolCount).toBe(2);
    expect(result.detail).toBe("2 tool(s): echo, read");
    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
  });

  it("passes a server that answers but never exits", async () => {
    const lingering = RESPONSIVE_SERVER.replace('process.stdin.on("end", () => process.exit(0));', "setInterval(() => {}, 1000);");
    const def = await script("lingering.cjs", lingering);
    const result = await validateServer("memory", def, 1_500);

    expect(result.passed).toBe(true);
    expect(result.timedOut).toBe(true);
  });

  it("records a silent server as failed", async () => {
    const def = await script("silent.cjs", SILENT_SERVER);
    const result = await validateServer("memory", def, 500);

    expect(result.passed).toBe(false);
    expect(result.timedOut).toBe(true);
    expect(result.detail).toBe("expected a tools/list response within 500 ms, found none");
  });

  it("validates servers one by one in order", async () => {
    const good = await script("good.cjs", RESPONSIVE_SERVER);
    const bad = await script("bad.cjs", "process.exit(3);");

    const results = await validateServers({ good, bad }, 5_000);

    expect(results.map((r) => [r.name, r.passed, r.exitCode])).toEqual([
      ["good", true, 0],
      ["bad", false, 3],
    ]);
  });
});
