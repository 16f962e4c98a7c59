import { describe, it, expect } from "vitest";
import * as os from "node:os";
import * as path from "node:path";
import { TARGET_REGISTRY, ALL_TARGET_IDS, getTarget, resolvePath } from "./_registry.js";

describe("TARGET_REGISTRY", () => {
  it("contains the desktop and code clients", () => {
    expect(ALL_TARGET_IDS).toEqual(["claude-desktop", "claude-code"]);
  });

  it("every target reserves a servers key", () => {
    for (const target of Object.values(TARGET_REGISTRY)) {
      expect(target.serversKey).toBe("mcpServers");
    }
  });
});

describe("getTarget", () => {
  it("returns a descriptor by id", () => {
    expect(getTarget("claude-code").display.name).toBe("Claude Code");
  });

  it("throws on unknown ids", () => {
    expect(() => getTarget("nope")).toThrow("Unknown target: nope (expected one of claude-desktop, claude-code)");
  });
});

describe("resolvePath", () => {
  it("picks the platform-specific path", () => {
    const spec = getTarget("claude-desktop").configPath;
    expect(resolvePath(spec, "darwin")).toBe(
      path.join(os.homedir(), "Library/Application Support/Claude/claude_desktop_config.json")
    );
    expect(resolvePath(spec, "linux")).toBe(path.join(os.homedir(), ".config/Claude/claude_desktop_config.json"));
  });

  it("falls back to the linux path on other platforms", () => {
    const spec = getTarget("claude-desktop").configPath;
    expect(resolvePath(spec, "freebsd")).toBe(resolvePath(spec, "linux"));
  });

  it("expands plain string specs", () => {
    expect(resolvePath("~/.claude.json")).toBe(path.join(os.homedir(), ".claude.json"));
  });
});
