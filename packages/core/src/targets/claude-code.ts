import type { ClientTarget } from "./_types.js";

export const claudeCode: ClientTarget = {
  id: "claude-code",
  display: { name: "Claude Code" },
  configPath: "~/.claude.json",
  serversKey: "mcpServers",
};
