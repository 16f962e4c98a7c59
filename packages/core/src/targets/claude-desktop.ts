import type { ClientTarget } from "./_types.js";

export const claudeDesktop: ClientTarget = {
  id: "claude-desktop",
  display: { name: "Claude Desktop" },
  configPath: {
    darwin: "~/Library/Application Support/Claude/claude_desktop_config.json",
    linux: "~/.config/Claude/claude_desktop_config.json",
    win32: "%APPDATA%/Claude/claude_desktop_config.json",
  },
  serversKey: "mcpServers",
};
