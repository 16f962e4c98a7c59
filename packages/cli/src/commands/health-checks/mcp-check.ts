/**
 * Managed MCP server checks for doctor command.
 */

import { type StackConfig, pathExists } from "@mcpstack/core";
import { readDesktopConfigText, readServerEntries } from "../../core/config-merger.js";
import type { DiagnosticResult } from "./types.js";

/**
 * One result per managed package: its entry must be present in the
 * desktop config and the wrapper it launches must exist.
 */
export async function checkManagedServers(config: StackConfig): Promise<DiagnosticResult[]> {
  const text = await readDesktopConfigText(config.desktopConfig);
  const entries = readServerEntries(text, config.serversKey);
  const results: DiagnosticResult[] = [];

  for (const spec of config.packages) {
    const name = `MCP Server: ${spec.name}`;
    const definition = entries[spec.name];

    if (!definition) {
      results.push({
        name,
        status: "fail",
        message: `No "${spec.name}" entry under ${config.serversKey} in ${config.desktopConfig}`,
        fix: "Run: mcpstack rebuild",
      });
      continue;
    }

    const wrapper = definition.args[0];
    if (wrapper === undefined || !(await pathExists(wrapper))) {
      results.push({
        name,
        status: "fail",
        message: wrapper === undefined
          ? `Entry "${spec.name}" has no wrapper argument`
          : `Wrapper ${wrapper} does not exist`,
        fix: "Run: mcpstack rebuild",
      });
      continue;
    }

    results.push({
      name,
      status: "pass",
      message: `${definition.command} ${wrapper}`,
    });
  }

  return results;
}
