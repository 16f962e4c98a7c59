/**
 * Validate Command
 *
 * Re-runs the MCP handshake against the managed servers as they are
 * currently configured in the desktop config, without rebuilding anything.
 */

import { Command } from "commander";
import { type ServerValidation, type StackConfig, errorMessage } from "@mcpstack/core";
import { readDesktopConfigText, readServerEntries } from "../core/config-merger.js";
import { validateServer } from "../core/handshake.js";
import type { TraceLogger } from "../core/tracer.js";
import { ICONS, paint, printError } from "./ansi.js";
import { type StackCommandOptions, addPathOptions, loadFromOptions, parsePositiveInt } from "./options.js";
import { startTrace } from "./trace-context.js";

/**
 * Validate each managed package in config order. A package with no entry
 * in the desktop config is a failed result, never a thrown error.
 */
export async function runValidate(config: StackConfig, log?: TraceLogger): Promise<ServerValidation[]> {
  const text = await readDesktopConfigText(config.desktopConfig);
  const entries = readServerEntries(text, config.serversKey);
  const results: ServerValidation[] = [];

  for (const spec of config.packages) {
    const definition = entries[spec.name];
    if (!definition) {
      const detail = `expected a "${spec.name}" entry under ${config.serversKey} in ${config.desktopConfig}, found none`;
      log?.warn({ scope: "validate", op: "lookup", item: spec.name, path: config.desktopConfig, msg: detail, error: "HANDSHAKE_FAILED" });
      results.push({
        name: spec.name,
        command: "",
        args: [],
        passed: false,
        exitCode: null,
        timedOut: false,
        detail,
        durationMs: 0,
      });
      continue;
    }
    results.push(await validateServer(spec.name, definition, config.validation.timeoutMs, log));
  }

  return results;
}

export function formatValidateOutput(results: ServerValidation[]): string {
  const lines = results.map((r) => {
    const icon = r.passed ? paint("green", ICONS.pass) : paint("red", ICONS.fail);
    return `${icon} ${r.name}: ${r.detail}`;
  });
  const passed = results.filter((r) => r.passed).length;
  lines.push("");
  lines.push(`${passed}/${results.length} server(s) responded`);
  return lines.join("\n");
}

export const validateCommand = addPathOptions(
  new Command("validate").description("Handshake with the managed MCP servers in the desktop config")
)
  .option("--timeout <ms>", "Per-server handshake timeout", parsePositiveInt)
  .option("-j, --json", "Output as JSON")
  .action(async (options: StackCommandOptions) => {
    const log = startTrace("validate");
    try {
      const { config } = await loadFromOptions(options);
      log.attachRoot(config.root);
      const results = await runValidate(config, log);

      console.log(options.json ? JSON.stringify(results, null, 2) : formatValidateOutput(results));

      if (results.some((r) => !r.passed)) {
        process.exit(1);
      }
    } catch (error) {
      log.error({ scope: "validate", op: "fail", msg: errorMessage(error) });
      printError(errorMessage(error));
      process.exit(1);
    }
  });
