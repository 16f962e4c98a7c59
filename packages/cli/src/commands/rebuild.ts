/**
 * Rebuild Command
 *
 * Runs the full offline rebuild and prints a summary, or the rebuild log as
 * JSON with --json. Exits 1 only when the run itself failed; servers that
 * did not answer the handshake are reported but do not fail the run.
 */

import { Command } from "commander";
import { errorMessage } from "@mcpstack/core";
import { runRebuild } from "../core/rebuild.js";
import type { FrozenRebuildLog } from "../core/rebuild-log.js";
import { ICONS, paint, printError } from "./ansi.js";
import { type StackCommandOptions, addPathOptions, addRebuildOptions, loadFromOptions } from "./options.js";
import { startTrace } from "./trace-context.js";

interface RebuildCommandOptions extends StackCommandOptions {
  debug?: boolean;
}

function field(label: string, value: string): string {
  return `${`${label}:`.padEnd(16)}${value}`;
}

export function formatRebuildSummary(log: FrozenRebuildLog, logPath: string | null): string {
  const lines: string[] = [];

  lines.push("mcpstack rebuild");
  lines.push("================");
  lines.push(field("Root", log.paths.root));
  lines.push(field("Desktop config", log.paths.desktopConfig));
  lines.push("");

  if (log.packages.length > 0) {
    lines.push("Packages:");
    for (const pkg of log.packages) {
      lines.push(`  ${pkg.name}  ${pkg.packageName}@${pkg.version}`);
    }
    lines.push("");
  }

  if (log.validation.length > 0) {
    lines.push("Servers:");
    for (const result of log.validation) {
      const icon = result.passed ? paint("green", ICONS.pass) : paint("red", ICONS.fail);
      lines.push(`  ${icon} ${result.name}: ${result.detail}`);
    }
    lines.push("");
  }

  for (const warning of log.warnings) {
    lines.push(paint("yellow", `${ICONS.warn} ${warning}`));
  }
  if (log.warnings.length > 0) lines.push("");

  const artifacts: [string, string | undefined][] = [
    ["Backup", log.paths.backupArchive],
    ["Quarantine", log.paths.quarantineBatch],
    ["Config backup", log.paths.configBackup],
    ["Snapshot", log.paths.snapshotArchive],
    ["Log", logPath ?? undefined],
  ];
  for (const [label, value] of artifacts) {
    if (value) lines.push(field(label, value));
  }

  lines.push("");
  if (log.status === "success") {
    const passed = log.validation.filter((v) => v.passed).length;
    lines.push(paint("green", `${ICONS.pass} Rebuild complete: ${passed}/${log.validation.length} server(s) responded`));
  } else if (log.error) {
    lines.push(paint("red", `${ICONS.fail} Rebuild failed during ${log.error.phase}: [${log.error.code}] ${log.error.message}`));
  }

  return lines.join("\n");
}

export const rebuildCommand = addRebuildOptions(
  addPathOptions(new Command("rebuild").description("Rebuild the MCP server stack from offline package archives"))
)
  .option("-j, --json", "Print the rebuild log as JSON")
  .option("--debug", "Record debug entries in the trace log")
  .action(async (options: RebuildCommandOptions) => {
    const log = startTrace("rebuild", { debug: options.debug });
    try {
      const { config, source } = await loadFromOptions(options);
      log.info({ scope: "config", op: "load", path: source ?? undefined, msg: source ? "Loaded stack config" : "Using built-in defaults" });
      log.attachRoot(config.root);

      const outcome = await runRebuild({ config, log });

      console.log(options.json ? JSON.stringify(outcome.log, null, 2) : formatRebuildSummary(outcome.log, outcome.logPath));

      if (outcome.log.status === "failed") {
        const dump = log.failureDump();
        if (dump) console.error(paint("dim", `Trace: ${dump}`));
        process.exit(1);
      }
    } catch (error) {
      log.error({ scope: "rebuild", op: "fail", msg: errorMessage(error) });
      printError(errorMessage(error));
      process.exit(1);
    }
  });
