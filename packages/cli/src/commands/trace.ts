/**
 * Trace Command
 *
 * Prints entries from the trace store, newest first, as JSONL (default) or
 * as a table.
 */

import { Command, InvalidArgumentError } from "commander";
import { type LogEntry, errorMessage } from "@mcpstack/core";
import type { TraceQueryOptions } from "../core/trace-store.js";
import { getTracer } from "./trace-context.js";
import { printError } from "./ansi.js";
import { parsePositiveInt } from "./options.js";

const UNIT_MS: Record<string, number> = { m: 60_000, h: 3_600_000, d: 86_400_000 };

/**
 * "30m", "1h" and "7d" are relative to `now`; anything else must be a date.
 */
export function parseSince(since: string, now: number = Date.now()): number {
  const match = since.match(/^(\d+)([mhd])$/);
  if (match) {
    return now - Number.parseInt(match[1], 10) * UNIT_MS[match[2]];
  }
  const ts = new Date(since).getTime();
  if (Number.isNaN(ts)) {
    throw new InvalidArgumentError(`expected 30m, 1h, 7d or an ISO date, found "${since}"`);
  }
  return ts;
}

export function formatTraceTable(entries: LogEntry[]): string {
  const lines = [
    `${"TIME".padEnd(24)} ${"LEVEL".padEnd(6)} ${"CMD".padEnd(9)} ${"SCOPE".padEnd(11)} ${"PHASE".padEnd(12)} ${"ITEM".padEnd(14)} MSG`,
    "─".repeat(100),
  ];
  for (const e of entries) {
    const time = new Date(e.ts).toISOString().slice(0, 23);
    lines.push(
      `${time.padEnd(24)} ${e.level.padEnd(6)} ${e.cmd.padEnd(9)} ${e.scope.padEnd(11)} ${(e.phase ?? "-").padEnd(12)} ${(e.item ?? "-").padEnd(14)} ${e.msg}`
    );
  }
  return lines.join("\n");
}

interface TraceCommandOptions {
  run?: string;
  cmd?: string;
  scope?: string;
  phase?: string;
  item?: string;
  level?: string;
  since?: number;
  limit: number;
  table?: boolean;
}

export const traceCommand = new Command("trace")
  .description("Print recorded trace entries")
  .option("--run <traceId>", "Only entries of one run, e.g. rebuild-1a2b3c4d")
  .option("--cmd <cmd>", "Filter by command (rebuild, validate, doctor)")
  .option("--scope <scope>", "Filter by scope")
  .option("--phase <phase>", "Filter by rebuild phase")
  .option("--item <item>", "Filter by item name")
  .option("--level <level>", "Filter by log level (debug, info, warn, error)")
  .option("--since <time>", "Time filter: 30m, 1h, 7d or an ISO date", (value) => parseSince(value))
  .option("--limit <n>", "Max entries to return", parsePositiveInt, 100)
  .option("--table", "Print a table instead of JSONL")
  .action((opts: TraceCommandOptions) => {
    try {
      const query: TraceQueryOptions = {
        traceId: opts.run,
        cmd: opts.cmd,
        scope: opts.scope,
        phase: opts.phase,
        item: opts.item,
        level: opts.level,
        since: opts.since,
        limit: opts.limit,
      };
      const tracer = getTracer();

      if (opts.table) {
        console.log(formatTraceTable(tracer.query(query)));
        return;
      }
      const jsonl = tracer.exportJsonl(query);
      if (jsonl) console.log(jsonl);
    } catch (error) {
      printError(errorMessage(error));
      process.exit(1);
    }
  });
