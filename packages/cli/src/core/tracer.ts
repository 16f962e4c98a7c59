/**
 * Run tracing
 *
 * Every command run gets one trace id. Entries land in the SQLite store;
 * the first error also dumps the run so far as JSONL, and every later entry
 * of that run is appended to the same file. Once a command knows its stack
 * root the dump goes to `<root>/logs/` (beside the rebuild logs), otherwise
 * to the fallback directory under ~/.mcpstack.
 */
import { randomBytes } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { createLogEntry, type LogEntry, type LogEntryInput, type LogLevel } from "@mcpstack/core";
import { TraceStore, type TraceQueryOptions } from "./trace-store.js";

export interface TracerOptions {
  /** Where failure dumps go while no stack root is attached */
  fallbackDir?: string;
  maxRows?: number;
}

export interface TraceOptions {
  /** Record debug entries */
  debug?: boolean;
}

export type TraceFields = Omit<LogEntryInput, "traceId" | "level" | "cmd">;

export interface TraceLogger {
  debug: (fields: TraceFields) => void;
  info: (fields: TraceFields) => void;
  warn: (fields: TraceFields) => void;
  error: (fields: TraceFields) => void;
  /** Send failure dumps to `<root>/logs/` from now on, when that directory exists */
  attachRoot: (root: string) => void;
  /** Failure dump written for this run, if any */
  failureDump: () => string | null;
  traceId: string;
}

export class Tracer {
  private store: TraceStore;
  private fallbackDir?: string;

  constructor(dbPath: string, opts: TracerOptions = {}) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.store = new TraceStore(dbPath, { maxRows: opts.maxRows });
    this.fallbackDir = opts.fallbackDir;
  }

  createTrace(cmd: string, opts: TraceOptions = {}): TraceLogger {
    const traceId = `${cmd}-${randomBytes(4).toString("hex")}`;
    let root: string | null = null;
    let dump: string | null = null;

    const log = (level: LogLevel, fields: TraceFields) => {
      if (level === "debug" && !opts.debug) return;
      const entry = createLogEntry({ ...fields, traceId, level, cmd });
      this.store.insert(entry);

      if (dump) {
        fs.appendFileSync(dump, JSON.stringify(entry) + "\n");
      } else if (level === "error") {
        dump = this.writeDump(traceId, root);
      }
    };

    return {
      debug: (f) => log("debug", f),
      info: (f) => log("info", f),
      warn: (f) => log("warn", f),
      error: (f) => log("error", f),
      attachRoot: (dir) => { root = dir; },
      failureDump: () => dump,
      traceId,
    };
  }

  private dumpDir(root: string | null): string | null {
    if (root) {
      const logs = path.join(root, "logs");
      // Never create the stack root just to hold a dump
      if (fs.existsSync(logs)) return logs;
    }
    if (!this.fallbackDir) return null;
    fs.mkdirSync(this.fallbackDir, { recursive: true });
    return this.fallbackDir;
  }

  private writeDump(traceId: string, root: string | null): string | null {
    const dir = this.dumpDir(root);
    if (!dir) return null;
    const entries = this.store.query({ traceId, limit: 1000 }).reverse();
    const file = path.join(dir, `trace-${traceId}.jsonl`);
    fs.writeFileSync(file, entries.map((e) => JSON.stringify(e)).join("\n") + "\n");
    return file;
  }

  query(opts: TraceQueryOptions): LogEntry[] {
    return this.store.query(opts);
  }

  exportJsonl(opts: TraceQueryOptions): string {
    return this.store.exportJsonl(opts);
  }

  vacuum(): void {
    this.store.vacuum();
  }

  close(): void {
    this.store.close();
  }
}
