import Database from "better-sqlite3";
import type { LogEntry, LogLevel } from "@mcpstack/core";

export interface TraceQueryOptions {
  traceId?: string;
  level?: string;
  cmd?: string;
  scope?: string;
  op?: string;
  phase?: string;
  item?: string;
  since?: number;
  limit?: number;
}

export interface TraceStoreOptions {
  maxRows?: number;
}

interface EventRow {
  ts: number;
  trace_id: string;
  level: LogLevel;
  cmd: string;
  scope: string;
  op: string;
  phase: string | null;
  item: string | null;
  method: string | null;
  path: string | null;
  progress: string | null;
  msg: string;
  dur: number | null;
  error: string | null;
  data: string | null;
}

const COLUMNS = [
  "ts", "trace_id", "level", "cmd", "scope", "op", "phase", "item",
  "method", "path", "progress", "msg", "dur", "error", "data",
] as const;

function optional<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}

function parseData(raw: string | null): Record<string, unknown> | undefined {
  if (raw === null) return undefined;
  const parsed: unknown = JSON.parse(raw);
  return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : undefined;
}

export class TraceStore {
  private db: Database.Database;
  private maxRows: number;
  private insertStmt: Database.Statement;

  constructor(dbPath: string, opts?: TraceStoreOptions) {
    this.maxRows = opts?.maxRows ?? 50_000;
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.init();
    this.insertStmt = this.db.prepare(`
      INSERT INTO events (${COLUMNS.join(", ")})
      VALUES (${COLUMNS.map(() => "?").join(", ")})
    `);
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts INTEGER NOT NULL,
        trace_id TEXT NOT NULL,
        level TEXT NOT NULL,
        cmd TEXT,
        scope TEXT,
        op TEXT,
        phase TEXT,
        item TEXT,
        method TEXT,
        path TEXT,
        progress TEXT,
        msg TEXT NOT NULL,
        dur INTEGER,
        error TEXT,
        data TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_trace ON events(trace_id);
      CREATE INDEX IF NOT EXISTS idx_level ON events(level);
      CREATE INDEX IF NOT EXISTS idx_cmd ON events(cmd);
      CREATE INDEX IF NOT EXISTS idx_phase ON events(phase);
      CREATE INDEX IF NOT EXISTS idx_item ON events(item);
      CREATE INDEX IF NOT EXISTS idx_ts ON events(ts);
    `);
  }

  insert(entry: LogEntry): void {
    this.insertStmt.run(
      entry.ts,
      entry.traceId,
      entry.level,
      entry.cmd,
      entry.scope,
      entry.op,
      entry.phase ?? null,
      entry.item ?? null,
      entry.method ?? null,
      entry.path ?? null,
      entry.progress ?? null,
      entry.msg,
      entry.dur ?? null,
      entry.error ?? null,
      entry.data ? JSON.stringify(entry.data) : null,
    );
  }

  query(opts: TraceQueryOptions): LogEntry[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    const addFilter = (col: string, val: string | undefined) => {
      if (val !== undefined) {
        conditions.push(`${col} = ?`);
        params.push(val);
      }
    };

    addFilter("trace_id", opts.traceId);
    addFilter("level", opts.level);
    addFilter("cmd", opts.cmd);
    addFilter("scope", opts.scope);
    addFilter("op", opts.op);
    addFilter("phase", opts.phase);
    addFilter("item", opts.item);

    if (opts.since !== undefined) {
      conditions.push("ts >= ?");
      params.push(opts.since);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    params.push(opts.limit ?? 500);

    const rows = this.db
      .prepare<(string | number)[], EventRow>(`SELECT * FROM events ${where} ORDER BY ts DESC, id DESC LIMIT ?`)
      .all(...params);

    return rows.map((row) => ({
      ts: row.ts,
      traceId: row.trace_id,
      level: row.level,
      cmd: row.cmd,
      scope: row.scope,
      op: row.op,
      phase: optional(row.phase),
      item: optional(row.item),
      method: optional(row.method),
      path: optional(row.path),
      progress: optional(row.progress),
      msg: row.msg,
      dur: optional(row.dur),
      error: optional(row.error),
      data: parseData(row.data),
    }));
  }

  exportJsonl(opts: TraceQueryOptions): string {
    const entries = this.query(opts);
    return entries.map((e) => JSON.stringify(e)).join("\n");
  }

  vacuum(): void {
    const count = this.db.prepare<[], { c: number }>("SELECT COUNT(*) as c FROM events").get()?.c ?? 0;
    if (count > this.maxRows) {
      const deleteCount = count - this.maxRows;
      this.db.prepare("DELETE FROM events WHERE id IN (SELECT id FROM events ORDER BY ts ASC, id ASC LIMIT ?)").run(deleteCount);
    }
  }

  close(): void {
    this.db.close();
  }
}
