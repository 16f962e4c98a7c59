export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  ts: number;
  traceId: string;
  level: LogLevel;

  // Core dimensions
  cmd: string;
  scope: string;
  op: string;
  phase?: string;
  item?: string;

  // Operation context
  method?: string;
  path?: string;
  progress?: string;

  // Payload
  msg: string;
  dur?: number;
  error?: string;
  data?: Record<string, unknown>;
}

export type LogEntryInput = Omit<LogEntry, "ts"> & { ts?: number };

export function createLogEntry(input: LogEntryInput): LogEntry {
  return {
    ...input,
    ts: input.ts ?? Date.now(),
  };
}
