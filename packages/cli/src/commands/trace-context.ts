/**
 * One Tracer per CLI process, shared by every command
 *
 * The store lives at ~/.mcpstack/traces/trace.db. Failure dumps of runs
 * that never reached a stack root go to ~/.mcpstack/traces/failures/.
 */
import path from "node:path";
import { STACK_HOME } from "../core/fs-helpers.js";
import { Tracer, type TraceLogger } from "../core/tracer.js";

const TRACES_DIR = path.join(STACK_HOME, "traces");

let tracer: Tracer | null = null;

export function getTracer(): Tracer {
  if (!tracer) {
    tracer = new Tracer(path.join(TRACES_DIR, "trace.db"), { fallbackDir: path.join(TRACES_DIR, "failures") });
    process.on("exit", closeTracer);
  }
  return tracer;
}

/** Start the trace of one command run */
export function startTrace(cmd: string, opts: { debug?: boolean } = {}): TraceLogger {
  return getTracer().createTrace(cmd, { debug: opts.debug });
}

export function closeTracer(): void {
  if (tracer) {
    tracer.vacuum();
    tracer.close();
    tracer = null;
  }
}
