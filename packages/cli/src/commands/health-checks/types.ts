import type { StackConfig } from "@mcpstack/core";
import type { HostInfo } from "../../core/preflight.js";

export interface DiagnosticResult {
  name: string;
  status: "pass" | "fail" | "warn";
  message: string;
  fix?: string;
}

export interface DoctorResult {
  success: boolean;
  checks: DiagnosticResult[];
  summary: {
    passed: number;
    failed: number;
    warnings: number;
  };
}

/** Returns the `<command> --version` output, rejecting when the command cannot run */
export type VersionReader = (command: string) => Promise<string>;

export interface DoctorOptions {
  /** Null when the stack config itself failed to load */
  config: StackConfig | null;
  /** Load failure message, reported as the first check */
  configError?: string;
  configSource?: string | null;
  host?: HostInfo;
  readVersion?: VersionReader;
}
