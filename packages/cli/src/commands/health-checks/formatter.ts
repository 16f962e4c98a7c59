/**
 * Formatting functions for doctor output.
 */

import { type AnsiColor, ICONS, paint } from "../ansi.js";
import type { DiagnosticResult, DoctorResult } from "./types.js";

const STATUS_COLOR: Record<DiagnosticResult["status"], AnsiColor> = {
  pass: "green",
  fail: "red",
  warn: "yellow",
};

/**
 * Format doctor output for terminal display
 */
export function formatDoctorOutput(result: DoctorResult): string {
  const lines: string[] = [];

  lines.push("mcpstack doctor");
  lines.push("===============");
  lines.push("");

  for (const check of result.checks) {
    const color = STATUS_COLOR[check.status];
    lines.push(`${paint(color, ICONS[check.status])} ${check.name}`);
    lines.push(`    ${check.message}`);
    if (check.fix && check.status !== "pass") {
      lines.push(`    ${paint(color, "Fix:")} ${check.fix}`);
    }
    lines.push("");
  }

  const { passed, failed, warnings } = result.summary;
  lines.push("Summary:");
  lines.push(`  ${passed} passed`);
  lines.push(failed > 0 ? `  ${paint("red", `${failed} failed`)}` : `  ${failed} failed`);
  const warningText = `${warnings} warning${warnings !== 1 ? "s" : ""}`;
  lines.push(warnings > 0 ? `  ${paint("yellow", warningText)}` : `  ${warningText}`);

  lines.push("");
  if (result.success) {
    lines.push(paint("green", `${ICONS.pass} Stack health check passed`));
  } else {
    lines.push(paint("red", `${ICONS.fail} Stack health check failed`));
    lines.push("");
    lines.push("Run suggested fixes above to resolve issues.");
  }

  return lines.join("\n");
}

export function formatDoctorJson(result: DoctorResult): string {
  return JSON.stringify(result, null, 2);
}
