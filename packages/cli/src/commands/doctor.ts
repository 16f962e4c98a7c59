/**
 * Doctor Command
 *
 * Checks that this host can run a rebuild and that the last rebuild left a
 * working stack behind.
 */

import { Command } from "commander";
import { errorMessage } from "@mcpstack/core";
import type { LoadedStackConfig } from "../core/stack-config.js";
import { printError } from "./ansi.js";
import { type StackCommandOptions, addPathOptions, loadFromOptions } from "./options.js";
import { startTrace } from "./trace-context.js";
import {
  type DoctorOptions,
  type DoctorResult,
  formatDoctorJson,
  formatDoctorOutput,
  runAllChecks,
} from "./health-checks/index.js";

export async function runDoctor(
  options: StackCommandOptions,
  deps: Pick<DoctorOptions, "host" | "readVersion"> = {}
): Promise<DoctorResult> {
  let loaded: LoadedStackConfig | null = null;
  let configError: string | undefined;
  try {
    loaded = await loadFromOptions(options);
  } catch (error) {
    configError = errorMessage(error);
  }

  return runAllChecks({
    config: loaded?.config ?? null,
    configSource: loaded?.source,
    configError,
    ...deps,
  });
}

export const doctorCommand = addPathOptions(
  new Command("doctor").description("Check host health and the state of the rebuilt stack")
)
  .option("-j, --json", "Output as JSON")
  .action(async (options: StackCommandOptions) => {
    const log = startTrace("doctor");
    try {
      const result = await runDoctor(options);

      for (const check of result.checks) {
        if (check.status !== "pass") {
          log.warn({ scope: "doctor", op: "check", item: check.name, msg: check.message, error: check.status });
        }
      }
      log.info({ scope: "doctor", op: "done", msg: `${result.summary.failed} failed, ${result.summary.warnings} warning(s)` });

      console.log(options.json ? formatDoctorJson(result) : formatDoctorOutput(result));

      if (!result.success) {
        process.exit(1);
      }
    } catch (error) {
      log.error({ scope: "doctor", op: "fail", msg: errorMessage(error) });
      printError(errorMessage(error));
      process.exit(1);
    }
  });
