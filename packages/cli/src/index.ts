#!/usr/bin/env node
/**
 * mcpstack CLI - offline rebuild of a local MCP server stack
 *
 * Backs up and quarantines the previous stack, installs servers from local
 * package archives, merges them into the desktop client's config and checks
 * that each one answers the MCP handshake.
 */

import { Command } from "commander";
import { VERSION } from "./version.js";
import { rebuildCommand } from "./commands/rebuild.js";
import { validateCommand } from "./commands/validate.js";
import { doctorCommand } from "./commands/doctor.js";
import { traceCommand } from "./commands/trace.js";

const program = new Command();

program
  .name("mcpstack")
  .description("Deterministic offline rebuild of a local MCP server stack for desktop AI clients")
  .version(VERSION);

program.addCommand(rebuildCommand);
program.addCommand(validateCommand);
program.addCommand(doctorCommand);
program.addCommand(traceCommand);

await program.parseAsync();
