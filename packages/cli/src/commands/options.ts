/**
 * Path and behaviour flags shared by rebuild, validate and doctor.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import type { InstallerKind, ServerMode } from "@mcpstack/core";
import { type LoadedStackConfig, type StackConfigOverrides, loadStackConfig } from "../core/stack-config.js";

export interface StackCommandOptions {
  config?: string;
  root?: string;
  packagesDir?: string;
  desktopConfig?: string;
  target?: string;
  installer?: InstallerKind;
  mode?: ServerMode;
  timeout?: number;
  json?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`expected a positive integer, found "${value}"`);
  }
  return parsed;
}

function isInstallerKind(value: string): value is InstallerKind {
  return value === "npm" || value === "extract";
}

function isServerMode(value: string): value is ServerMode {
  return value === "merge" || value === "replace";
}

function parseInstaller(value: string): InstallerKind {
  if (!isInstallerKind(value)) throw new InvalidArgumentError(`expected npm or extract, found "${value}"`);
  return value;
}

function parseMode(value: string): ServerMode {
  if (!isServerMode(value)) throw new InvalidArgumentError(`expected merge or replace, found "${value}"`);
  return value;
}

export function addPathOptions(command: Command): Command {
  return command
    .option("-c, --config <file>", "Stack config file (default: ~/.mcpstack/stack.yaml)")
    .option("--root <dir>", "Stack root directory")
    .option("--packages-dir <dir>", "Directory holding the offline package archives")
    .option("--desktop-config <file>", "Desktop client config file to merge into")
    .option("-t, --target <id>", "Client whose config is merged (claude-desktop, claude-code)");
}

export function addRebuildOptions(command: Command): Command {
  return command
    .addOption(new Option("--installer <kind>", "Package installer").argParser(parseInstaller))
    .addOption(new Option("--mode <mode>", "How managed servers replace existing entries").argParser(parseMode))
    .option("--timeout <ms>", "Per-server handshake timeout", parsePositiveInt);
}

export function toOverrides(options: StackCommandOptions): StackConfigOverrides {
  return {
    root: options.root,
    packagesDir: options.packagesDir,
    desktopConfig: options.desktopConfig,
    target: options.target,
    installer: options.installer,
    serverMode: options.mode,
    timeoutMs: options.timeout,
  };
}

export function loadFromOptions(options: StackCommandOptions): Promise<LoadedStackConfig> {
  return loadStackConfig(options.config, toOverrides(options));
}
