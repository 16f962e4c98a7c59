/**
 * Stack Config Loader
 *
 * Reads stack.yaml (explicit --config path, else ~/.mcpstack/stack.yaml,
 * else built-in defaults), validates it, applies CLI overrides and
 * expands every path to an absolute one.
 */

import * as path from "node:path";
import YAML from "yaml";
import {
  type ClientTarget,
  type InstallerKind,
  type ServerMode,
  type StackConfig,
  StackError,
  errorMessage,
  expandPath,
  getTarget,
  resolveEnvVars,
  resolvePath,
  stackConfigSchema,
} from "@mcpstack/core";
import { STACK_HOME, readFileIfExists } from "./fs-helpers.js";

export const DEFAULT_STACK_CONFIG_PATH = path.join(STACK_HOME, "stack.yaml");

export interface StackConfigOverrides {
  root?: string;
  packagesDir?: string;
  desktopConfig?: string;
  target?: string;
  installer?: InstallerKind;
  serverMode?: ServerMode;
  timeoutMs?: number;
}

export interface LoadedStackConfig {
  config: StackConfig;
  /** File the config came from, null when only defaults were used */
  source: string | null;
}

function absolute(p: string): string {
  return path.resolve(expandPath(p));
}

function assertInsideRoot(entries: string[], field: string): void {
  for (const entry of entries) {
    const normalized = path.normalize(entry);
    if (path.isAbsolute(normalized) || normalized === ".." || normalized.startsWith(`..${path.sep}`)) {
      throw new StackError(
        "CONFIG_INVALID",
        `${field} entries must be relative paths inside the stack root, found "${entry}"`
      );
    }
  }
}

function resolveTarget(id: string): ClientTarget {
  try {
    return getTarget(id);
  } catch (err) {
    throw new StackError("CONFIG_INVALID", errorMessage(err));
  }
}

function parseYaml(content: string, source: string): unknown {
  try {
    return YAML.parse(content) ?? {};
  } catch (err) {
    throw new StackError("CONFIG_INVALID", `Invalid YAML in ${source}: ${errorMessage(err)}`);
  }
}

export async function loadStackConfig(
  configPath?: string,
  overrides: StackConfigOverrides = {}
): Promise<LoadedStackConfig> {
  const candidate = configPath ? absolute(configPath) : DEFAULT_STACK_CONFIG_PATH;
  const content = await readFileIfExists(candidate);

  if (content === null && configPath) {
    throw new StackError("CONFIG_INVALID", `Stack config not found: expected a file at ${candidate}`);
  }

  const raw = content === null ? {} : parseYaml(content, candidate);
  const parsed = stackConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StackError("CONFIG_INVALID", `Invalid stack config ${content === null ? "defaults" : candidate}: ${issues}`);
  }

  const file = parsed.data;
  const targetId = overrides.target ?? file.target;
  const target = resolveTarget(targetId);

  assertInsideRoot(file.directories, "directories");
  assertInsideRoot(file.quarantine, "quarantine");

  const root = absolute(overrides.root ?? file.root);
  const desktopConfigSetting = overrides.desktopConfig ?? file.desktopConfig;
  const vars = { ...process.env, STACK_ROOT: root };

  const config: StackConfig = {
    root,
    packagesDir: absolute(overrides.packagesDir ?? file.packagesDir),
    target: target.id,
    desktopConfig: desktopConfigSetting ? absolute(desktopConfigSetting) : resolvePath(target.configPath),
    serversKey: file.serversKey ?? target.serversKey,
    serverMode: overrides.serverMode ?? file.serverMode,
    installer: overrides.installer ?? file.installer,
    directories: file.directories,
    quarantine: file.quarantine,
    validation: {
      timeoutMs: overrides.timeoutMs ?? file.validation.timeoutMs,
    },
    packages: file.packages.map((spec) => ({
      ...spec,
      args: spec.args.map((arg) => expandPath(resolveEnvVars(arg, vars))),
    })),
  };

  return { config, source: content === null ? null : candidate };
}
