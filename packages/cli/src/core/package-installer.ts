/**
 * Offline Package Installer
 *
 * Installs each resolved archive into an isolated prefix with an isolated
 * npm cache, resolves the installed package's entry point and writes a
 * stable wrapper script the desktop config can point at.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import * as tar from "tar";
import {
  type InstallerKind,
  type InstalledPackage,
  type PackageManifest,
  type ResolvedPackage,
  StackError,
  errorMessage,
  packageManifestSchema,
  pathExists,
  resolveEntryPoint,
  toPosixPath,
} from "@mcpstack/core";
import type { TraceLogger } from "./tracer.js";
import { mkdirp, writeFileAtomic } from "./fs-helpers.js";

const execFileAsync = promisify(execFile);

const NPM_INSTALL_TIMEOUT_MS = 5 * 60_000;

// ============================================================================
// Types
// ============================================================================

export interface InstallContext {
  /** Isolated install prefix; packages land in <prefix>/node_modules */
  prefix: string;
  /** Isolated npm cache */
  cacheDir: string;
  /** Directory receiving one wrapper script per package */
  binDir: string;
  log?: TraceLogger;
}

export interface PackageInstaller {
  readonly kind: InstallerKind;
  /** Install the archive and return the directory holding the installed package */
  install(archive: string, packageName: string, ctx: InstallContext): Promise<string>;
}

// ============================================================================
// Manifests
// ============================================================================

function parseManifest(raw: string, source: string): PackageManifest {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new StackError("INSTALL_FAILED", `Invalid package.json in ${source}: ${errorMessage(err)}`);
  }
  const parsed = packageManifestSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new StackError("INSTALL_FAILED", `Unexpected package.json in ${source}: ${issues}`);
  }
  return parsed.data;
}

function isTopLevelManifest(entryPath: string): boolean {
  const parts = entryPath.replace(/^\.\//, "").split("/");
  return parts.length === 2 && parts[1] === "package.json";
}

/**
 * Read package.json straight out of an npm tarball, without extracting it.
 */
export async function readArchiveManifest(archive: string): Promise<PackageManifest> {
  const chunks: Buffer[] = [];
  let found = false;

  try {
    await tar.t({
      file: archive,
      strict: true,
      onReadEntry: (entry) => {
        if (!found && isTopLevelManifest(entry.path)) {
          found = true;
          entry.on("data", (chunk: Buffer) => chunks.push(chunk));
        }
      },
    });
  } catch (err) {
    throw new StackError("INSTALL_FAILED", `Cannot read archive ${archive}: ${errorMessage(err)}`);
  }

  if (!found) {
    throw new StackError("INSTALL_FAILED", `Archive ${archive} has no top-level package.json`);
  }
  return parseManifest(Buffer.concat(chunks).toString("utf-8"), archive);
}

export async function readInstalledManifest(installDir: string): Promise<PackageManifest> {
  const manifestPath = path.join(installDir, "package.json");
  let raw: string;
  try {
    raw = await fs.readFile(manifestPath, "utf-8");
  } catch (err) {
    throw new StackError("INSTALL_FAILED", `Installed package has no readable manifest at ${manifestPath}: ${errorMessage(err)}`);
  }
  return parseManifest(raw, manifestPath);
}

// ============================================================================
// Installers
// ============================================================================

function installDirFor(prefix: string, packageName: string): string {
  return path.join(prefix, "node_modules", ...packageName.split("/"));
}

/**
 * `npm install --offline` into the isolated prefix. User and global npmrc
 * files are pointed away so no shared npm state is read.
 */
export class NpmInstaller implements PackageInstaller {
  readonly kind = "npm" as const;

  constructor(private readonly npmCommand: string = process.platform === "win32" ? "npm.cmd" : "npm") {}

  async install(archive: string, packageName: string, ctx: InstallContext): Promise<string> {
    const isolatedRc = path.join(ctx.prefix, ".npmrc-isolated");
    const args = [
      "install",
      "--offline",
      "--no-audit",
      "--no-fund",
      "--ignore-scripts",
      "--prefix", ctx.prefix,
      "--cache", ctx.cacheDir,
      archive,
    ];
    const useShell = this.npmCommand.endsWith(".cmd");

    ctx.log?.debug({ scope: "install", op: "npm", phase: "install", item: packageName, method: "npm", msg: `${this.npmCommand} ${args.join(" ")}` });

    try {
      await execFileAsync(this.npmCommand, useShell ? args.map((a) => `"${a}"`) : args, {
        timeout: NPM_INSTALL_TIMEOUT_MS,
        shell: useShell,
        env: {
          ...process.env,
          npm_config_offline: "true",
          npm_config_cache: ctx.cacheDir,
          npm_config_prefix: ctx.prefix,
          npm_config_userconfig: isolatedRc,
          npm_config_globalconfig: isolatedRc,
          npm_config_update_notifier: "false",
        },
      });
    } catch (err) {
      const stderr = typeof err === "object" && err !== null && "stderr" in err ? String(err.stderr).trim() : "";
      throw new StackError(
        "INSTALL_FAILED",
        `npm could not install ${archive} offline: ${stderr || errorMessage(err)}`
      );
    }

    const installDir = installDirFor(ctx.prefix, packageName);
    if (!(await pathExists(installDir))) {
      throw new StackError("INSTALL_FAILED", `npm finished but ${installDir} does not exist`);
    }
    return installDir;
  }
}

/**
 * Unpack the tarball directly into <prefix>/node_modules/<name>. For
 * self-contained archives that bundle their dependencies.
 */
export class ExtractInstaller implements PackageInstaller {
  readonly kind = "extract" as const;

  async install(archive: string, packageName: string, ctx: InstallContext): Promise<string> {
    const installDir = installDirFor(ctx.prefix, packageName);
    await mkdirp(installDir);

    ctx.log?.debug({ scope: "install", op: "extract", phase: "install", item: packageName, method: "extract", path: installDir, msg: "Extracting archive" });

    try {
      await tar.x({ file: archive, cwd: installDir, strip: 1, strict: true });
    } catch (err) {
      throw new StackError("INSTALL_FAILED", `Cannot extract ${archive} into ${installDir}: ${errorMessage(err)}`);
    }
    return installDir;
  }
}

export function createInstaller(kind: InstallerKind): PackageInstaller {
  switch (kind) {
    case "npm":
      return new NpmInstaller();
    case "extract":
      return new ExtractInstaller();
  }
}

// ============================================================================
// Wrappers
// ============================================================================

/**
 * Wrapper source: resolves its own directory at run time and imports the
 * real entry point through a path relative to itself.
 */
export function renderWrapper(relativeEntry: string, label: string): string {
  return [
    "#!/usr/bin/env node",
    `// Generated by mcpstack for ${label}. Re-run \`mcpstack rebuild\` to regenerate.`,
    'import { dirname, resolve } from "node:path";',
    'import { fileURLToPath, pathToFileURL } from "node:url";',
    "",
    "const here = dirname(fileURLToPath(import.meta.url));",
    `await import(pathToFileURL(resolve(here, ${JSON.stringify(relativeEntry)})).href);`,
    "",
  ].join("\n");
}

function relativeFrom(fromDir: string, target: string): string {
  const rel = toPosixPath(path.relative(fromDir, target));
  return rel.startsWith(".") ? rel : `./${rel}`;
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

// ============================================================================
// Public API
// ============================================================================

export async function installPackage(
  resolved: ResolvedPackage,
  installer: PackageInstaller,
  ctx: InstallContext,
): Promise<InstalledPackage> {
  const { spec, archive } = resolved;
  const started = Date.now();

  const archiveManifest = await readArchiveManifest(archive);
  const installDir = await installer.install(archive, archiveManifest.name, ctx);
  const manifest = await readInstalledManifest(installDir);

  const entry = resolveEntryPoint(manifest);
  if (!entry) {
    ctx.log?.error({ scope: "install", op: "entry", phase: "install", item: spec.name, path: installDir, msg: "No entry point", error: "ENTRY_POINT_UNRESOLVED" });
    throw new StackError(
      "ENTRY_POINT_UNRESOLVED",
      `Package "${manifest.name}" (${spec.name}): expected a "bin", "main" or "exports" entry in ${path.join(installDir, "package.json")}, found none`
    );
  }

  const entryPoint = path.join(installDir, ...entry.path.split("/"));
  if (!(await isFile(entryPoint))) {
    ctx.log?.error({ scope: "install", op: "entry", phase: "install", item: spec.name, path: entryPoint, msg: "Entry point missing on disk", error: "ENTRY_POINT_UNRESOLVED" });
    throw new StackError(
      "ENTRY_POINT_UNRESOLVED",
      `Package "${manifest.name}" (${spec.name}): "${entry.source}" points at ${entry.path}, but ${entryPoint} does not exist`
    );
  }

  await mkdirp(ctx.binDir);
  const wrapperPath = path.join(ctx.binDir, `${spec.name}.mjs`);
  const label = manifest.version ? `${manifest.name}@${manifest.version}` : manifest.name;
  await writeFileAtomic(wrapperPath, renderWrapper(relativeFrom(ctx.binDir, entryPoint), label));
  if (process.platform !== "win32") {
    await fs.chmod(wrapperPath, 0o755);
  }

  ctx.log?.info({
    scope: "install",
    op: "wrapper",
    phase: "install",
    item: spec.name,
    method: installer.kind,
    path: wrapperPath,
    dur: Date.now() - started,
    msg: `Installed ${label} (entry from ${entry.source})`,
  });

  return {
    name: spec.name,
    packageName: manifest.name,
    version: manifest.version ?? "0.0.0",
    archive,
    installDir,
    entryPoint,
    wrapperPath,
  };
}

export async function installPackages(
  resolved: ResolvedPackage[],
  installer: PackageInstaller,
  ctx: InstallContext,
): Promise<InstalledPackage[]> {
  const installed: InstalledPackage[] = [];
  for (const [i, pkg] of resolved.entries()) {
    ctx.log?.debug({ scope: "install", op: "start", phase: "install", item: pkg.spec.name, progress: `${i + 1}/${resolved.length}`, msg: `Installing ${path.basename(pkg.archive)}` });
    installed.push(await installPackage(pkg, installer, ctx));
  }
  return installed;
}
