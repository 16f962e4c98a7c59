/**
 * Shared fixtures: real npm-style tarballs and tiny stdio MCP servers.
 */
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import * as tar from "tar";

/** Answers initialize and tools/list, exits when stdin closes */
export const RESPONSIVE_SERVER = `
let buffer = "";
function reply(id, result) {
  process.stdout.write(JSON.stringify({ jsonrpc: "2.0", id, result }) + "\\n");
}
process.stdin.setEncoding("utf8");
process.stdin.on("data", (chunk) => {
  buffer += chunk;
  let newline = buffer.indexOf("\\n");
  while (newline >= 0) {
    const line = buffer.slice(0, newline).trim();
    buffer = buffer.slice(newline + 1);
    newline = buffer.indexOf("\\n");
    if (!line) continue;
    const msg = JSON.parse(line);
    if (msg.method === "initialize") {
      reply(msg.id, { protocolVersion: msg.params.protocolVersion, capabilities: { tools: {} }, serverInfo: { name: "fixture", version: "1.0.0" } });
    } else if (msg.method === "tools/list") {
      reply(msg.id, { tools: [{ name: "echo", inputSchema: { type: "object" } }, { name: "read", inputSchema: { type: "object" } }] });
    }
  }
});
process.stdin.on("end", () => process.exit(0));
`;

/** Reads stdin forever and never writes */
export const SILENT_SERVER = `
process.stdin.resume();
setInterval(() => {}, 1000);
`;

/** Starts a child that inherits stdout and stderr, then idles */
export const FORKING_SERVER = `
const { spawn } = require("node:child_process");
spawn(process.execPath, ["-e", "setTimeout(() => {}, 8000)"], { stdio: ["ignore", "inherit", "inherit"] });
process.stdin.resume();
setInterval(() => {}, 1000);
`;

/** Starts the same child, writes one line and exits without waiting for it */
export const ORPHANING_SERVER = `
const { spawn } = require("node:child_process");
spawn(process.execPath, ["-e", "setTimeout(() => {}, 8000)"], { stdio: ["ignore", "inherit", "inherit"] }).unref();
process.stdout.write("ready\\n", () => process.exit(0));
`;

export interface ArchiveOptions {
  /** package.json contents */
  manifest: Record<string, unknown>;
  /** Files relative to the package root */
  files?: Record<string, string>;
  /** Top-level directory inside the tarball */
  topDir?: string;
}

/**
 * Write an npm-pack-shaped .tgz (everything under "package/") and return its path.
 */
export async function writePackageArchive(archivePath: string, opts: ArchiveOptions): Promise<string> {
  const stage = await fs.mkdtemp(path.join(os.tmpdir(), "mcpstack-stage-"));
  const topDir = opts.topDir ?? "package";
  try {
    const pkgDir = path.join(stage, topDir);
    await fs.mkdir(pkgDir, { recursive: true });
    await fs.writeFile(path.join(pkgDir, "package.json"), JSON.stringify(opts.manifest, null, 2));
    for (const [rel, content] of Object.entries(opts.files ?? {})) {
      const target = path.join(pkgDir, rel);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content);
    }
    await fs.mkdir(path.dirname(archivePath), { recursive: true });
    await tar.c({ gzip: true, file: archivePath, cwd: stage }, [topDir]);
  } finally {
    await fs.rm(stage, { recursive: true, force: true });
  }
  return archivePath;
}

/**
 * Archive for a server package whose bin runs the given script.
 */
export function writeServerArchive(archivePath: string, name: string, version: string, script: string): Promise<string> {
  const binName = name.slice(name.lastIndexOf("/") + 1);
  return writePackageArchive(archivePath, {
    manifest: { name, version, bin: { [binName]: "dist/index.js" } },
    files: { "dist/index.js": `#!/usr/bin/env node\n${script}` },
  });
}

export async function listTree(root: string, rel = ""): Promise<string[]> {
  const out: string[] = [];
  const entries = await fs.readdir(path.join(root, rel), { withFileTypes: true });
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const child = rel ? `${rel}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      out.push(`${child}/`);
      out.push(...(await listTree(root, child)));
    } else {
      out.push(child);
    }
  }
  return out;
}

/**
 * Paths stored in an archive, in archive order.
 */
export async function listArchive(file: string): Promise<string[]> {
  const paths: string[] = [];
  await tar.t({ file, onReadEntry: (entry) => { paths.push(entry.path); } });
  return paths;
}
