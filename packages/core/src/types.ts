/**
 * Core types for the mcpstack rebuild procedure
 */

// ============================================================================
// Server Definitions
// ============================================================================

/**
 * One entry under the reserved servers key of a desktop client config.
 * All paths use forward slashes, whatever the host OS.
 */
export interface ServerDefinition {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

/**
 * Desktop client config as read from disk. Only the reserved key is ours;
 * every other key belongs to the caller.
 */
export type DesktopConfig = Record<string, unknown>;

export type ServerMode = "merge" | "replace";

// ============================================================================
// Packages
// ============================================================================

export interface PackageSpec {
  /** Managed server name, used as the key under the servers map */
  name: string;
  /** Filename glob matched against the offline packages directory */
  pattern: string;
  required: true;
  args: string[];
  env?: Record<string, string>;
}

export interface ResolvedPackage {
  spec: PackageSpec;
  archive: string;
}

export interface InstalledPackage {
  name: string;
  packageName: string;
  version: string;
  archive: string;
  installDir: string;
  entryPoint: string;
  wrapperPath: string;
}

/**
 * The subset of package.json that entry-point resolution looks at.
 */
export interface PackageManifest {
  name: string;
  version?: string;
  bin?: string | Record<string, string>;
  main?: string;
  exports?: unknown;
}

export type InstallerKind = "npm" | "extract";

// ============================================================================
// Validation
// ============================================================================

export interface BoundedRunResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;
  error?: string;
}

export interface ServerValidation {
  name: string;
  command: string;
  args: string[];
  passed: boolean;
  exitCode: number | null;
  timedOut: boolean;
  toolCount?: number;
  detail: string;
  durationMs: number;
}

// ============================================================================
// Stack Configuration
// ============================================================================

/**
 * Stack configuration after defaults, CLI overrides and path expansion.
 * Every path is absolute.
 */
export interface StackConfig {
  root: string;
  packagesDir: string;
  target: string;
  desktopConfig: string;
  serversKey: string;
  serverMode: ServerMode;
  installer: InstallerKind;
  directories: string[];
  quarantine: string[];
  validation: {
    timeoutMs: number;
  };
  packages: PackageSpec[];
}

// ============================================================================
// Rebuild Log
// ============================================================================

export type RunStatus = "success" | "failed";

export type RebuildPhase =
  | "preflight"
  | "backup"
  | "directories"
  | "install"
  | "merge"
  | "validate"
  | "snapshot";

export interface RebuildLog {
  runId: string;
  startedAt: string;
  finishedAt: string;
  status: RunStatus;
  platform: string;
  nodeVersion: string;
  paths: {
    root: string;
    packagesDir: string;
    desktopConfig: string;
    backupArchive?: string;
    quarantineBatch?: string;
    configBackup?: string;
    snapshotArchive?: string;
  };
  packages: InstalledPackage[];
  validation: ServerValidation[];
  warnings: string[];
  error?: {
    code: string;
    message: string;
    phase: RebuildPhase;
  };
}
