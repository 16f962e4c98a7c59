/**
 * Zod schemas for mcpstack configuration validation
 */

import { z } from "zod";

// ============================================================================
// Server Schemas
// ============================================================================

export const serverDefinitionSchema = z.object({
  command: z.string(),
  args: z.array(z.string()),
  env: z.record(z.string(), z.string()).optional(),
});

export const serverModeSchema = z.enum(["merge", "replace"]);

export const installerKindSchema = z.enum(["npm", "extract"]);

// ============================================================================
// Package Schemas
// ============================================================================

export const packageSpecSchema = z.object({
  name: z.string().regex(/^[a-zA-Z0-9._-]+$/, "server names may only contain letters, digits, '.', '_' and '-'"),
  pattern: z.string().min(1),
  required: z.literal(true).optional().default(true),
  args: z.array(z.string()).optional().default([]),
  env: z.record(z.string(), z.string()).optional(),
});

const packageExportsSchema: z.ZodType<unknown> = z.lazy(() =>
  z.union([
    z.string(),
    z.null(),
    z.array(packageExportsSchema),
    z.record(z.string(), packageExportsSchema),
  ])
);

/**
 * package.json fields used for entry-point resolution. Unknown fields pass through.
 */
export const packageManifestSchema = z
  .object({
    name: z.string(),
    version: z.string().optional(),
    bin: z.union([z.string(), z.record(z.string(), z.string())]).optional(),
    main: z.string().optional(),
    exports: packageExportsSchema.optional(),
  })
  .passthrough();

// ============================================================================
// Stack Config Schema
// ============================================================================

export const DEFAULT_DIRECTORIES = [
  "workspace",
  "repos",
  "packages",
  "plugins",
  "bin",
  "logs",
  "cache/npm",
  "backups",
  "quarantine",
];

export const DEFAULT_PACKAGES = [
  {
    name: "filesystem",
    pattern: "*server-filesystem-*.tgz",
    args: ["${STACK_ROOT}/workspace"],
  },
  {
    name: "memory",
    pattern: "*server-memory-*.tgz",
  },
];

export const stackConfigSchema = z.object({
  root: z.string().optional().default("~/ClaudeStack"),
  packagesDir: z.string().optional().default("~/ClaudeStack-offline"),
  target: z.string().optional().default("claude-desktop"),
  desktopConfig: z.string().nullable().optional().default(null),
  // Unset: the target's own key
  serversKey: z.string().min(1).optional(),
  serverMode: serverModeSchema.optional().default("merge"),
  installer: installerKindSchema.optional().default("npm"),
  directories: z.array(z.string().min(1)).optional().default(DEFAULT_DIRECTORIES),
  quarantine: z.array(z.string().min(1)).optional().default(["packages", "plugins"]),
  validation: z
    .object({
      timeoutMs: z.number().int().positive().optional().default(15_000),
    })
    .optional()
    .default({}),
  packages: z
    .array(packageSpecSchema)
    .min(1)
    .superRefine((specs, ctx) => {
      const seen = new Set<string>();
      specs.forEach((spec, index) => {
        if (seen.has(spec.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `duplicate package name "${spec.name}"`,
            path: [index, "name"],
          });
        }
        seen.add(spec.name);
      });
    })
    .optional()
    .default(DEFAULT_PACKAGES),
});

