/**
 * @mcpstack/core
 * Core types, schemas, and utilities for the mcpstack rebuild procedure
 */

// Types
export * from "./types.js";

// Schemas
export * from "./schema.js";

// Utilities
export * from "./utils.js";

// Errors
export * from "./errors.js";

// Logger
export { createLogEntry, type LogEntry, type LogEntryInput, type LogLevel } from "./logger.js";

// Entry points
export * from "./entry-point.js";

// Client targets
export * from "./targets/index.js";
