export type { DiagnosticResult, DoctorOptions, DoctorResult, VersionReader } from "./types.js";
export { checkStackConfig, checkPackagesResolve, checkDesktopConfigJson } from "./config-check.js";
export { checkManagedServers } from "./mcp-check.js";
export { checkNodeRuntime, checkPlatform, checkNpmAvailable, checkHostTools } from "./runtime-check.js";
export { runAllChecks, summarize } from "./runner.js";
export { formatDoctorOutput, formatDoctorJson } from "./formatter.js";
