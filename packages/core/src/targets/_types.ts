/**
 * Client Target Types: where a desktop client keeps its MCP server config.
 */

export interface PlatformPaths {
  darwin: string;
  linux: string;
  win32: string;
}

export type PathSpec = string | PlatformPaths;

export interface ClientTarget {
  id: string;
  display: { name: string };
  /** Location of the JSON config file holding the servers map */
  configPath: PathSpec;
  /** Reserved top-level key holding named server definitions */
  serversKey: string;
}
