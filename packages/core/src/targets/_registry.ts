import type { ClientTarget, PathSpec, PlatformPaths } from "./_types.js";
import { expandPath } from "../utils.js";
import { claudeDesktop } from "./claude-desktop.js";
import { claudeCode } from "./claude-code.js";

export const TARGET_REGISTRY: Record<string, ClientTarget> = {
  [claudeDesktop.id]: claudeDesktop,
  [claudeCode.id]: claudeCode,
};

export const ALL_TARGET_IDS = Object.keys(TARGET_REGISTRY);

export const SUPPORTED_PLATFORMS: readonly NodeJS.Platform[] = ["darwin", "linux", "win32"];

function isSupportedPlatform(platform: NodeJS.Platform): platform is keyof PlatformPaths {
  return SUPPORTED_PLATFORMS.includes(platform);
}

export function resolvePath(pathSpec: PathSpec, platform: NodeJS.Platform = process.platform): string {
  if (typeof pathSpec === "string") return expandPath(pathSpec);
  const p = isSupportedPlatform(platform) ? pathSpec[platform] : pathSpec.linux;
  return expandPath(p);
}

export function getTarget(id: string): ClientTarget {
  const target = TARGET_REGISTRY[id];
  if (!target) throw new Error(`Unknown target: ${id} (expected one of ${ALL_TARGET_IDS.join(", ")})`);
  return target;
}
