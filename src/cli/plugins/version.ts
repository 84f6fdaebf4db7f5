import { arch, platform } from "os";
import pkg from "../../../package.json";
import type { CommandContext, PluginDescriptor } from "../types";

export const BUILD_DATE = "2026-10-18";

export interface VersionInfo {
  name: string;
  version: string;
  buildDate: string;
  nodeVersion: string;
  platform: string;
  architecture: string;
}

export function getVersionInfo(): VersionInfo {
  return {
    name: pkg.name,
    version: pkg.version,
    buildDate: BUILD_DATE,
    nodeVersion: process.versions.node,
    platform: platform(),
    architecture: arch(),
  };
}

async function version(_args: string[], ctx: CommandContext): Promise<number> {
  const info = getVersionInfo();
  ctx.io.print(`${info.name} ${info.version}`);
  ctx.io.print(`Build date:   ${info.buildDate}`);
  ctx.io.print(`Node.js:      ${info.nodeVersion}`);
  ctx.io.print(`Platform:     ${info.platform}`);
  ctx.io.print(`Architecture: ${info.architecture}`);
  return 0;
}

export const versionPlugin: PluginDescriptor = {
  name: "version",
  description: "Version and build information",
  version: "1.0.0",
  commands: {
    version: {
      description: "Show version, build date and runtime details",
      usage: "version",
      requiresCredentials: false,
      handler: version,
    },
  },
};
