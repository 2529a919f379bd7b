import fs from "node:fs";

import type { ProjectConfig } from "../core/config.js";
import { defaultProjectConfig, loadProjectConfig } from "../core/config-loader.js";
import { resolveProjectConfigPath, type ConfigSource } from "../core/config-discovery.js";

export type CliConfig = {
  config: ProjectConfig;
  configPath: string;
  source: ConfigSource;
  // False when no config file was found and built-in defaults are in use.
  fromFile: boolean;
};

export function loadConfigForCli(args: { explicitConfigPath?: string; cwd?: string }): CliConfig {
  const resolved = resolveProjectConfigPath({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd ?? process.cwd(),
  });

  if (resolved.source === "default" && !fs.existsSync(resolved.configPath)) {
    return {
      config: defaultProjectConfig(resolved.projectRoot),
      configPath: resolved.configPath,
      source: resolved.source,
      fromFile: false,
    };
  }

  return {
    config: loadProjectConfig(resolved.configPath),
    configPath: resolved.configPath,
    source: resolved.source,
    fromFile: true,
  };
}
