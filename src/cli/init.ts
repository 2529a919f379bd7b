import { initProjectConfig } from "../core/config-discovery.js";

export async function initCommand(opts: { force?: boolean; cwd?: string }): Promise<void> {
  const result = initProjectConfig({ cwd: opts.cwd ?? process.cwd(), force: opts.force });

  if (result.status === "created") {
    console.log(`Created strata config at ${result.configPath}`);
    console.log(`Edit ${result.configPath} to set units_root, default_tier and the engine.`);
    return;
  }

  if (result.status === "overwritten") {
    console.log(`Overwrote strata config at ${result.configPath}`);
    console.log(`Review ${result.configPath} for your project settings.`);
    return;
  }

  console.log(`Config already exists at ${result.configPath}`);
}
