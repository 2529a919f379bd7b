import path from "node:path";

import type { ProjectConfig } from "./config.js";
import { slugify } from "./utils.js";

export const PROJECT_CONFIG_DIR = ".strata";
export const PROJECT_CONFIG_FILE = "config.yaml";

export function projectConfigPath(projectRoot: string): string {
  return path.join(projectRoot, PROJECT_CONFIG_DIR, PROJECT_CONFIG_FILE);
}

export function runLogsDir(config: ProjectConfig, runId: string): string {
  return path.join(config.logs_dir, runId);
}

export function orchestratorLogPath(config: ProjectConfig, runId: string): string {
  return path.join(runLogsDir(config, runId), "orchestrator.jsonl");
}

export function unitOutputsPath(outputsDir: string, unitId: string): string {
  return path.join(outputsDir, `${unitSlug(unitId)}.json`);
}

// "." is the units root itself.
export function unitSlug(unitId: string): string {
  if (unitId === ".") return "_root";
  const slug = unitId
    .split("/")
    .map((segment) => slugify(segment))
    .filter((segment) => segment.length > 0)
    .join("__");
  return slug.length > 0 ? slug : "_unit";
}
