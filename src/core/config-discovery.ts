import fs from "node:fs";
import path from "node:path";

import { projectConfigPath, PROJECT_CONFIG_DIR } from "./paths.js";

export type ConfigSource = "explicit" | "project" | "default";

export type ConfigResolution = {
  configPath: string;
  projectRoot: string;
  source: ConfigSource;
};

export type InitResult = {
  projectRoot: string;
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function resolveProjectConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    const configPath = path.resolve(cwd, args.explicitPath);
    return {
      configPath,
      projectRoot: path.dirname(path.dirname(configPath)),
      source: "explicit",
    };
  }

  const projectRoot = findProjectRoot(cwd);
  if (projectRoot) {
    return { configPath: projectConfigPath(projectRoot), projectRoot, source: "project" };
  }

  const fallbackRoot = findRepoRoot(cwd) ?? path.resolve(cwd);
  return {
    configPath: projectConfigPath(fallbackRoot),
    projectRoot: fallbackRoot,
    source: "default",
  };
}

export function initProjectConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const cwd = args.cwd ?? process.cwd();
  const projectRoot = findProjectRoot(cwd) ?? findRepoRoot(cwd) ?? path.resolve(cwd);
  const configPath = projectConfigPath(projectRoot);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { projectRoot, configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, buildDefaultConfig(), "utf8");
  ensureLocalGitignore(path.dirname(configPath));

  return { projectRoot, configPath, status: hasConfig ? "overwritten" : "created" };
}

export function findProjectRoot(startDir: string): string | null {
  return findUp(startDir, (dir) => fs.existsSync(projectConfigPath(dir)));
}

export function findRepoRoot(startDir: string): string | null {
  return findUp(startDir, (dir) => fs.existsSync(path.join(dir, ".git")));
}

function findUp(start: string, predicate: (dir: string) => boolean): string | null {
  let current = path.resolve(start);
  while (true) {
    if (predicate(current)) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

function ensureLocalGitignore(configDir: string): void {
  const ignorePath = path.join(configDir, ".gitignore");
  const content = ["logs/", "runs/", "outputs/", ""].join("\n");
  const current = fs.existsSync(ignorePath) ? fs.readFileSync(ignorePath, "utf8") : null;
  if (current !== content) {
    fs.writeFileSync(ignorePath, content, "utf8");
  }
}

function buildDefaultConfig(): string {
  return [
    `# Auto-generated strata config (${PROJECT_CONFIG_DIR}/config.yaml). Update as needed.`,
    "units_root: .",
    "unit_file: unit.yaml",
    "exclude_dirs: []",
    "default_tier: dev",
    "",
    "parallelism: 4",
    "failure_policy: skip-downstream",
    "unit_timeout_seconds: 3600",
    "",
    "engine:",
    "  binary: terraform",
    "  auto_init: true",
    "  retry_attempts: 2",
    "  retry_delay_seconds: 5",
    "  retryable_errors:",
    '    - "Error acquiring the state lock"',
    '    - "connection reset by peer"',
    "",
    "hooks:",
    "  before: []",
    "  after: []",
    "  error: []",
    "",
  ].join("\n");
}
