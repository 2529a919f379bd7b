import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import type { ZodIssue } from "zod";

import { ProjectConfigSchema, type ProjectConfig, type ProjectConfigInput } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export function loadProjectConfig(configPath: string): ProjectConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `No strata config found at ${resolved}.`,
      hint: "Run `strata init` to create .strata/config.yaml.",
    });
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(resolved, "utf8")) ?? {};
  } catch (err) {
    throw createConfigUserError(resolved, "Config file is not valid YAML.", err);
  }

  // .strata/config.yaml lives one level below the project root.
  const projectRoot = path.dirname(path.dirname(resolved));
  return parseProjectConfig(raw, projectRoot, resolved);
}

export function parseProjectConfig(
  raw: unknown,
  projectRoot: string,
  sourceLabel = "<inline>",
): ProjectConfig {
  const parsed = ProjectConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = formatConfigIssues(parsed.error.issues).join("; ");
    throw createConfigUserError(
      sourceLabel,
      `Config validation failed: ${details}`,
      new ConfigError(details),
    );
  }

  const root = path.resolve(projectRoot);
  const config = parsed.data;
  return {
    ...config,
    project_root: root,
    units_root: path.resolve(root, config.units_root),
    outputs_dir: path.resolve(root, config.outputs_dir),
    logs_dir: path.resolve(root, config.logs_dir),
    runs_dir: path.resolve(root, config.runs_dir),
  };
}

export function defaultProjectConfig(
  projectRoot: string,
  overrides: ProjectConfigInput = {},
): ProjectConfig {
  return parseProjectConfig(overrides, projectRoot);
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }
    return `${location}: ${issue.message}`;
  });
}

function createConfigUserError(configPath: string, message: string, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Project config invalid.",
    message: `${message} (${configPath})`,
    hint: "Fix the highlighted keys in .strata/config.yaml.",
    cause,
  });
}
