/*
Purpose: discover units under the units root and load every config file they reach through includes.
Assumptions: no evaluation happens here; template strings are parsed, not resolved.
Usage: const tree = loadConfigTree({ rootDir, unitFile: "unit.yaml" }); tree.units.get("prod/app").
*/

import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { formatConfigIssues } from "../core/config-loader.js";
import type { ExecutionMode } from "../core/config.js";
import { CycleError, LoadError } from "../core/errors.js";
import { toPosixPath } from "../core/utils.js";
import { isValueMap, toValue, type ValueMap } from "../resolve/values.js";

import { CompileError, compileRecord, compileValue, type CompiledValue } from "./compile.js";
import { UnitFileSchema, type IfExists, type IncludeEntry } from "./unit-schema.js";

// =============================================================================
// TYPES
// =============================================================================

export type DependencySpec = {
  name: string;
  configPath: CompiledValue;
  skipOutputs: boolean;
  mockOutputs: ValueMap | null;
  mockOutputsAllowedModes: ExecutionMode[] | null;
  enabled: boolean;
};

export type GenerateSpec = {
  name: string;
  path: string;
  ifExists: IfExists;
  contents: string;
  commentPrefix: string;
  disableSignature: boolean;
};

export type ConfigFile = {
  path: string;
  dir: string;
  tier?: string;
  includes: string[];
  locals: Record<string, CompiledValue>;
  inputs: Record<string, CompiledValue>;
  dependencies: DependencySpec[];
  generate: GenerateSpec[];
};

export type UnitEntry = {
  id: string;
  name: string;
  dir: string;
  filePath: string;
};

export type ConfigTree = {
  rootDir: string;
  unitFile: string;
  units: ReadonlyMap<string, UnitEntry>;
  files: ReadonlyMap<string, ConfigFile>;
};

export type LoadConfigTreeOptions = {
  rootDir: string;
  unitFile?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export const SKIPPED_DIRECTORIES = new Set([".terraform", ".git", "node_modules", ".strata"]);

export function loadConfigTree(options: LoadConfigTreeOptions): ConfigTree {
  const rootDir = path.resolve(options.rootDir);
  const unitFile = options.unitFile ?? "unit.yaml";

  if (!fs.existsSync(rootDir) || !fs.statSync(rootDir).isDirectory()) {
    throw new LoadError(`Units root ${rootDir} is not a directory`, { filePath: rootDir });
  }

  const loader = new FileLoader(rootDir);
  const units = new Map<string, UnitEntry>();

  for (const dir of discoverUnitDirs(rootDir, unitFile)) {
    const id = unitIdForDir(rootDir, dir);
    const filePath = path.join(dir, unitFile);
    loader.load(filePath, [], id);
    units.set(id, { id, name: path.basename(dir), dir, filePath });
  }

  return { rootDir, unitFile, units, files: loader.files };
}

export function unitIdForDir(rootDir: string, dir: string): string {
  const relative = path.relative(rootDir, dir);
  return relative === "" ? "." : toPosixPath(relative);
}

/** Include chain of a config file, parents first, the file itself last. Shared parents repeat. */
export function includeChain(tree: ConfigTree, filePath: string): ConfigFile[] {
  const file = tree.files.get(filePath);
  if (!file) return [];
  return [...file.includes.flatMap((parent) => includeChain(tree, parent)), file];
}

// =============================================================================
// DISCOVERY
// =============================================================================

function discoverUnitDirs(rootDir: string, unitFile: string): string[] {
  const found: string[] = [];
  const walk = (dir: string): void => {
    const entries = fs
      .readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    if (entries.some((entry) => entry.isFile() && entry.name === unitFile)) {
      found.push(dir);
    }

    for (const entry of entries) {
      if (!entry.isDirectory() || SKIPPED_DIRECTORIES.has(entry.name)) continue;
      walk(path.join(dir, entry.name));
    }
  };
  walk(rootDir);
  return found.sort((a, b) => {
    const left = unitIdForDir(rootDir, a);
    const right = unitIdForDir(rootDir, b);
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

// =============================================================================
// FILE LOADING
// =============================================================================

class FileLoader {
  readonly files = new Map<string, ConfigFile>();

  constructor(private readonly rootDir: string) {}

  load(filePath: string, stack: string[], unitId: string): ConfigFile {
    const cached = this.files.get(filePath);
    if (cached) return cached;

    const cycleStart = stack.indexOf(filePath);
    if (cycleStart >= 0) {
      const cyclePath = [...stack.slice(cycleStart), filePath].map((file) => this.display(file));
      throw new CycleError("include", cyclePath, {
        unitId: cycleStart === 0 ? unitId : undefined,
      });
    }

    // Errors in shared parents name the file only, not whichever unit reached it first.
    const owner = stack.length === 0 ? unitId : undefined;

    const raw = this.readYaml(filePath, owner);
    const parsed = UnitFileSchema.safeParse(raw);
    if (!parsed.success) {
      const details = formatConfigIssues(parsed.error.issues).join("; ");
      throw new LoadError(`${this.display(filePath)}: ${details}`, { filePath, unitId: owner });
    }

    const dir = path.dirname(filePath);
    const data = parsed.data;
    const includes = data.include.map((entry) => this.resolveInclude(entry, filePath, owner));
    for (const parent of includes) {
      this.load(parent, [...stack, filePath], unitId);
    }

    const file: ConfigFile = {
      path: filePath,
      dir,
      tier: data.tier,
      includes,
      locals: this.compile(() => compileRecord(data.locals, "locals"), filePath, owner),
      inputs: this.compile(() => compileRecord(data.inputs, "inputs"), filePath, owner),
      dependencies: data.dependencies.map((dependency, index) => ({
        name: dependency.name,
        configPath: this.compile(
          () => compileValue(dependency.config_path, `dependencies[${index}].config_path`),
          filePath,
          owner,
        ),
        skipOutputs: dependency.skip_outputs,
        mockOutputs:
          dependency.mock_outputs === undefined
            ? null
            : this.literalMap(dependency.mock_outputs, filePath, owner, index),
        mockOutputsAllowedModes: dependency.mock_outputs_allowed_modes ?? null,
        enabled: dependency.enabled,
      })),
      generate: data.generate.map((entry) => ({
        name: entry.name,
        path: entry.path,
        ifExists: entry.if_exists,
        contents: entry.contents,
        commentPrefix: entry.comment_prefix,
        disableSignature: entry.disable_signature,
      })),
    };

    this.files.set(filePath, file);
    return file;
  }

  private readYaml(filePath: string, unitId: string | undefined): unknown {
    let text: string;
    try {
      text = fs.readFileSync(filePath, "utf8");
    } catch (err) {
      throw new LoadError(`Cannot read ${this.display(filePath)}`, { filePath, unitId, cause: err });
    }

    try {
      return parseYaml(text) ?? {};
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new LoadError(`${this.display(filePath)} is not valid YAML: ${reason}`, {
        filePath,
        unitId,
        cause: err,
      });
    }
  }

  private resolveInclude(entry: IncludeEntry, fromFile: string, unitId: string | undefined): string {
    const fromDir = path.dirname(fromFile);

    if ("path" in entry) {
      const target = path.resolve(fromDir, entry.path);
      if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
        throw new LoadError(
          `${this.display(fromFile)} includes ${entry.path}, which does not exist`,
          { filePath: fromFile, unitId },
        );
      }
      return target;
    }

    let current = path.dirname(fromDir);
    while (true) {
      const candidate = path.join(current, entry.find_in_parent);
      if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) return candidate;
      const parent = path.dirname(current);
      if (parent === current) break;
      current = parent;
    }

    throw new LoadError(
      `${this.display(fromFile)}: no ${entry.find_in_parent} found in any parent directory`,
      { filePath: fromFile, unitId },
    );
  }

  private compile<T>(fn: () => T, filePath: string, unitId: string | undefined): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof CompileError) {
        throw new LoadError(`${this.display(filePath)}: ${err.message}`, {
          filePath,
          unitId,
          cause: err,
        });
      }
      throw err;
    }
  }

  private literalMap(
    raw: Record<string, unknown>,
    filePath: string,
    unitId: string | undefined,
    index: number,
  ): ValueMap {
    const converted = toValue(raw, `dependencies[${index}].mock_outputs`);
    if ("error" in converted || !isValueMap(converted.value)) {
      const reason = "error" in converted ? converted.error : "expected a map";
      throw new LoadError(`${this.display(filePath)}: ${reason}`, { filePath, unitId });
    }
    return converted.value;
  }

  private display(filePath: string): string {
    const relative = path.relative(this.rootDir, filePath);
    return relative.startsWith("..") || path.isAbsolute(relative)
      ? toPosixPath(filePath)
      : toPosixPath(relative);
  }
}
