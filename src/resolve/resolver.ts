/*
Purpose: turn loaded config files into fully evaluated units
(locals, inputs, dependencies, generate templates).
Assumptions: layers are memoized per (file, tier) and shared between units; dependency outputs are
looked up lazily through the supplied callback, only from inputs.
Usage: const resolver = new ValueResolver(tree, { defaultTier: "dev" });
       resolver.resolveUnit("prod/app", { outputs: (dep) => substitution.lookup(dep) }).
*/

import fs from "node:fs";
import path from "node:path";

import type { CompiledValue } from "../config-tree/compile.js";
import {
  unitIdForDir,
  type ConfigFile,
  type ConfigTree,
  type DependencySpec,
  type GenerateSpec,
  type UnitEntry,
} from "../config-tree/loader.js";
import type { ExecutionMode } from "../core/config.js";
import {
  LoadError,
  MissingOutputError,
  OrchestratorError,
  ResolutionError,
} from "../core/errors.js";
import { toPosixPath } from "../core/utils.js";

import { evaluateRoot, type EvalScope, type UnitReference } from "./evaluator.js";
import { referencesRoot } from "./expressions.js";
import { deepMerge, deepMergeMaps, finalizeValue } from "./merge.js";
import {
  AppendList,
  ownValue,
  UnknownValue,
  type MergeValue,
  type MergeValueMap,
  type Value,
  type ValueMap,
} from "./values.js";

// =============================================================================
// TYPES
// =============================================================================

export type ResolvedDependency = {
  name: string;
  unitId: string;
  targetId: string;
  configPath: string;
  skipOutputs: boolean;
  enabled: boolean;
  mockOutputs: ValueMap | null;
  mockOutputsAllowedModes: ExecutionMode[] | null;
};

/** Availability of one dependency's outputs at the point of use. */
export type DependencyOutputs =
  | { kind: "real"; source: "pass" | "stored"; outputs: ValueMap }
  | { kind: "mocked"; outputs: ValueMap }
  | { kind: "unknown" }
  | { kind: "unavailable"; reason: string };

export type DependencyOutputLookup = (dependency: ResolvedDependency) => DependencyOutputs;

export type Substitution = {
  dependency: string;
  targetId: string;
  kind: "mocked" | "unknown";
};

export type ResolvedUnit = {
  id: string;
  name: string;
  dir: string;
  tier: string;
  locals: ValueMap;
  inputs: ValueMap;
  dependencies: ResolvedDependency[];
  generate: GenerateSpec[];
  substitutions: Substitution[];
};

export type PreparedUnit = {
  unit: UnitEntry;
  tier: string;
  dependencies: ResolvedDependency[];
};

export type ValueResolverOptions = {
  rootDir?: string;
  env?: Readonly<Record<string, string | undefined>>;
  defaultTier: string;
};

export type ResolveUnitOptions = {
  outputs: DependencyOutputLookup;
};

type DependencyDeclaration = Omit<DependencySpec, "configPath"> & { configPath: string };

type Layer = {
  file: ConfigFile;
  tier: string;
  unit?: UnitReference;
  locals: ValueMap;
  staticInputs: Map<string, MergeValue>;
  deferredInputs: Map<string, CompiledValue>;
  inputLayers: Layer[];
  dependencies: Map<string, DependencyDeclaration>;
  generate: Map<string, GenerateSpec>;
};

// =============================================================================
// RESOLVER
// =============================================================================

export class ValueResolver {
  private readonly rootDir: string;
  private readonly env: Readonly<Record<string, string | undefined>>;
  private readonly defaultTier: string;
  private readonly layers = new Map<string, Layer>();
  private readonly prepared = new Map<string, PreparedUnit>();
  private readonly unitsByFile = new Map<string, UnitEntry>();

  constructor(
    private readonly tree: ConfigTree,
    options: ValueResolverOptions,
  ) {
    this.rootDir = path.resolve(options.rootDir ?? tree.rootDir);
    this.env = options.env ?? {};
    this.defaultTier = options.defaultTier;
    for (const unit of tree.units.values()) {
      this.unitsByFile.set(unit.filePath, unit);
    }
  }

  unitIds(): string[] {
    return Array.from(this.tree.units.keys());
  }

  /** Own `tier`, else the last tier declared along the include chain. */
  tierOf(file: ConfigFile): string | undefined {
    if (file.tier !== undefined) return file.tier;
    for (const parentPath of [...file.includes].reverse()) {
      const parent = this.tree.files.get(parentPath);
      const tier = parent ? this.tierOf(parent) : undefined;
      if (tier !== undefined) return tier;
    }
    return undefined;
  }

  /** Tier and dependency targets of a unit, with every input checked against unknown outputs. */
  prepareUnit(unitId: string): PreparedUnit {
    const cached = this.prepared.get(unitId);
    if (cached) return cached;

    const unit = this.requireUnit(unitId);
    const file = this.requireFile(unit.filePath, unitId);
    const tier = this.tierOf(file) ?? this.defaultTier;
    const layer = this.withUnit(unitId, () => this.resolveLayer(file, tier));

    const dependencies = Array.from(layer.dependencies.values()).map(
      (declaration): ResolvedDependency => ({
        name: declaration.name,
        unitId,
        targetId: this.resolveTarget(unit, declaration),
        configPath: declaration.configPath,
        skipOutputs: declaration.skipOutputs,
        enabled: declaration.enabled,
        mockOutputs: declaration.mockOutputs,
        mockOutputsAllowedModes: declaration.mockOutputsAllowedModes,
      }),
    );

    // Inputs reading dependency outputs are evaluated once against unknown outputs so that
    // bad references fail here, before any unit runs.
    this.withUnit(unitId, () =>
      this.evaluateInputs(layer, (name) => {
        readableDependency(dependencies, name);
        return new UnknownValue(`dependency.${name}.outputs`);
      }),
    );

    const prepared: PreparedUnit = { unit, tier, dependencies };
    this.prepared.set(unitId, prepared);
    return prepared;
  }

  resolveUnit(unitId: string, options: ResolveUnitOptions): ResolvedUnit {
    const { unit, tier, dependencies } = this.prepareUnit(unitId);
    const file = this.requireFile(unit.filePath, unitId);

    return this.withUnit(unitId, () => {
      const layer = this.resolveLayer(file, tier);
      const substitutions: Substitution[] = [];
      const seen = new Map<string, ValueMap | UnknownValue>();

      const lookup = (name: string): ValueMap | UnknownValue => {
        const memo = seen.get(name);
        if (memo) return memo;
        const dependency = readableDependency(dependencies, name);
        const availability = options.outputs(dependency);
        const outputs = outputsOf(name, dependency, availability);
        if (availability.kind === "mocked" || availability.kind === "unknown") {
          substitutions.push({
            dependency: name,
            targetId: dependency.targetId,
            kind: availability.kind,
          });
        }
        seen.set(name, outputs);
        return outputs;
      };

      const inputs = this.evaluateInputs(layer, lookup);

      return {
        id: unit.id,
        name: unit.name,
        dir: unit.dir,
        tier,
        locals: layer.locals,
        inputs,
        dependencies,
        generate: Array.from(layer.generate.values()),
        substitutions,
      };
    });
  }

  /** Merges every input layer in include order, evaluating deferred inputs with `lookup`. */
  private evaluateInputs(
    layer: Layer,
    lookup: (name: string) => ValueMap | UnknownValue,
  ): ValueMap {
    let inputs: ValueMap = {};
    for (const inputLayer of layer.inputLayers) {
      for (const key of Object.keys(inputLayer.file.inputs)) {
        const compiled = inputLayer.deferredInputs.get(key);
        if (!compiled) {
          const value = inputLayer.staticInputs.get(key);
          if (value !== undefined) inputs = deepMergeMaps(inputs, { [key]: value });
          continue;
        }
        const scope: EvalScope = { ...this.layerScope(inputLayer), dependencyOutputs: lookup };
        const value = this.atLocation(inputLayer.file, `inputs.${key}`, () =>
          evaluateCompiled(compiled, scope),
        );
        inputs = deepMergeMaps(inputs, { [key]: value });
      }
    }
    return inputs;
  }

  // ===========================================================================
  // LAYERS
  // ===========================================================================

  private resolveLayer(file: ConfigFile, tier: string): Layer {
    const key = `${file.path}::${tier}`;
    const cached = this.layers.get(key);
    if (cached) return cached;

    const parents = file.includes.map((parentPath) =>
      this.resolveLayer(this.requireFile(parentPath), tier),
    );

    let inherited: ValueMap = {};
    for (const parent of parents) inherited = deepMergeMaps(inherited, parent.locals);

    const owner = this.unitsByFile.get(file.path);
    const unit: UnitReference | undefined = owner
      ? { id: owner.id, name: owner.name, dir: toPosixPath(owner.dir) }
      : undefined;

    const locals = this.evaluateLocals(file, tier, unit, inherited);

    const layer: Layer = {
      file,
      tier,
      unit,
      locals,
      staticInputs: new Map(),
      deferredInputs: new Map(),
      inputLayers: [],
      dependencies: new Map(),
      generate: new Map(),
    };

    const scope = this.layerScope(layer);
    for (const [name, compiled] of Object.entries(file.inputs)) {
      if (compiledReferences(compiled, "dependency")) {
        layer.deferredInputs.set(name, compiled);
      } else {
        layer.staticInputs.set(
          name,
          this.atLocation(file, `inputs.${name}`, () => evaluateCompiled(compiled, scope)),
        );
      }
    }

    for (const parent of parents) {
      layer.inputLayers.push(...parent.inputLayers);
      for (const [name, declaration] of parent.dependencies) {
        layer.dependencies.delete(name);
        layer.dependencies.set(name, declaration);
      }
      for (const [name, template] of parent.generate) {
        layer.generate.delete(name);
        layer.generate.set(name, template);
      }
    }
    layer.inputLayers.push(layer);

    file.dependencies.forEach((spec, index) => {
      const configPath = this.atLocation(file, `dependencies[${index}].config_path`, () =>
        evaluateCompiled(spec.configPath, scope),
      );
      if (typeof configPath !== "string" || configPath.length === 0) {
        throw new ResolutionError(
          `${this.display(file.path)}: dependency ${spec.name} config_path must be a non-empty string`,
          { filePath: file.path },
        );
      }
      layer.dependencies.delete(spec.name);
      layer.dependencies.set(spec.name, { ...spec, configPath });
    });

    for (const template of file.generate) {
      layer.generate.delete(template.name);
      layer.generate.set(template.name, template);
    }

    this.layers.set(key, layer);
    return layer;
  }

  private evaluateLocals(
    file: ConfigFile,
    tier: string,
    unit: UnitReference | undefined,
    inherited: ValueMap,
  ): ValueMap {
    const own = new Map<string, Value>();
    const evaluating: string[] = [];

    const local = (name: string): Value => {
      const done = own.get(name);
      if (done !== undefined) return done;

      const compiled = Object.hasOwn(file.locals, name) ? file.locals[name] : undefined;
      if (!compiled) {
        const value = ownValue(inherited, name);
        if (value === undefined) throw new ResolutionError(`Unknown reference local.${name}`);
        return value;
      }

      if (evaluating.includes(name)) {
        const cycle = [...evaluating.slice(evaluating.indexOf(name)), name].map(
          (entry) => `local.${entry}`,
        );
        throw new ResolutionError(`Local value cycle: ${cycle.join(" -> ")}`, {
          filePath: file.path,
        });
      }

      evaluating.push(name);
      try {
        const scope: EvalScope = { local, tier, unit, functions: this.functionContext(file) };
        const value = this.atLocation(file, `locals.${name}`, () =>
          deepMerge(ownValue(inherited, name), evaluateCompiled(compiled, scope), name),
        );
        own.set(name, value);
        return value;
      } finally {
        evaluating.pop();
      }
    };

    let locals: ValueMap = { ...inherited };
    for (const name of Object.keys(file.locals)) {
      locals = { ...locals, [name]: local(name) };
    }
    return locals;
  }

  private layerScope(layer: Layer): EvalScope {
    return {
      local: (name) => {
        const value = ownValue(layer.locals, name);
        if (value === undefined) throw new ResolutionError(`Unknown reference local.${name}`);
        return value;
      },
      tier: layer.tier,
      unit: layer.unit,
      functions: this.functionContext(layer.file),
    };
  }

  private functionContext(file: ConfigFile): EvalScope["functions"] {
    return { rootDir: this.rootDir, configDir: file.dir, env: this.env };
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private resolveTarget(unit: UnitEntry, declaration: DependencyDeclaration): string {
    let target = path.resolve(unit.dir, declaration.configPath);
    if (path.basename(target) === this.tree.unitFile && isFile(target)) {
      target = path.dirname(target);
    }
    const targetId = unitIdForDir(this.tree.rootDir, target);
    if (!this.tree.units.has(targetId)) {
      throw new LoadError(
        `Dependency ${declaration.name} of ${unit.id} points at ${declaration.configPath}, which is not a unit`,
        { unitId: unit.id, filePath: unit.filePath },
      );
    }
    if (targetId === unit.id) {
      throw new LoadError(`Dependency ${declaration.name} of ${unit.id} points at itself`, {
        unitId: unit.id,
        filePath: unit.filePath,
      });
    }
    return targetId;
  }

  private requireUnit(unitId: string): UnitEntry {
    const unit = this.tree.units.get(unitId);
    if (!unit) throw new LoadError(`Unknown unit ${unitId}`, { unitId });
    return unit;
  }

  private requireFile(filePath: string, unitId?: string): ConfigFile {
    const file = this.tree.files.get(filePath);
    if (!file) throw new LoadError(`Config file ${filePath} was not loaded`, { filePath, unitId });
    return file;
  }

  /** Prefixes the failing file and key once, at the innermost evaluation. */
  private atLocation<T>(file: ConfigFile, at: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      const where = `${this.display(file.path)}: ${at}`;
      if (err instanceof MissingOutputError && err.cause === undefined) {
        throw new MissingOutputError(`${where}: ${err.message}`, {
          dependency: err.dependency,
          cause: err,
        });
      }
      if (err instanceof ResolutionError && err.filePath === undefined) {
        throw new ResolutionError(`${where}: ${err.message}`, { filePath: file.path, cause: err });
      }
      throw err;
    }
  }

  /** Attaches the unit id to errors raised while resolving it. */
  private withUnit<T>(unitId: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (!(err instanceof OrchestratorError) || err.unitId) throw err;
      if (err instanceof MissingOutputError) {
        throw new MissingOutputError(err.message, {
          dependency: err.dependency,
          unitId,
          cause: err,
        });
      }
      if (err instanceof ResolutionError) {
        throw new ResolutionError(err.message, { unitId, filePath: err.filePath, cause: err });
      }
      if (err instanceof LoadError) {
        throw new LoadError(err.message, { unitId, filePath: err.filePath, cause: err });
      }
      throw err;
    }
  }

  private display(filePath: string): string {
    const relative = path.relative(this.tree.rootDir, filePath);
    return relative.startsWith("..") ? toPosixPath(filePath) : toPosixPath(relative);
  }
}

// =============================================================================
// COMPILED VALUES
// =============================================================================

export function evaluateCompiled(compiled: CompiledValue, scope: EvalScope): MergeValue {
  switch (compiled.kind) {
    case "literal":
      return compiled.value;
    case "expr":
      return evaluateRoot(compiled.node, scope);
    case "list":
      return compiled.items.map((item) =>
        finalizeValue(expectListItem(evaluateCompiled(item, scope))),
      );
    case "map": {
      const result: MergeValueMap = {};
      for (const [key, item] of compiled.entries) result[key] = evaluateCompiled(item, scope);
      return result;
    }
  }
}

export function compiledReferences(compiled: CompiledValue, root: string): boolean {
  switch (compiled.kind) {
    case "literal":
      return false;
    case "expr":
      return referencesRoot(compiled.node, root);
    case "list":
      return compiled.items.some((item) => compiledReferences(item, root));
    case "map":
      return compiled.entries.some(([, item]) => compiledReferences(item, root));
  }
}

function expectListItem(value: MergeValue): MergeValue {
  if (value instanceof AppendList) {
    throw new ResolutionError(
      "append() result can only be used as a whole value, not as a list element",
    );
  }
  return value;
}

/** A dependency whose outputs may be read from inputs. */
function readableDependency(dependencies: ResolvedDependency[], name: string): ResolvedDependency {
  const dependency = dependencies.find((candidate) => candidate.name === name);
  if (!dependency) {
    throw new ResolutionError(`dependency.${name} is not declared`);
  }
  if (!dependency.enabled) {
    throw new ResolutionError(`dependency.${name} is disabled and exposes no outputs`);
  }
  if (dependency.skipOutputs) {
    throw new ResolutionError(`dependency.${name} sets skip_outputs and exposes no outputs`);
  }
  return dependency;
}

function outputsOf(
  name: string,
  dependency: ResolvedDependency,
  availability: DependencyOutputs,
): ValueMap | UnknownValue {
  switch (availability.kind) {
    case "real":
    case "mocked":
      return availability.outputs;
    case "unknown":
      return new UnknownValue(`dependency.${name}.outputs`);
    case "unavailable":
      throw new MissingOutputError(
        `Outputs of dependency ${name} (${dependency.targetId}) are not available: ${availability.reason}`,
        { dependency: name },
      );
  }
}

function isFile(target: string): boolean {
  return fs.existsSync(target) && fs.statSync(target).isFile();
}
