import { loadConfigTree } from "../../config-tree/loader.js";
import type { ProjectConfig } from "../../core/config.js";
import { buildDependencyGraph, type DependencyGraph } from "../../graph/dependency-graph.js";
import { ValueResolver } from "../../resolve/resolver.js";

export type ProjectGraph = {
  resolver: ValueResolver;
  graph: DependencyGraph;
};

/** Loads the unit tree and builds the full (unselected) dependency graph. Throws on cycles. */
export function loadProjectGraph(
  config: ProjectConfig,
  env: Readonly<Record<string, string | undefined>> = process.env,
): ProjectGraph {
  const tree = loadConfigTree({ rootDir: config.units_root, unitFile: config.unit_file });
  const resolver = new ValueResolver(tree, { defaultTier: config.default_tier, env });
  return { resolver, graph: buildDependencyGraph(resolver) };
}

/** Units whose stored outputs the given units may read, selected or not. */
export function dependencyOutputTargets(resolver: ValueResolver, unitIds: string[]): string[] {
  const targets = new Set<string>();
  for (const unitId of unitIds) {
    for (const dependency of resolver.prepareUnit(unitId).dependencies) {
      if (dependency.enabled && !dependency.skipOutputs) targets.add(dependency.targetId);
    }
  }
  return Array.from(targets).sort();
}
