import { minimatch } from "minimatch";

import type { ExecutionMode } from "../core/config.js";
import { ConfigError } from "../core/errors.js";

import { compareIds, type DependencyGraph } from "./dependency-graph.js";

export type ExecutionPlan = {
  mode: ExecutionMode;
  graph: DependencyGraph;
  order: string[];
  layers: string[][];
};

export type PlanSelection = {
  targets?: string[];
  includeDirs?: string[];
  excludeDirs?: string[];
  includeDependencies?: boolean;
};

/**
 * Selects units and orders them for one run. Globs match unit ids and everything below them,
 * so `prod` selects `prod` and `prod/app`. Destroy runs on the reversed graph.
 */
export function buildExecutionPlan(
  graph: DependencyGraph,
  mode: ExecutionMode,
  selection: PlanSelection = {},
): ExecutionPlan {
  const selected = selectUnits(graph, selection);
  const subgraph = graph.subgraph(selected);
  const ordered = mode === "destroy" ? subgraph.reversed() : subgraph;
  const layers = ordered.layers();
  return { mode, graph: ordered, order: layers.flat(), layers };
}

export function selectUnits(graph: DependencyGraph, selection: PlanSelection): string[] {
  const includeDirs = selection.includeDirs ?? [];
  const excludeDirs = selection.excludeDirs ?? [];
  const targets = selection.targets ?? [];

  const excluded = (id: string): boolean => matchesAny(id, excludeDirs);
  let selected = graph
    .nodes()
    .filter((id) => includeDirs.length === 0 || matchesAny(id, includeDirs))
    .filter((id) => !excluded(id));

  if (targets.length > 0) {
    selected = selected.filter((id) => matchesAny(id, targets));
    if (selected.length === 0) {
      throw new ConfigError(`No units match target(s): ${targets.join(", ")}`);
    }
  }

  if (selection.includeDependencies) {
    const withDependencies = new Set(selected);
    for (const id of selected) {
      for (const dependency of graph.transitiveDependencies(id)) {
        if (!excluded(dependency)) withDependencies.add(dependency);
      }
    }
    selected = Array.from(withDependencies);
  }

  return selected.sort(compareIds);
}

export function matchesAny(unitId: string, patterns: string[]): boolean {
  return patterns.some((raw) => {
    const pattern = raw.replace(/^\.\//, "").replace(/\/+$/, "");
    if (pattern === "" || pattern === ".") return unitId === ".";
    return (
      minimatch(unitId, pattern, { dot: true }) ||
      minimatch(unitId, `${pattern}/**`, { dot: true })
    );
  });
}
