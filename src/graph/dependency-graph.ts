/*
Purpose: unit dependency graph (edges point from dependent to dependency) with cycle detection,
Kahn layering and the selections the orchestrator needs.
Assumptions: node ids are unit ids; every ordering is lexicographic so runs are reproducible.
Usage: const graph = buildDependencyGraph(resolver); graph.layers();
*/

import { CycleError, LoadError } from "../core/errors.js";
import type { PreparedUnit } from "../resolve/resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export type GraphEdge = {
  from: string;
  to: string;
  dependency: string;
  skipOutputs: boolean;
};

export type UnitSource = {
  unitIds(): string[];
  prepareUnit(unitId: string): PreparedUnit;
};

// =============================================================================
// GRAPH
// =============================================================================

export class DependencyGraph {
  private readonly nodeIds: string[];
  private readonly edgeList: GraphEdge[];
  private readonly outgoing = new Map<string, Set<string>>();
  private readonly incoming = new Map<string, Set<string>>();

  constructor(nodes: Iterable<string>, edges: GraphEdge[]) {
    this.nodeIds = Array.from(new Set(nodes)).sort(compareIds);
    for (const id of this.nodeIds) {
      this.outgoing.set(id, new Set());
      this.incoming.set(id, new Set());
    }

    this.edgeList = edges
      .filter((edge) => this.outgoing.has(edge.from) && this.outgoing.has(edge.to))
      .sort((a, b) => compareIds(a.from, b.from) || compareIds(a.to, b.to));
    for (const edge of this.edgeList) {
      this.outgoing.get(edge.from)?.add(edge.to);
      this.incoming.get(edge.to)?.add(edge.from);
    }
  }

  nodes(): string[] {
    return [...this.nodeIds];
  }

  edges(): GraphEdge[] {
    return [...this.edgeList];
  }

  has(id: string): boolean {
    return this.outgoing.has(id);
  }

  dependenciesOf(id: string): string[] {
    return Array.from(this.outgoing.get(id) ?? []).sort(compareIds);
  }

  dependentsOf(id: string): string[] {
    return Array.from(this.incoming.get(id) ?? []).sort(compareIds);
  }

  transitiveDependencies(id: string): string[] {
    const seen = new Set<string>();
    const queue = this.dependenciesOf(id);
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...this.dependenciesOf(next));
    }
    return Array.from(seen).sort(compareIds);
  }

  /** First cycle found by a DFS in lexicographic order, e.g. [A, B, C, A]; null when acyclic. */
  findCycle(): string[] | null {
    const state = new Map<string, "visiting" | "done">();
    const stack: string[] = [];

    const visit = (id: string): string[] | null => {
      state.set(id, "visiting");
      stack.push(id);
      for (const next of this.dependenciesOf(id)) {
        const seen = state.get(next);
        if (seen === "visiting") {
          return [...stack.slice(stack.indexOf(next)), next];
        }
        if (seen === undefined) {
          const cycle = visit(next);
          if (cycle) return cycle;
        }
      }
      stack.pop();
      state.set(id, "done");
      return null;
    };

    for (const id of this.nodeIds) {
      if (state.has(id)) continue;
      const cycle = visit(id);
      if (cycle) return cycle;
    }
    return null;
  }

  assertAcyclic(): void {
    const cycle = this.findCycle();
    if (cycle) throw new CycleError("dependency", cycle);
  }

  /** Kahn layers: every unit sits one layer after its deepest dependency. */
  layers(): string[][] {
    this.assertAcyclic();

    const remaining = new Map<string, number>();
    for (const id of this.nodeIds) remaining.set(id, this.outgoing.get(id)?.size ?? 0);

    const layers: string[][] = [];
    let current = this.nodeIds.filter((id) => remaining.get(id) === 0);
    while (current.length > 0) {
      layers.push(current);
      const next: string[] = [];
      for (const id of current) {
        for (const dependent of this.incoming.get(id) ?? []) {
          const count = (remaining.get(dependent) ?? 0) - 1;
          remaining.set(dependent, count);
          if (count === 0) next.push(dependent);
        }
      }
      current = next.sort(compareIds);
    }
    return layers;
  }

  topologicalOrder(): string[] {
    return this.layers().flat();
  }

  subgraph(ids: Iterable<string>): DependencyGraph {
    const keep = new Set(Array.from(ids).filter((id) => this.has(id)));
    return new DependencyGraph(
      keep,
      this.edgeList.filter((edge) => keep.has(edge.from) && keep.has(edge.to)),
    );
  }

  /** Same nodes with every edge flipped; destroy order runs dependents first. */
  reversed(): DependencyGraph {
    return new DependencyGraph(
      this.nodeIds,
      this.edgeList.map((edge) => ({ ...edge, from: edge.to, to: edge.from })),
    );
  }
}

// =============================================================================
// BUILDER
// =============================================================================

export function buildDependencyGraph(source: UnitSource): DependencyGraph {
  const ids = source.unitIds();
  const edges: GraphEdge[] = [];

  for (const id of ids) {
    for (const dependency of source.prepareUnit(id).dependencies) {
      if (!dependency.enabled) continue;
      if (!ids.includes(dependency.targetId)) {
        throw new LoadError(
          `Dependency ${dependency.name} of ${id} points at unknown unit ${dependency.targetId}`,
          { unitId: id },
        );
      }
      edges.push({
        from: id,
        to: dependency.targetId,
        dependency: dependency.name,
        skipOutputs: dependency.skipOutputs,
      });
    }
  }

  const graph = new DependencyGraph(ids, edges);
  graph.assertAcyclic();
  return graph;
}

export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
