import { describe, expect, it } from "vitest";

import { CycleError, LoadError } from "../core/errors.js";
import type { PreparedUnit, ResolvedDependency } from "../resolve/resolver.js";

import { buildDependencyGraph, DependencyGraph, type UnitSource } from "./dependency-graph.js";

function edge(from: string, to: string) {
  return { from, to, dependency: to, skipOutputs: false };
}

// net <- db, net <- cache, db/cache <- app; tools stands alone.
function sampleGraph(): DependencyGraph {
  return new DependencyGraph(
    ["tools", "app", "db", "cache", "net"],
    [edge("app", "db"), edge("app", "cache"), edge("db", "net"), edge("cache", "net")],
  );
}

function fakeSource(links: Record<string, string[]>, disabled: string[] = []): UnitSource {
  return {
    unitIds: () => Object.keys(links).sort(),
    prepareUnit: (unitId): PreparedUnit => ({
      unit: {
        id: unitId,
        name: unitId,
        dir: `/units/${unitId}`,
        filePath: `/units/${unitId}/unit.yaml`,
      },
      tier: "dev",
      dependencies: (links[unitId] ?? []).map(
        (targetId): ResolvedDependency => ({
          name: targetId,
          unitId,
          targetId,
          configPath: `../${targetId}`,
          skipOutputs: false,
          enabled: !disabled.includes(`${unitId}->${targetId}`),
          mockOutputs: null,
          mockOutputsAllowedModes: null,
        }),
      ),
    }),
  };
}

describe("DependencyGraph", () => {
  it("layers units deterministically with lexicographic tie-break", () => {
    const graph = sampleGraph();

    expect(graph.layers()).toEqual([["net", "tools"], ["cache", "db"], ["app"]]);
    expect(graph.topologicalOrder()).toEqual(["net", "tools", "cache", "db", "app"]);
  });

  it("answers neighbourhood queries", () => {
    const graph = sampleGraph();

    expect(graph.dependenciesOf("app")).toEqual(["cache", "db"]);
    expect(graph.dependentsOf("net")).toEqual(["cache", "db"]);
    expect(graph.transitiveDependencies("app")).toEqual(["cache", "db", "net"]);
    expect(graph.transitiveDependencies("tools")).toEqual([]);
  });

  it("reverses edges so dependents come first", () => {
    expect(sampleGraph().reversed().layers()).toEqual([["app", "tools"], ["cache", "db"], ["net"]]);
  });

  it("restricts to a selection", () => {
    const sub = sampleGraph().subgraph(["app", "db", "missing"]);

    expect(sub.nodes()).toEqual(["app", "db"]);
    expect(sub.layers()).toEqual([["db"], ["app"]]);
  });

  it("reports the full cycle path", () => {
    const graph = new DependencyGraph(
      ["A", "B", "C", "D"],
      [edge("A", "B"), edge("B", "C"), edge("C", "A"), edge("D", "A")],
    );

    expect(graph.findCycle()).toEqual(["A", "B", "C", "A"]);
    expect(() => graph.layers()).toThrow("Dependency cycle: A -> B -> C -> A");
  });
});

describe("buildDependencyGraph", () => {
  it("rejects cycles before returning a graph", () => {
    let caught: unknown;
    try {
      buildDependencyGraph(fakeSource({ A: ["B"], B: ["C"], C: ["A"] }));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(CycleError);
    expect(caught instanceof CycleError ? caught.cyclePath : []).toEqual(["A", "B", "C", "A"]);
  });

  it("skips disabled declarations", () => {
    const graph = buildDependencyGraph(fakeSource({ A: ["B"], B: ["A"] }, ["B->A"]));

    expect(graph.edges()).toEqual([{ from: "A", to: "B", dependency: "B", skipOutputs: false }]);
  });

  it("rejects targets outside the tree", () => {
    expect(() => buildDependencyGraph(fakeSource({ A: ["ghost"] }))).toThrow(LoadError);
  });
});
