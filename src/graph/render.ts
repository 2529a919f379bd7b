import type { DependencyGraph } from "./dependency-graph.js";

export type GraphFormat = "dot" | "mermaid" | "json";

export const GRAPH_FORMATS: readonly GraphFormat[] = ["dot", "mermaid", "json"];

export function renderGraph(graph: DependencyGraph, format: GraphFormat): string {
  switch (format) {
    case "dot":
      return renderDot(graph);
    case "mermaid":
      return renderMermaid(graph);
    case "json":
      return renderJson(graph);
  }
}

function renderDot(graph: DependencyGraph): string {
  const lines = ["digraph {"];
  for (const id of graph.nodes()) lines.push(`\t${JSON.stringify(id)} ;`);
  for (const [from, to] of uniqueEdges(graph)) {
    lines.push(`\t${JSON.stringify(from)} -> ${JSON.stringify(to)};`);
  }
  lines.push("}");
  return `${lines.join("\n")}\n`;
}

function renderMermaid(graph: DependencyGraph): string {
  const nodes = graph.nodes();
  const keys = new Map(nodes.map((id, index) => [id, `n${index}`]));
  const lines = ["graph TD"];
  for (const id of nodes) {
    lines.push(`  ${keys.get(id) ?? id}["${id.replace(/"/g, "#quot;")}"]`);
  }
  for (const [from, to] of uniqueEdges(graph)) {
    lines.push(`  ${keys.get(from) ?? from} --> ${keys.get(to) ?? to}`);
  }
  return `${lines.join("\n")}\n`;
}

function renderJson(graph: DependencyGraph): string {
  const payload = {
    nodes: graph.nodes(),
    edges: graph.edges().map((edge) => ({
      from: edge.from,
      to: edge.to,
      dependency: edge.dependency,
      skip_outputs: edge.skipOutputs,
    })),
    layers: graph.layers(),
  };
  return `${JSON.stringify(payload, null, 2)}\n`;
}

function uniqueEdges(graph: DependencyGraph): Array<[string, string]> {
  const seen = new Set<string>();
  const result: Array<[string, string]> = [];
  for (const edge of graph.edges()) {
    const key = `${edge.from}\u0000${edge.to}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push([edge.from, edge.to]);
  }
  return result;
}
