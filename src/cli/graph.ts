import path from "node:path";

import fse from "fs-extra";

import { loadProjectGraph } from "../app/orchestrator/project-graph.js";
import type { ProjectConfig } from "../core/config.js";
import { buildExecutionPlan } from "../graph/plan.js";
import { renderGraph, type GraphFormat } from "../graph/render.js";

export async function graphCommand(
  config: ProjectConfig,
  opts: { format: GraphFormat; output?: string; targets?: string[] },
): Promise<void> {
  const { graph } = loadProjectGraph(config);
  const plan = buildExecutionPlan(graph, "plan", {
    targets: opts.targets,
    includeDirs: config.include_dirs,
    excludeDirs: config.exclude_dirs,
    includeDependencies: true,
  });
  const rendered = renderGraph(plan.graph, opts.format);

  if (!opts.output) {
    process.stdout.write(rendered);
    return;
  }

  const outputPath = path.resolve(opts.output);
  await fse.outputFile(outputPath, rendered, "utf8");
  console.log(`Wrote ${opts.format} graph of ${plan.order.length} unit(s) to ${outputPath}`);
}
