/*
Purpose: show what a unit resolves to without running the engine.
Assumptions: resolution runs in validate mode, so missing dependency outputs render as
unknown placeholders; artifacts are rendered but never written.
*/

import { dependencyOutputTargets, loadProjectGraph } from "../app/orchestrator/project-graph.js";
import type { ProjectConfig } from "../core/config.js";
import { emitArtifacts } from "../generate/emitter.js";
import { FileOutputStore, loadStoredOutputs } from "../outputs/output-store.js";
import { DependencyOutputResolver } from "../outputs/substitution.js";

export async function renderCommand(
  config: ProjectConfig,
  unitId: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
): Promise<void> {
  const { resolver } = loadProjectGraph(config, env);
  const storedOutputs = await loadStoredOutputs(
    new FileOutputStore(config.outputs_dir),
    dependencyOutputTargets(resolver, [unitId]),
  );
  const substitution = new DependencyOutputResolver({
    mode: "validate",
    passOutputs: () => null,
    storedOutputs,
  });

  const unit = resolver.resolveUnit(unitId, { outputs: (dep) => substitution.lookup(dep) });
  const artifacts = await emitArtifacts(unit, { dryRun: true });

  const rendered = {
    unit: unit.id,
    tier: unit.tier,
    dependencies: unit.dependencies.map((dep) => ({
      name: dep.name,
      target: dep.targetId,
      enabled: dep.enabled,
      skip_outputs: dep.skipOutputs,
    })),
    locals: unit.locals,
    inputs: unit.inputs,
    substitutions: unit.substitutions.map((sub) => ({
      dependency: sub.dependency,
      target_id: sub.targetId,
      kind: sub.kind,
    })),
    artifacts: artifacts.map((artifact) => ({
      name: artifact.name,
      path: artifact.path,
      contents: artifact.contents,
    })),
  };
  console.log(JSON.stringify(rendered, null, 2));
}
