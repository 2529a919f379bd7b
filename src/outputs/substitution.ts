/*
Purpose: decide where a dependency's outputs come from at the point of use.
Assumptions: outputs recorded in this pass always win; dry-run modes prefer mocks over stored
outputs, apply/destroy prefer stored outputs over mocks.
Usage: new DependencyOutputResolver({ mode, passOutputs, storedOutputs }).lookup(dependency).
*/

import { isDryRunMode, type ExecutionMode } from "../core/config.js";
import type { DependencyOutputs, ResolvedDependency } from "../resolve/resolver.js";
import type { ValueMap } from "../resolve/values.js";

export type OutputSources = {
  mode: ExecutionMode;
  passOutputs: (unitId: string) => ValueMap | null | undefined;
  storedOutputs: ReadonlyMap<string, ValueMap | null>;
};

export class DependencyOutputResolver {
  constructor(private readonly sources: OutputSources) {}

  lookup(dependency: ResolvedDependency): DependencyOutputs {
    const { mode } = this.sources;

    const pass = this.sources.passOutputs(dependency.targetId);
    if (pass) return { kind: "real", source: "pass", outputs: pass };

    const stored = this.sources.storedOutputs.get(dependency.targetId) ?? null;
    const mock = mockAllowed(dependency, mode) ? dependency.mockOutputs : null;

    if (isDryRunMode(mode)) {
      if (mock) return { kind: "mocked", outputs: mock };
      if (stored) return { kind: "real", source: "stored", outputs: stored };
    } else {
      if (stored) return { kind: "real", source: "stored", outputs: stored };
      if (mock) return { kind: "mocked", outputs: mock };
    }

    if (mode === "validate") return { kind: "unknown" };

    return {
      kind: "unavailable",
      reason:
        dependency.mockOutputs && !mock
          ? `mock_outputs are not allowed in ${mode} mode and ${dependency.targetId} has no stored outputs`
          : `${dependency.targetId} has not produced outputs; apply it first or declare mock_outputs`,
    };
  }
}

function mockAllowed(dependency: ResolvedDependency, mode: ExecutionMode): boolean {
  if (!dependency.mockOutputs) return false;
  const allowed = dependency.mockOutputsAllowedModes;
  return allowed === null || allowed.includes(mode);
}
