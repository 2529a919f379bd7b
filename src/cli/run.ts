import { buildRunContext } from "../app/orchestrator/run-context.js";
import { runEngine, type RunResult } from "../app/orchestrator/run-engine.js";
import type { OrchestratorPorts } from "../app/orchestrator/ports.js";
import type { UnitResult } from "../app/orchestrator/unit-results.js";
import type { ExecutionMode, ProjectConfig } from "../core/config.js";
import { defaultRunId } from "../core/utils.js";

import { createRunStopSignalHandler } from "./signal-handlers.js";

export type RunCommandOptions = {
  mode: ExecutionMode;
  runId?: string;
  targets?: string[];
  includeDependencies?: boolean;
  parallelism?: number;
  failFast?: boolean;
  timeoutSeconds?: number;
};

export async function runCommand(
  config: ProjectConfig,
  opts: RunCommandOptions,
  deps: { ports?: Partial<OrchestratorPorts> } = {},
): Promise<RunResult> {
  const runId = opts.runId ?? defaultRunId();
  const stopHandler = createRunStopSignalHandler({
    onSignal: (signal, forced) => {
      if (forced) {
        console.log(`Received ${signal} again. Interrupting running units of ${runId}.`);
        return;
      }
      console.log(
        `Received ${signal}. Stopping run ${runId} after running units finish. ` +
          "Send it again to interrupt them.",
      );
    },
  });

  let result: RunResult;
  try {
    const context = buildRunContext({
      config,
      options: {
        mode: opts.mode,
        runId,
        targets: opts.targets,
        includeDependencies: opts.includeDependencies,
        parallelism: opts.parallelism,
        failurePolicy: opts.failFast ? "fail-fast" : undefined,
        unitTimeoutMs: opts.timeoutSeconds === undefined ? undefined : opts.timeoutSeconds * 1000,
        stopSignal: stopHandler.signal,
        forceSignal: stopHandler.forceSignal,
      },
      ports: deps.ports,
    });
    result = await runEngine(context);
  } finally {
    stopHandler.cleanup();
  }

  printRunResult(result);
  if (result.status !== "succeeded") process.exitCode = 1;
  return result;
}

// =============================================================================
// OUTPUT
// =============================================================================

function printRunResult(result: RunResult): void {
  const { plan } = result;
  if (plan.order.length === 0) {
    console.log(`Run ${result.runId} (${result.mode}): no units selected.`);
    return;
  }

  const counts = `${plan.order.length} unit(s) in ${plan.layers.length} layer(s)`;
  console.log(`Run ${result.runId} (${result.mode}): ${counts}.`);

  const idWidth = Math.max(...result.results.map((r) => r.unitId.length));
  for (const unit of result.results) {
    const label = pad(statusLabel(unit), 9);
    console.log(`  ${label}${pad(unit.unitId, idWidth)}  ${describeUnit(unit)}`);
    if (unit.status === "succeeded") {
      for (const sub of unit.substitutions) {
        console.log(`    ${sub.dependency}: ${sub.kind} outputs of ${sub.targetId}`);
      }
    }
  }

  console.log(`Run ${result.runId} finished with status: ${result.status}`);
  console.log(`Report: ${result.reportPath}`);
}

function statusLabel(unit: UnitResult): string {
  return unit.status === "succeeded" ? "ok" : unit.status;
}

function describeUnit(unit: UnitResult): string {
  switch (unit.status) {
    case "succeeded":
      return formatDuration(unit.durationMs);
    case "failed":
      return `${unit.error.kind}: ${unit.error.message}`;
    case "skipped":
      return unit.blockedBy ? `${unit.reason} (blocked by ${unit.blockedBy})` : unit.reason;
  }
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}
