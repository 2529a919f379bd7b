/**
 * RunEngine is the orchestrator entrypoint.
 * Purpose: load, resolve and plan the unit tree, then drive every selected unit through the
 * provisioning engine layer by layer, containing failures to their dependents.
 * Assumptions: preparation (load, graph, plan) either fully succeeds or throws before any unit
 * runs; each unit's result is recorded exactly once.
 * Usage: const result = await runEngine(buildRunContext({ config, options: { mode: "plan" } })).
 */

import type { ExecutionMode } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { isOrchestratorError, TimeoutError } from "../../core/errors.js";
import type { JsonObject } from "../../core/logger.js";
import type { RunReport, RunStatus } from "../../core/run-report-store.js";
import { defaultRunId } from "../../core/utils.js";
import type { HookPhase } from "../../engine/hooks.js";
import { buildExecutionPlan, type ExecutionPlan } from "../../graph/plan.js";
import { loadStoredOutputs } from "../../outputs/output-store.js";
import { DependencyOutputResolver } from "../../outputs/substitution.js";
import type { ResolvedUnit, ValueResolver } from "../../resolve/resolver.js";
import type { ValueMap } from "../../resolve/values.js";

import { dependencyOutputTargets, loadProjectGraph } from "./project-graph.js";
import type { RunContext } from "./run-context.js";
import {
  toUnitFailure,
  UnitResultTable,
  type SkipReason,
  type UnitResult,
} from "./unit-results.js";
import { UnitStateMachine } from "./unit-state.js";
import { runWithConcurrency } from "./worker-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunResult = {
  runId: string;
  mode: ExecutionMode;
  status: RunStatus;
  plan: ExecutionPlan;
  results: UnitResult[];
  startedAt: string;
  finishedAt: string;
  reportPath: string;
};

type PreparedRun = {
  resolver: ValueResolver;
  plan: ExecutionPlan;
  storedOutputs: Map<string, ValueMap | null>;
};

type Log = (type: string, payload?: JsonObject) => void;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runEngine(context: RunContext): Promise<RunResult> {
  const { config, options, ports } = context;
  const mode = options.mode;
  const runId = options.runId ?? defaultRunId(ports.clock.now());
  const logger = ports.logSink.createOrchestratorLogger(config, runId);
  const log: Log = (type, payload = {}) =>
    ports.logSink.logOrchestratorEvent(logger, type, payload);
  const startedAt = ports.clock.isoNow();

  log("run.start", { run_id: runId, mode });

  let prepared: PreparedRun;
  try {
    prepared = await prepareRun(context);
  } catch (err) {
    log("run.prepare_failed", {
      error: formatErrorMessage(err),
      kind: isOrchestratorError(err) ? err.kind : "internal",
    });
    throw err;
  }

  const { resolver, plan, storedOutputs } = prepared;
  log("run.plan", { order: plan.order, layers: plan.layers });

  const parallelism = options.parallelism ?? config.parallelism;
  const failurePolicy = options.failurePolicy ?? config.failure_policy;
  const timeoutMs =
    options.unitTimeoutMs ??
    (config.unit_timeout_seconds === undefined ? undefined : config.unit_timeout_seconds * 1000);

  const results = new UnitResultTable();
  const states = new UnitStateMachine(plan.order, (unitId, from, to) =>
    log("unit.transition", { unit_id: unitId, from, to }),
  );
  const substitution = new DependencyOutputResolver({
    mode,
    passOutputs: (unitId) => results.passOutputs(unitId),
    storedOutputs,
  });
  const lateEngineCalls: Array<Promise<void>> = [];
  let failFastTriggered = false;

  // ===========================================================================
  // SCHEDULING
  // ===========================================================================

  const skipReasonFor = (unitId: string): { reason: SkipReason; blockedBy?: string } | null => {
    if (options.stopSignal?.aborted) return { reason: "cancelled" };
    if (failFastTriggered) return { reason: "fail_fast" };

    for (const dependency of plan.graph.dependenciesOf(unitId)) {
      const upstream = results.get(dependency);
      if (upstream?.status === "failed") {
        return { reason: "upstream_failed", blockedBy: dependency };
      }
      if (upstream?.status === "skipped") {
        return { reason: "upstream_failed", blockedBy: upstream.blockedBy ?? dependency };
      }
    }
    return null;
  };

  const skipUnit = (unitId: string, skip: { reason: SkipReason; blockedBy?: string }): void => {
    states.transition(unitId, "skipped");
    results.record({ unitId, status: "skipped", ...skip });
    log("unit.skipped", {
      unit_id: unitId,
      reason: skip.reason,
      ...(skip.blockedBy ? { blocked_by: skip.blockedBy } : {}),
    });
  };

  // ===========================================================================
  // UNIT EXECUTION
  // ===========================================================================

  const runHooks = async (phase: HookPhase, unit: ResolvedUnit): Promise<void> => {
    if (mode === "validate") return;
    const outcomes = await ports.hookRunner.run({
      phase,
      unitId: unit.id,
      workingDir: unit.dir,
      mode,
      signal: options.forceSignal,
    });
    for (const outcome of outcomes) {
      log("unit.hook", {
        unit_id: unit.id,
        phase,
        hook: outcome.name,
        exit_code: outcome.exitCode,
        ignored: outcome.ignored,
      });
    }
  };

  const applyWithDeadline = async (unit: ResolvedUnit): Promise<ValueMap | null> => {
    if (mode === "validate") return null;

    const call = ports.engine.apply({
      unitId: unit.id,
      workingDir: unit.dir,
      inputs: unit.inputs,
      mode,
      signal: options.forceSignal,
    });
    if (timeoutMs === undefined) return (await call).outputs;

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new TimeoutError(timeoutMs, { unitId: unit.id })),
        timeoutMs,
      );
    });

    try {
      return (await Promise.race([call, deadline])).outputs;
    } catch (err) {
      if (err instanceof TimeoutError) {
        log("unit.timeout", { unit_id: unit.id, timeout_ms: timeoutMs });
        lateEngineCalls.push(
          call.then(
            () => log("unit.late_completion", { unit_id: unit.id, outcome: "succeeded" }),
            (lateErr: unknown) =>
              log("unit.late_completion", {
                unit_id: unit.id,
                outcome: "failed",
                error: formatErrorMessage(lateErr),
              }),
          ),
        );
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  };

  // Error hooks report the original failure; their own failure is logged, never rethrown.
  const runErrorHooks = async (unit: ResolvedUnit, original: unknown): Promise<void> => {
    try {
      await runHooks("error", unit);
    } catch (hookErr) {
      log("unit.error_hook_failed", {
        unit_id: unit.id,
        error: formatErrorMessage(hookErr),
        original_error: formatErrorMessage(original),
      });
    }
  };

  const executeUnit = async (unitId: string): Promise<void> => {
    states.transition(unitId, "running");
    const started = ports.clock.now();
    const unitStartedAt = started.toISOString();
    log("unit.start", { unit_id: unitId, mode });

    let resolved: ResolvedUnit | null = null;
    try {
      resolved = resolver.resolveUnit(unitId, {
        outputs: (dependency) => substitution.lookup(dependency),
      });
      for (const item of resolved.substitutions) {
        log("unit.substitution", {
          unit_id: unitId,
          dependency: item.dependency,
          target_id: item.targetId,
          kind: item.kind,
        });
      }

      await runHooks("before", resolved);
      const artifacts = await ports.artifactEmitter.emit(resolved, {
        dryRun: mode === "validate",
      });
      const outputs = await applyWithDeadline(resolved);
      await runHooks("after", resolved);

      if (mode === "apply" && outputs) await ports.outputStore.write(unitId, outputs);
      if (mode === "destroy") await ports.outputStore.remove(unitId);

      const finished = ports.clock.now();
      states.transition(unitId, "succeeded");
      results.record({
        unitId,
        status: "succeeded",
        outputs,
        substitutions: resolved.substitutions,
        artifacts: artifacts.map(({ name, path, status }) => ({ name, path, status })),
        startedAt: unitStartedAt,
        finishedAt: finished.toISOString(),
        durationMs: finished.getTime() - started.getTime(),
      });
      log("unit.complete", {
        unit_id: unitId,
        duration_ms: finished.getTime() - started.getTime(),
        artifacts: artifacts.length,
      });
    } catch (err) {
      if (resolved) await runErrorHooks(resolved, err);

      const finished = ports.clock.now();
      const failure = toUnitFailure(err);
      states.transition(unitId, "failed");
      results.record({
        unitId,
        status: "failed",
        error: failure,
        startedAt: unitStartedAt,
        finishedAt: finished.toISOString(),
        durationMs: finished.getTime() - started.getTime(),
      });
      log("unit.failed", { unit_id: unitId, kind: failure.kind, error: failure.message });

      if (failurePolicy === "fail-fast" && !failFastTriggered) {
        failFastTriggered = true;
        log("run.fail_fast", { unit_id: unitId });
      }
    }
  };

  // ===========================================================================
  // LAYERS
  // ===========================================================================

  for (const [index, layer] of plan.layers.entries()) {
    const runnable: string[] = [];
    for (const unitId of layer) {
      const skip = skipReasonFor(unitId);
      if (skip) {
        skipUnit(unitId, skip);
        continue;
      }
      states.transition(unitId, "ready");
      runnable.push(unitId);
    }

    log("layer.start", { index, units: runnable });

    await runWithConcurrency(runnable, parallelism, executeUnit, (unitId) => {
      const skip = skipReasonFor(unitId);
      if (!skip) return true;
      skipUnit(unitId, skip);
      return false;
    });
  }

  await Promise.all(lateEngineCalls);

  const ordered = results.inOrder(plan.order);
  const status = runStatus(ordered);
  const finishedAt = ports.clock.isoNow();

  const reportPath = await ports.runReports.save(
    toRunReport({ runId, mode, status, plan, results: ordered, startedAt, finishedAt }),
  );
  log("run.complete", { status, report_path: reportPath });

  return { runId, mode, status, plan, results: ordered, startedAt, finishedAt, reportPath };
}

// =============================================================================
// PREPARATION
// =============================================================================

async function prepareRun(context: RunContext): Promise<PreparedRun> {
  const { config, options, ports } = context;

  const { resolver, graph } = loadProjectGraph(config, options.env ?? process.env);
  const plan = buildExecutionPlan(graph, options.mode, {
    targets: options.targets,
    includeDirs: config.include_dirs,
    excludeDirs: config.exclude_dirs,
    includeDependencies: options.includeDependencies,
  });
  const storedOutputs = await loadStoredOutputs(
    ports.outputStore,
    dependencyOutputTargets(resolver, plan.order),
  );

  return { resolver, plan, storedOutputs };
}

// =============================================================================
// RESULTS
// =============================================================================

function runStatus(results: UnitResult[]): RunStatus {
  const cancelled = results.some(
    (result) => result.status === "skipped" && result.reason === "cancelled",
  );
  if (cancelled) return "cancelled";
  return results.every((result) => result.status === "succeeded") ? "succeeded" : "failed";
}

export function toRunReport(run: Omit<RunResult, "reportPath">): RunReport {
  return {
    run_id: run.runId,
    mode: run.mode,
    status: run.status,
    started_at: run.startedAt,
    finished_at: run.finishedAt,
    plan: { order: run.plan.order, layers: run.plan.layers },
    units: run.results.map((result) => {
      switch (result.status) {
        case "succeeded":
          return {
            unit_id: result.unitId,
            status: result.status,
            duration_ms: result.durationMs,
            substitutions: result.substitutions.map((item) => ({
              dependency: item.dependency,
              target_id: item.targetId,
              kind: item.kind,
            })),
            artifacts: result.artifacts,
          };
        case "failed":
          return {
            unit_id: result.unitId,
            status: result.status,
            duration_ms: result.durationMs,
            error: result.error,
          };
        case "skipped":
          return {
            unit_id: result.unitId,
            status: result.status,
            reason: result.reason,
            ...(result.blockedBy ? { blocked_by: result.blockedBy } : {}),
          };
      }
    }),
  };
}
