import { describe, expect, it } from "vitest";

import {
  makeTemporaryDirectory,
  makeTree,
  registerTreeTempCleanup,
  yamlLines,
} from "../../config-tree/tree.test-helpers.js";
import type { ProjectConfigInput } from "../../core/config.js";
import { defaultProjectConfig } from "../../core/config-loader.js";
import { CycleError, ExecutionError, HookError, ResolutionError } from "../../core/errors.js";

import {
  FakeClock,
  FakeEngine,
  FakeHookRunner,
  FakeLogSink,
  MemoryOutputStore,
  MemoryRunReports,
} from "./__tests__/fakes.js";
import { buildRunContext, type RunOptions } from "./run-context.js";
import { runEngine, type RunResult } from "./run-engine.js";
import type { UnitResult } from "./unit-results.js";

registerTreeTempCleanup();

// =============================================================================
// HELPERS
// =============================================================================

const STARTED = "2024-01-01T00:00:00.000Z";

function unitFile(dependencies: string[], ...extra: string[]): string {
  const lines: string[] = [];
  if (dependencies.length > 0) {
    lines.push("dependencies:");
    for (const dependency of dependencies) {
      lines.push(`  - name: ${dependency}`, `    config_path: ../${dependency}`);
    }
  }
  return yamlLines(...lines, ...extra);
}

// net <- db, net <- cache, db/cache <- app; tools stands alone.
function sampleTree(): string {
  return makeTree({
    "net/unit.yaml": unitFile([], "inputs:", "  name: net"),
    "db/unit.yaml": unitFile(["net"], "inputs:", "  name: db"),
    "cache/unit.yaml": unitFile(["net"], "inputs:", "  name: cache"),
    "app/unit.yaml": unitFile(["db", "cache"], "inputs:", "  name: app"),
    "tools/unit.yaml": unitFile([], "inputs:", "  name: tools"),
  });
}

function setup(root: string, options: RunOptions, overrides: ProjectConfigInput = {}) {
  const config = defaultProjectConfig(root, { parallelism: 4, ...overrides });
  const engine = new FakeEngine();
  const outputStore = new MemoryOutputStore();
  const hookRunner = new FakeHookRunner();
  const logSink = new FakeLogSink(makeTemporaryDirectory("strata-logs-"));
  const runReports = new MemoryRunReports();
  const context = buildRunContext({
    config,
    options: { runId: "run-1", ...options },
    ports: { engine, outputStore, hookRunner, logSink, runReports, clock: new FakeClock() },
  });
  return { context, engine, outputStore, hookRunner, logSink, runReports };
}

function resultOf(run: RunResult, unitId: string): UnitResult | undefined {
  return run.results.find((result) => result.unitId === unitId);
}

function statuses(run: RunResult): Record<string, string> {
  return Object.fromEntries(run.results.map((result) => [result.unitId, result.status]));
}

// =============================================================================
// TESTS
// =============================================================================

describe("runEngine", () => {
  it("runs every unit layer by layer in dependency order", async () => {
    const { context, engine, outputStore, runReports } = setup(sampleTree(), { mode: "apply" });

    const run = await runEngine(context);

    expect(run.status).toBe("succeeded");
    expect(run.plan.layers).toEqual([["net", "tools"], ["cache", "db"], ["app"]]);
    expect(run.results.map((result) => result.unitId)).toEqual([
      "net",
      "tools",
      "cache",
      "db",
      "app",
    ]);
    const called = engine.calledUnits();
    expect(called.slice(0, 2).sort()).toEqual(["net", "tools"]);
    expect(called.slice(2, 4).sort()).toEqual(["cache", "db"]);
    expect(called[4]).toBe("app");
    expect(Array.from(outputStore.entries.keys()).sort()).toEqual([
      "app",
      "cache",
      "db",
      "net",
      "tools",
    ]);
    expect(runReports.reports[0]?.status).toBe("succeeded");
    expect(run.reportPath).toBe("memory://run-1.json");
  });

  it("passes outputs recorded in this run to dependents", async () => {
    const root = makeTree({
      "net/unit.yaml": unitFile([]),
      "db/unit.yaml": unitFile(
        ["net"],
        "inputs:",
        "  name: db",
        "  vpc: '${dependency.net.outputs.vpc_id}'",
      ),
    });
    const { context, engine } = setup(root, { mode: "apply" });
    engine.setOutputs("net", { vpc_id: "vpc-1" });

    const run = await runEngine(context);

    expect(run.status).toBe("succeeded");
    const dbCall = engine.calls.find((call) => call.unitId === "db");
    expect(dbCall?.inputs).toEqual({ name: "db", vpc: "vpc-1" });
  });

  it("substitutes mocks while planning and prefers real outputs when applying", async () => {
    const root = makeTree({
      "net/unit.yaml": unitFile([]),
      "db/unit.yaml": yamlLines(
        "dependencies:",
        "  - name: net",
        "    config_path: ../net",
        "    mock_outputs:",
        "      vpc_id: mock-vpc",
        "inputs:",
        "  vpc: '${dependency.net.outputs.vpc_id}'",
      ),
    });

    const planned = setup(root, { mode: "plan" });
    const planRun = await runEngine(planned.context);
    expect(planned.engine.calls.find((call) => call.unitId === "db")?.inputs).toEqual({
      vpc: "mock-vpc",
    });
    const planDb = resultOf(planRun, "db");
    expect(planDb?.status === "succeeded" ? planDb.substitutions : null).toEqual([
      { dependency: "net", targetId: "net", kind: "mocked" },
    ]);

    const applied = setup(root, { mode: "apply" });
    applied.engine.setOutputs("net", { vpc_id: "vpc-1" });
    const applyRun = await runEngine(applied.context);
    expect(applied.engine.calls.find((call) => call.unitId === "db")?.inputs).toEqual({
      vpc: "vpc-1",
    });
    const applyDb = resultOf(applyRun, "db");
    expect(applyDb?.status === "succeeded" ? applyDb.substitutions : null).toEqual([]);
  });

  it("skips dependents of a failed unit and keeps independent branches running", async () => {
    const { context, engine, hookRunner } = setup(sampleTree(), { mode: "apply" });
    engine.failUnit(
      "db",
      new ExecutionError("terraform apply exited with code 1", { unitId: "db" }),
    );

    const run = await runEngine(context);

    expect(run.status).toBe("failed");
    expect(statuses(run)).toEqual({
      net: "succeeded",
      tools: "succeeded",
      cache: "succeeded",
      db: "failed",
      app: "skipped",
    });
    expect(resultOf(run, "db")).toEqual({
      unitId: "db",
      status: "failed",
      error: { kind: "execution", message: "terraform apply exited with code 1", causes: [] },
      startedAt: STARTED,
      finishedAt: STARTED,
      durationMs: 0,
    });
    expect(resultOf(run, "app")).toEqual({
      unitId: "app",
      status: "skipped",
      reason: "upstream_failed",
      blockedBy: "db",
    });
    expect(engine.calledUnits()).not.toContain("app");
    expect(
      hookRunner.calls.filter((call) => call.phase === "error").map((call) => call.unitId),
    ).toEqual(["db"]);
  });

  it("never runs more units at once than the parallelism limit", async () => {
    const root = makeTree({
      "u1/unit.yaml": unitFile([]),
      "u2/unit.yaml": unitFile([]),
      "u3/unit.yaml": unitFile([]),
      "u4/unit.yaml": unitFile([]),
      "u5/unit.yaml": unitFile([]),
    });
    const { context, engine } = setup(root, { mode: "plan", parallelism: 2 });

    const run = await runEngine(context);

    expect(run.plan.layers).toEqual([["u1", "u2", "u3", "u4", "u5"]]);
    expect(engine.calledUnits().sort()).toEqual(["u1", "u2", "u3", "u4", "u5"]);
    expect(engine.maxActive).toBe(2);
  });

  it("stops starting units after the first failure under fail-fast", async () => {
    const root = makeTree({
      "a/unit.yaml": unitFile([]),
      "b/unit.yaml": unitFile([]),
      "c/unit.yaml": unitFile([]),
      "d/unit.yaml": unitFile(["c"]),
    });
    const { context, engine } = setup(root, {
      mode: "apply",
      parallelism: 1,
      failurePolicy: "fail-fast",
    });
    engine.failUnit("a", new ExecutionError("boom", { unitId: "a" }));

    const run = await runEngine(context);

    expect(engine.calledUnits()).toEqual(["a"]);
    expect(statuses(run)).toEqual({ a: "failed", b: "skipped", c: "skipped", d: "skipped" });
    expect(resultOf(run, "d")).toEqual({ unitId: "d", status: "skipped", reason: "fail_fast" });
    expect(run.status).toBe("failed");
  });

  it("fails units that exceed the timeout and waits for the late engine call", async () => {
    const root = makeTree({ "slow/unit.yaml": unitFile([]) });
    const { context, engine, logSink } = setup(root, { mode: "plan", unitTimeoutMs: 20 });
    engine.delayUnit("slow", 150);

    const run = await runEngine(context);

    const slow = resultOf(run, "slow");
    expect(slow?.status === "failed" ? slow.error : null).toEqual({
      kind: "timeout",
      message: "Unit slow exceeded its 20ms deadline",
      causes: [],
    });
    expect(engine.completed).toEqual(["slow"]);
    expect(logSink.eventsOfType("unit.late_completion")).toEqual([
      { unit_id: "slow", outcome: "succeeded" },
    ]);
  });

  it("lets running units finish and skips the rest when cancelled", async () => {
    const root = makeTree({
      "a/unit.yaml": unitFile([]),
      "b/unit.yaml": unitFile([]),
      "c/unit.yaml": unitFile(["a"]),
    });
    const controller = new AbortController();
    const { context, engine } = setup(root, {
      mode: "apply",
      parallelism: 1,
      stopSignal: controller.signal,
    });
    engine.onApply = (input) => {
      if (input.unitId === "a") controller.abort();
    };

    const run = await runEngine(context);

    expect(run.status).toBe("cancelled");
    expect(statuses(run)).toEqual({ a: "succeeded", b: "skipped", c: "skipped" });
    expect(resultOf(run, "b")).toEqual({ unitId: "b", status: "skipped", reason: "cancelled" });
    expect(engine.calledUnits()).toEqual(["a"]);
  });

  it("destroys dependents before their dependencies and drops stored outputs", async () => {
    const root = makeTree({
      "net/unit.yaml": unitFile([]),
      "db/unit.yaml": unitFile(["net"]),
      "app/unit.yaml": unitFile(["db"]),
    });
    const { context, engine, outputStore } = setup(root, { mode: "destroy" });
    await outputStore.write("net", { vpc_id: "vpc-1" });

    const run = await runEngine(context);

    expect(run.plan.layers).toEqual([["app"], ["db"], ["net"]]);
    expect(engine.calledUnits()).toEqual(["app", "db", "net"]);
    expect(outputStore.removed).toEqual(["app", "db", "net"]);
    expect(outputStore.entries.size).toBe(0);
  });

  it("validates with unknown placeholders and never calls the engine", async () => {
    const root = makeTree({
      "net/unit.yaml": unitFile([]),
      "db/unit.yaml": unitFile(["net"], "inputs:", "  vpc: '${dependency.net.outputs.vpc_id}'"),
    });
    const { context, engine, hookRunner, outputStore } = setup(root, { mode: "validate" });

    const run = await runEngine(context);

    expect(run.status).toBe("succeeded");
    expect(engine.calls).toEqual([]);
    expect(hookRunner.calls).toEqual([]);
    expect(outputStore.entries.size).toBe(0);
    const db = resultOf(run, "db");
    expect(db?.status === "succeeded" ? db.substitutions : null).toEqual([
      { dependency: "net", targetId: "net", kind: "unknown" },
    ]);
  });

  it("fails a unit whose dependency produced no such output", async () => {
    const root = makeTree({
      "net/unit.yaml": unitFile([]),
      "db/unit.yaml": unitFile(["net"], "inputs:", "  vpc: '${dependency.net.outputs.vpc_id}'"),
    });
    const { context, engine } = setup(root, { mode: "apply" });

    const run = await runEngine(context);

    const db = resultOf(run, "db");
    expect(db?.status).toBe("failed");
    expect(db?.status === "failed" ? db.error.kind : null).toBe("missing_output");
    expect(db?.status === "failed" ? db.error.message : "").toContain('no output "vpc_id"');
    expect(engine.calledUnits()).toEqual(["net"]);
  });

  it("fails a unit when a before hook fails and still runs its error hooks", async () => {
    const root = makeTree({ "db/unit.yaml": unitFile([]) });
    const { context, engine, hookRunner } = setup(root, { mode: "apply" });
    hookRunner.failPhase(
      "before",
      "db",
      new HookError("before hook backup failed", { unitId: "db" }),
    );

    const run = await runEngine(context);

    const db = resultOf(run, "db");
    expect(db?.status === "failed" ? db.error.kind : null).toBe("hook");
    expect(engine.calls).toEqual([]);
    expect(hookRunner.calls.map((call) => call.phase)).toEqual(["before", "error"]);
  });

  it("rejects a dependency cycle before any unit runs", async () => {
    const root = makeTree({
      "a/unit.yaml": unitFile(["b"]),
      "b/unit.yaml": unitFile(["a"]),
    });
    const { context, engine, runReports } = setup(root, { mode: "apply" });

    const error = await runEngine(context).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CycleError);
    expect((error as CycleError).cyclePath).toEqual(["a", "b", "a"]);
    expect(engine.calls).toEqual([]);
    expect(runReports.reports).toEqual([]);
  });

  it("rejects bad references in dependency inputs before any unit runs", async () => {
    const undeclared = makeTree({
      "aaa/unit.yaml": unitFile([]),
      "zzz/unit.yaml": unitFile([], "inputs:", "  x: '${dependency.ghost.outputs.x}'"),
    });
    const unknownLocal = makeTree({
      "aaa/unit.yaml": unitFile([]),
      "net/unit.yaml": unitFile([]),
      "zzz/unit.yaml": unitFile(
        ["net"],
        "inputs:",
        "  x: '${dependency.net.outputs.x}-${local.missing}'",
      ),
    });

    for (const [root, message] of [
      [undeclared, "zzz/unit.yaml: inputs.x: dependency.ghost is not declared"],
      [unknownLocal, "zzz/unit.yaml: inputs.x: Unknown reference local.missing"],
    ] as const) {
      const { context, engine, runReports } = setup(root, { mode: "apply" });

      const error = await runEngine(context).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ResolutionError);
      expect(error instanceof ResolutionError ? error.message : "").toBe(message);
      expect(error instanceof ResolutionError ? error.unitId : "").toBe("zzz");
      expect(engine.calls).toEqual([]);
      expect(runReports.reports).toEqual([]);
    }
  });

  describe("skip_outputs dependencies", () => {
    const skipTree = (...inputs: string[]) =>
      makeTree({
        "net/unit.yaml": unitFile([]),
        "app/unit.yaml": yamlLines(
          "dependencies:",
          "  - name: net",
          "    config_path: ../net",
          "    skip_outputs: true",
          "inputs:",
          "  name: app",
          ...inputs,
        ),
      });

    it("orders execution without needing outputs or mocks", async () => {
      const { context, engine } = setup(skipTree(), { mode: "plan" });

      const run = await runEngine(context);

      expect(run.status).toBe("succeeded");
      expect(run.plan.layers).toEqual([["net"], ["app"]]);
      expect(engine.calledUnits()).toEqual(["net", "app"]);
      const app = resultOf(run, "app");
      expect(app?.status === "succeeded" ? app.substitutions : null).toEqual([]);
    });

    it("skips the dependent when the upstream unit fails", async () => {
      const { context, engine } = setup(skipTree(), { mode: "apply" });
      engine.failUnit("net", new ExecutionError("boom", { unitId: "net" }));

      const run = await runEngine(context);

      expect(run.status).toBe("failed");
      expect(resultOf(run, "app")).toEqual({
        unitId: "app",
        status: "skipped",
        reason: "upstream_failed",
        blockedBy: "net",
      });
      expect(engine.calledUnits()).toEqual(["net"]);
    });

    it("rejects reading its outputs before any unit runs", async () => {
      const root = skipTree("  vpc: '${dependency.net.outputs.vpc_id}'");
      const { context, engine } = setup(root, { mode: "plan" });

      const error = await runEngine(context).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ResolutionError);
      expect(error instanceof ResolutionError ? error.message : "").toBe(
        "app/unit.yaml: inputs.vpc: dependency.net sets skip_outputs and exposes no outputs",
      );
      expect(engine.calls).toEqual([]);
    });
  });

  it("restricts the run to targets and their dependencies", async () => {
    const { context, engine } = setup(sampleTree(), {
      mode: "plan",
      targets: ["db"],
      includeDependencies: true,
    });

    const run = await runEngine(context);

    expect(run.plan.order).toEqual(["net", "db"]);
    expect(engine.calledUnits()).toEqual(["net", "db"]);
  });
});
