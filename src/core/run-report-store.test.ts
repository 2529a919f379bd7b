import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  makeTemporaryDirectory,
  registerTreeTempCleanup,
} from "../config-tree/tree.test-helpers.js";

import { LoadError } from "./errors.js";
import { RunReportStore, summarizeRunReport, type RunReport } from "./run-report-store.js";

registerTreeTempCleanup();

function report(runId: string, overrides: Partial<RunReport> = {}): RunReport {
  return {
    run_id: runId,
    mode: "apply",
    status: "failed",
    started_at: "2024-01-01T00:00:00.000Z",
    finished_at: "2024-01-01T00:00:30.000Z",
    plan: { order: ["net", "db", "app", "tools"], layers: [["net", "tools"], ["db"], ["app"]] },
    units: [
      { unit_id: "net", status: "succeeded", duration_ms: 12 },
      { unit_id: "tools", status: "succeeded", duration_ms: 3 },
      {
        unit_id: "db",
        status: "failed",
        duration_ms: 40,
        error: { kind: "timeout", message: "Unit db timed out after 30000ms", causes: [] },
      },
      { unit_id: "app", status: "skipped", reason: "upstream_failed", blocked_by: "db" },
    ],
    ...overrides,
  };
}

describe("RunReportStore", () => {
  it("saves and loads a report by run id", async () => {
    const store = new RunReportStore(makeTemporaryDirectory("strata-runs-"));

    const filePath = await store.save(report("20240101T000000Z"));

    expect(path.basename(filePath)).toBe("20240101T000000Z.json");
    await expect(store.load("20240101T000000Z")).resolves.toEqual(report("20240101T000000Z"));
  });

  it("finds the latest run by sortable id", async () => {
    const store = new RunReportStore(makeTemporaryDirectory("strata-runs-"));
    await store.save(report("20240102T000000Z"));
    await store.save(report("20240101T000000Z"));

    await expect(store.findLatestRunId()).resolves.toBe("20240102T000000Z");
  });

  it("returns null when no runs directory exists", async () => {
    const root = makeTemporaryDirectory("strata-runs-");
    const store = new RunReportStore(path.join(root, "missing"));

    await expect(store.findLatestRunId()).resolves.toBeNull();
  });

  it("rejects a missing or malformed report", async () => {
    const runsDir = makeTemporaryDirectory("strata-runs-");
    const store = new RunReportStore(runsDir);
    fs.writeFileSync(path.join(runsDir, "bad.json"), JSON.stringify({ run_id: "bad" }), "utf8");

    await expect(store.load("nope")).rejects.toBeInstanceOf(LoadError);
    await expect(store.load("bad")).rejects.toThrow(/is malformed/);
  });
});

describe("summarizeRunReport", () => {
  it("counts units and lists failures and skips", () => {
    expect(summarizeRunReport(report("run-1"))).toEqual({
      runId: "run-1",
      mode: "apply",
      status: "failed",
      startedAt: "2024-01-01T00:00:00.000Z",
      finishedAt: "2024-01-01T00:00:30.000Z",
      unitCounts: { succeeded: 2, failed: 1, skipped: 1 },
      failures: [{ unitId: "db", kind: "timeout", message: "Unit db timed out after 30000ms" }],
      skipped: [{ unitId: "app", reason: "upstream_failed", blockedBy: "db" }],
    });
  });
});
