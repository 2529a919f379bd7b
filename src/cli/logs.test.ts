import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  makeTemporaryDirectory,
  registerTreeTempCleanup,
} from "../config-tree/tree.test-helpers.js";
import { JsonlLogger, logOrchestratorEvent, readJsonlEvents } from "../core/logger.js";

import { filterEvents } from "./logs.js";

registerTreeTempCleanup();

function writeEvents(): string {
  const logPath = path.join(makeTemporaryDirectory("strata-logs-"), "orchestrator.jsonl");
  const logger = new JsonlLogger(logPath, { runId: "run-1", now: () => "2024-01-01T00:00:00Z" });
  logOrchestratorEvent(logger, "run.start", { mode: "apply" });
  logOrchestratorEvent(logger, "unit.complete", { unit_id: "net" });
  logOrchestratorEvent(logger, "unit.failed", { unit_id: "db", error: "boom" });
  return logPath;
}

describe("orchestrator event log", () => {
  it("reads back every event with run and unit ids", () => {
    const events = readJsonlEvents(writeEvents());

    expect(events).toEqual([
      {
        ts: "2024-01-01T00:00:00Z",
        type: "run.start",
        run_id: "run-1",
        payload: { mode: "apply" },
      },
      {
        ts: "2024-01-01T00:00:00Z",
        type: "unit.complete",
        run_id: "run-1",
        unit_id: "net",
        payload: { unit_id: "net" },
      },
      {
        ts: "2024-01-01T00:00:00Z",
        type: "unit.failed",
        run_id: "run-1",
        unit_id: "db",
        payload: { unit_id: "db", error: "boom" },
      },
    ]);
  });

  it("filters by type glob and unit", () => {
    const events = readJsonlEvents(writeEvents());

    expect(filterEvents(events, { typeGlob: "unit.*" }).map((e) => e.type)).toEqual([
      "unit.complete",
      "unit.failed",
    ]);
    expect(filterEvents(events, { unitId: "db" }).map((e) => e.type)).toEqual(["unit.failed"]);
    expect(filterEvents(events, { typeGlob: "run.*", unitId: "db" })).toEqual([]);
  });

  it("returns no events for a missing log", () => {
    expect(readJsonlEvents("/nonexistent/strata/orchestrator.jsonl")).toEqual([]);
  });
});
