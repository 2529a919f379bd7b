import { describe, expect, it } from "vitest";

import { ExecutionError, OrchestratorError } from "../../core/errors.js";

import { toUnitFailure, UnitResultTable } from "./unit-results.js";

describe("UnitResultTable", () => {
  it("records each unit once", () => {
    const table = new UnitResultTable();
    table.record({ unitId: "a", status: "skipped", reason: "cancelled" });

    expect(() =>
      table.record({ unitId: "a", status: "skipped", reason: "fail_fast" }),
    ).toThrow(OrchestratorError);
    expect(table.get("a")).toEqual({ unitId: "a", status: "skipped", reason: "cancelled" });
  });

  it("exposes outputs only for succeeded units", () => {
    const table = new UnitResultTable();
    table.record({
      unitId: "net",
      status: "succeeded",
      outputs: { vpc_id: "vpc-1" },
      substitutions: [],
      artifacts: [],
      startedAt: "2024-01-01T00:00:00.000Z",
      finishedAt: "2024-01-01T00:00:01.000Z",
      durationMs: 1000,
    });
    table.record({ unitId: "db", status: "skipped", reason: "upstream_failed" });

    expect(table.passOutputs("net")).toEqual({ vpc_id: "vpc-1" });
    expect(table.passOutputs("db")).toBeNull();
    expect(table.passOutputs("missing")).toBeNull();
    expect(table.inOrder(["db", "missing", "net"]).map((r) => r.unitId)).toEqual(["db", "net"]);
  });
});

describe("toUnitFailure", () => {
  it("keeps the kind, the message and the causes below it", () => {
    const error = new ExecutionError("terraform apply exited with code 1", {
      unitId: "db",
      cause: new Error("Error: quota exceeded"),
    });

    expect(toUnitFailure(error)).toEqual({
      kind: "execution",
      message: "terraform apply exited with code 1",
      causes: ["Error: Error: quota exceeded"],
    });
  });

  it("treats foreign errors as internal", () => {
    expect(toUnitFailure(new TypeError("bad"))).toEqual({
      kind: "internal",
      message: "bad",
      causes: [],
    });
  });
});
