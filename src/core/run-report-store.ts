/*
Purpose: persist one JSON report per run under runs_dir and summarize it for `strata status`.
Assumptions: reports are written once, at the end of a run; keys are snake_case on disk.
Usage: const store = new RunReportStore(config.runs_dir); await store.save(report);
       summarizeRunReport(await store.load(runId)).
*/

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { ExecutionModeSchema } from "./config.js";
import { LoadError } from "./errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const RunStatusSchema = z.enum(["succeeded", "failed", "cancelled"]);
export type RunStatus = z.infer<typeof RunStatusSchema>;

const UnitReportSchema = z.object({
  unit_id: z.string(),
  status: z.enum(["succeeded", "failed", "skipped"]),
  duration_ms: z.number().optional(),
  reason: z.enum(["upstream_failed", "fail_fast", "cancelled"]).optional(),
  blocked_by: z.string().optional(),
  error: z
    .object({
      kind: z.string(),
      message: z.string(),
      causes: z.array(z.string()),
    })
    .optional(),
  substitutions: z
    .array(
      z.object({
        dependency: z.string(),
        target_id: z.string(),
        kind: z.enum(["mocked", "unknown"]),
      }),
    )
    .optional(),
  artifacts: z
    .array(z.object({ name: z.string(), path: z.string(), status: z.string() }))
    .optional(),
});

export type UnitReport = z.infer<typeof UnitReportSchema>;

export const RunReportSchema = z.object({
  run_id: z.string(),
  mode: ExecutionModeSchema,
  status: RunStatusSchema,
  started_at: z.string(),
  finished_at: z.string(),
  plan: z.object({
    order: z.array(z.string()),
    layers: z.array(z.array(z.string())),
  }),
  units: z.array(UnitReportSchema),
});

export type RunReport = z.infer<typeof RunReportSchema>;

export type RunReportSummary = {
  runId: string;
  mode: RunReport["mode"];
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  unitCounts: Record<UnitReport["status"], number>;
  failures: Array<{ unitId: string; kind: string; message: string }>;
  skipped: Array<{ unitId: string; reason: string; blockedBy?: string }>;
};

// =============================================================================
// STORE
// =============================================================================

export class RunReportStore {
  constructor(private readonly runsDir: string) {}

  pathFor(runId: string): string {
    return path.join(this.runsDir, `${runId}.json`);
  }

  async save(report: RunReport): Promise<string> {
    const filePath = this.pathFor(report.run_id);
    await fse.outputJson(filePath, report, { spaces: 2 });
    return filePath;
  }

  async exists(runId: string): Promise<boolean> {
    return fse.pathExists(this.pathFor(runId));
  }

  async load(runId: string): Promise<RunReport> {
    const filePath = this.pathFor(runId);
    if (!(await fse.pathExists(filePath))) {
      throw new LoadError(`No run report for ${runId} at ${filePath}`, { filePath });
    }

    const raw: unknown = await fse.readJson(filePath);
    const parsed = RunReportSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LoadError(`Run report ${filePath} is malformed`, {
        filePath,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async findLatestRunId(): Promise<string | null> {
    if (!(await fse.pathExists(this.runsDir))) return null;

    const entries = await fse.readdir(this.runsDir);
    const runIds = entries
      .filter((entry) => entry.endsWith(".json"))
      .map((entry) => entry.slice(0, -".json".length))
      .sort();
    return runIds.at(-1) ?? null;
  }
}

// =============================================================================
// SUMMARY
// =============================================================================

export function summarizeRunReport(report: RunReport): RunReportSummary {
  const unitCounts: RunReportSummary["unitCounts"] = { succeeded: 0, failed: 0, skipped: 0 };
  const failures: RunReportSummary["failures"] = [];
  const skipped: RunReportSummary["skipped"] = [];

  for (const unit of report.units) {
    unitCounts[unit.status] += 1;
    if (unit.status === "failed") {
      failures.push({
        unitId: unit.unit_id,
        kind: unit.error?.kind ?? "internal",
        message: unit.error?.message ?? "",
      });
    }
    if (unit.status === "skipped") {
      skipped.push({
        unitId: unit.unit_id,
        reason: unit.reason ?? "upstream_failed",
        ...(unit.blocked_by ? { blockedBy: unit.blocked_by } : {}),
      });
    }
  }

  return {
    runId: report.run_id,
    mode: report.mode,
    status: report.status,
    startedAt: report.started_at,
    finishedAt: report.finished_at,
    unitCounts,
    failures,
    skipped,
  };
}
