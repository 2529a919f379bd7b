import type { ProjectConfig } from "../core/config.js";
import {
  RunReportStore,
  summarizeRunReport,
  type RunReportSummary,
} from "../core/run-report-store.js";

export async function statusCommand(
  config: ProjectConfig,
  opts: { runId?: string },
): Promise<void> {
  const store = new RunReportStore(config.runs_dir);
  const runId = opts.runId ?? (await store.findLatestRunId());
  if (!runId || !(await store.exists(runId))) {
    printRunNotFound(opts.runId);
    return;
  }

  const summary = summarizeRunReport(await store.load(runId));
  printRunSummary(summary);
  printProblemTable(summary);
}

function printRunNotFound(requestedRunId?: string): void {
  const notFound = requestedRunId ? `Run ${requestedRunId} not found.` : "No runs found.";

  console.log(notFound);
  console.log("Start a run with: strata plan");
  process.exitCode = 1;
}

function printRunSummary(summary: RunReportSummary): void {
  console.log(`Run: ${summary.runId}`);
  console.log(`Mode: ${summary.mode}`);
  console.log(`Status: ${summary.status}`);
  console.log(`Started: ${summary.startedAt}`);
  console.log(`Finished: ${summary.finishedAt}`);
  console.log("");
  console.log(formatUnitCounts(summary));
  console.log("");
}

function formatUnitCounts(summary: RunReportSummary): string {
  const counts = summary.unitCounts;
  const total = counts.succeeded + counts.failed + counts.skipped;
  const parts = [
    `total=${total}`,
    `succeeded=${counts.succeeded}`,
    `failed=${counts.failed}`,
    `skipped=${counts.skipped}`,
  ];
  return `Units: ${parts.join("  ")}`;
}

function printProblemTable(summary: RunReportSummary): void {
  const rows = [
    ...summary.failures.map((f) => ({
      id: f.unitId,
      status: "failed",
      detail: `${f.kind}: ${f.message}`,
    })),
    ...summary.skipped.map((s) => ({
      id: s.unitId,
      status: "skipped",
      detail: s.blockedBy ? `${s.reason} (blocked by ${s.blockedBy})` : s.reason,
    })),
  ];

  if (rows.length === 0) return;

  const idWidth = Math.max("Unit".length, ...rows.map((r) => r.id.length));
  const statusWidth = Math.max("Status".length, ...rows.map((r) => r.status.length));

  console.log(`  ${pad("Unit", idWidth)}  ${pad("Status", statusWidth)}  Detail`);
  for (const row of rows) {
    console.log(`  ${pad(row.id, idWidth)}  ${pad(row.status, statusWidth)}  ${row.detail}`);
  }
}

function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}
