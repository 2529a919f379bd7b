import { minimatch } from "minimatch";

import type { ProjectConfig } from "../core/config.js";
import { readJsonlEvents, type JsonObject } from "../core/logger.js";
import { orchestratorLogPath } from "../core/paths.js";
import { RunReportStore } from "../core/run-report-store.js";

export type LogsQuery = {
  runId?: string;
  unitId?: string;
  typeGlob?: string;
};

export async function logsCommand(config: ProjectConfig, opts: LogsQuery): Promise<void> {
  const runId = opts.runId ?? (await new RunReportStore(config.runs_dir).findLatestRunId());
  if (!runId) {
    console.log("No runs found.");
    process.exitCode = 1;
    return;
  }

  const logPath = orchestratorLogPath(config, runId);
  const events = filterEvents(readJsonlEvents(logPath), opts);
  if (events.length === 0) {
    console.log(`No matching events in ${logPath}`);
    return;
  }

  for (const event of events) {
    console.log(JSON.stringify(event));
  }
}

export function filterEvents(events: JsonObject[], query: LogsQuery): JsonObject[] {
  return events.filter((event) => {
    if (query.unitId && event.unit_id !== query.unitId) return false;
    if (query.typeGlob) {
      const type = typeof event.type === "string" ? event.type : "";
      if (!minimatch(type, query.typeGlob)) return false;
    }
    return true;
  });
}
