/*
Purpose: append-only JSONL event log for orchestrator runs.
Assumptions: one logger per run; writes are synchronous so events are ordered on disk.
Usage: const log = new JsonlLogger(path, { runId }); logOrchestratorEvent(log, "unit.start", { unit_id }).
*/

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  unit_id?: string;
  payload?: JsonObject;
};

export class JsonlLogger {
  readonly filePath: string;
  private readonly runId?: string;
  private readonly now: () => string;

  constructor(filePath: string, opts: { runId?: string; now?: () => string } = {}) {
    this.filePath = filePath;
    this.runId = opts.runId;
    this.now = opts.now ?? isoNow;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: LogEvent): void {
    const record: JsonObject = { ts: this.now(), type: event.type };
    if (this.runId) record.run_id = this.runId;
    if (event.unit_id) record.unit_id = event.unit_id;
    if (event.payload) record.payload = event.payload;
    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

export function logOrchestratorEvent(
  logger: JsonlLogger,
  type: string,
  payload: JsonObject = {},
): void {
  const unitId = typeof payload.unit_id === "string" ? payload.unit_id : undefined;
  logger.log({ type, unit_id: unitId, payload });
}

export function readJsonlEvents(filePath: string): JsonObject[] {
  if (!fs.existsSync(filePath)) return [];
  return fs
    .readFileSync(filePath, "utf8")
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .flatMap((line) => {
      const parsed: unknown = JSON.parse(line);
      return isJsonObject(parsed) ? [parsed] : [];
    });
}

// JSON.parse only yields JSON values, so any plain object here is a JsonObject.
function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
