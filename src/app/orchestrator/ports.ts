import type { ProjectConfig } from "../../core/config.js";
import type { JsonObject, JsonlLogger } from "../../core/logger.js";
import type { RunReport } from "../../core/run-report-store.js";
import type { ProvisioningEngine } from "../../engine/engine.js";
import type { HookRunner } from "../../engine/hooks.js";
import type { EmitOptions, EmittedArtifact } from "../../generate/emitter.js";
import type { OutputStore } from "../../outputs/output-store.js";
import type { ResolvedUnit } from "../../resolve/resolver.js";

// =============================================================================
// PORTS
// =============================================================================

export type ArtifactEmitter = {
  emit(unit: ResolvedUnit, options: EmitOptions): Promise<EmittedArtifact[]>;
};

export type LogSink = {
  createOrchestratorLogger(config: ProjectConfig, runId: string): JsonlLogger;
  logOrchestratorEvent(logger: JsonlLogger, type: string, payload?: JsonObject): void;
};

export type Clock = {
  now(): Date;
  isoNow(): string;
};

export type RunReportRepository = {
  save(report: RunReport): Promise<string>;
};

export type OrchestratorPorts = {
  engine: ProvisioningEngine;
  outputStore: OutputStore;
  hookRunner: HookRunner;
  artifactEmitter: ArtifactEmitter;
  logSink: LogSink;
  clock: Clock;
  runReports: RunReportRepository;
};
