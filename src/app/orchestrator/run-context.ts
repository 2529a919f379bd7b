/**
 * RunContext + composition root for orchestrator runs.
 * Purpose: centralize run-scoped config and injected ports to avoid globals.
 * Assumptions: ports are thin adapters over core modules and are overrideable for tests.
 * Usage: buildRunContext({ config, options }) and call runEngine.
 */

import type { ExecutionMode, FailurePolicy, ProjectConfig } from "../../core/config.js";
import { JsonlLogger, logOrchestratorEvent } from "../../core/logger.js";
import { orchestratorLogPath } from "../../core/paths.js";
import { RunReportStore } from "../../core/run-report-store.js";
import { isoNow } from "../../core/utils.js";
import { ShellHookRunner } from "../../engine/hooks.js";
import { TerraformEngine } from "../../engine/terraform-engine.js";
import { emitArtifacts } from "../../generate/emitter.js";
import { FileOutputStore } from "../../outputs/output-store.js";

import type { OrchestratorPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunOptions = {
  mode: ExecutionMode;
  runId?: string;
  targets?: string[];
  includeDependencies?: boolean;
  parallelism?: number;
  failurePolicy?: FailurePolicy;
  unitTimeoutMs?: number;
  // Stops scheduling: running units finish, the rest are skipped as cancelled.
  stopSignal?: AbortSignal;
  // Forwarded to the engine to interrupt in-flight commands.
  forceSignal?: AbortSignal;
  env?: Readonly<Record<string, string | undefined>>;
};

export type RunContext = {
  config: ProjectConfig;
  options: RunOptions;
  ports: OrchestratorPorts;
};

export type BuildRunContextInput = {
  config: ProjectConfig;
  options: RunOptions;
  ports?: Partial<OrchestratorPorts>;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(config: ProjectConfig): OrchestratorPorts {
  return {
    engine: new TerraformEngine(config.engine),
    outputStore: new FileOutputStore(config.outputs_dir),
    hookRunner: new ShellHookRunner(config.hooks, config.engine.env),
    artifactEmitter: {
      emit: emitArtifacts,
    },
    logSink: {
      createOrchestratorLogger: (projectConfig, runId) =>
        new JsonlLogger(orchestratorLogPath(projectConfig, runId), { runId }),
      logOrchestratorEvent,
    },
    clock: {
      now: () => new Date(),
      isoNow,
    },
    runReports: new RunReportStore(config.runs_dir),
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildRunContext(input: BuildRunContextInput): RunContext {
  const ports: OrchestratorPorts = {
    ...createDefaultPorts(input.config),
    ...input.ports,
  };

  return {
    config: input.config,
    options: input.options,
    ports,
  };
}
