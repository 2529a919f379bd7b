import { Command, InvalidArgumentError, Option } from "commander";

import { ExecutionModeSchema, type ExecutionMode } from "../core/config.js";
import { GRAPH_FORMATS, type GraphFormat } from "../graph/render.js";

import { loadConfigForCli } from "./config.js";
import { graphCommand } from "./graph.js";
import { initCommand } from "./init.js";
import { logsCommand } from "./logs.js";
import { renderCommand } from "./render.js";
import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
  color?: boolean;
};

type RunFlags = GlobalOptions & {
  target: string[];
  includeDependencies?: boolean;
  parallelism?: number;
  failFast?: boolean;
  timeout?: number;
  runId?: string;
};

type GraphFlags = GlobalOptions & {
  format: GraphFormat;
  output?: string;
  target: string[];
};

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(): Command {
  const program = new Command();

  program
    .name("strata")
    .description("Compose layered infrastructure configs and run units in dependency order")
    .option("--config <path>", "Path to .strata/config.yaml (default: discovered)")
    .option("--debug", "Print error causes and stack traces", false)
    .option("--no-color", "Disable colored error output");

  registerRunCommands(program);
  registerGraphCommand(program);

  program
    .command("render")
    .description("Print a unit's resolved inputs and rendered artifacts without running it")
    .argument("<unit>", "Unit id, relative to units_root")
    .action(async (unitId: string, _opts, command: Command) => {
      const { config } = loadGlobalConfig(command);
      await renderCommand(config, unitId);
    });

  program
    .command("status")
    .description("Summarize a run report")
    .option("--run-id <id>", "Run ID (default: latest)")
    .action(async (_opts, command: Command) => {
      const flags = command.optsWithGlobals<GlobalOptions & { runId?: string }>();
      const { config } = loadGlobalConfig(command);
      await statusCommand(config, { runId: flags.runId });
    });

  program
    .command("logs")
    .description("Print orchestrator events of a run")
    .option("--run-id <id>", "Run ID (default: latest)")
    .option("--unit <id>", "Only events of this unit")
    .option("--type <glob>", "Filter by event type (supports *)")
    .action(async (_opts, command: Command) => {
      const flags = command.optsWithGlobals<
        GlobalOptions & { runId?: string; unit?: string; type?: string }
      >();
      const { config } = loadGlobalConfig(command);
      await logsCommand(config, { runId: flags.runId, unitId: flags.unit, typeGlob: flags.type });
    });

  program
    .command("init")
    .description("Create .strata/config.yaml in the project root")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: { force?: boolean }) => {
      await initCommand({ force: opts.force });
    });

  return program;
}

// =============================================================================
// RUN COMMANDS
// =============================================================================

function registerRunCommands(program: Command): void {
  const run = program
    .command("run")
    .description("Run every selected unit in the given mode")
    .argument("<mode>", `One of: ${ExecutionModeSchema.options.join(", ")}`, parseMode);
  addRunOptions(run).action(async (mode: ExecutionMode, _opts, command: Command) => {
    await runFromCommand(mode, command);
  });

  for (const mode of ExecutionModeSchema.options) {
    const alias = program.command(mode).description(`Alias for \`run ${mode}\``);
    addRunOptions(alias).action(async (_opts, command: Command) => {
      await runFromCommand(mode, command);
    });
  }
}

function addRunOptions(command: Command): Command {
  return command
    .option("--target <glob>", "Only units matching the glob (repeatable)", collect, [])
    .option("--include-dependencies", "Also run the dependencies of targeted units", false)
    .option("--parallelism <n>", "Max units running at once", parsePositiveInt)
    .option("--fail-fast", "Skip everything not yet started after the first failure")
    .option("--timeout <seconds>", "Per-unit engine timeout", parsePositiveNumber)
    .option("--run-id <id>", "Run ID (default: timestamp)");
}

async function runFromCommand(mode: ExecutionMode, command: Command): Promise<void> {
  const flags = command.optsWithGlobals<RunFlags>();
  const { config } = loadGlobalConfig(command);
  await runCommand(config, {
    mode,
    runId: flags.runId,
    targets: flags.target.length > 0 ? flags.target : undefined,
    includeDependencies: flags.includeDependencies,
    parallelism: flags.parallelism,
    failFast: flags.failFast,
    timeoutSeconds: flags.timeout,
  });
}

// =============================================================================
// GRAPH
// =============================================================================

function registerGraphCommand(program: Command): void {
  program
    .command("graph")
    .description("Render the dependency graph")
    .addOption(
      new Option("--format <format>", "Output format")
        .choices([...GRAPH_FORMATS])
        .default("dot"),
    )
    .option("--output <path>", "Write to a file instead of stdout")
    .option("--target <glob>", "Only units matching the glob and their dependencies", collect, [])
    .action(async (_opts, command: Command) => {
      const flags = command.optsWithGlobals<GraphFlags>();
      const { config } = loadGlobalConfig(command);
      await graphCommand(config, {
        format: flags.format,
        output: flags.output,
        targets: flags.target.length > 0 ? flags.target : undefined,
      });
    });
}

// =============================================================================
// HELPERS
// =============================================================================

function loadGlobalConfig(command: Command): ReturnType<typeof loadConfigForCli> {
  const flags = command.optsWithGlobals<GlobalOptions>();
  return loadConfigForCli({ explicitConfigPath: flags.config });
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseMode(value: string): ExecutionMode {
  const parsed = ExecutionModeSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${ExecutionModeSchema.options.join(", ")}.`);
  }
  return parsed.data;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
}
