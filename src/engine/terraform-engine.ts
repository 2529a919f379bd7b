/*
Purpose: ProvisioningEngine backed by the terraform (or compatible) CLI.
Assumptions: the unit directory holds the module; inputs travel as an auto-loaded tfvars JSON file.
Usage: new TerraformEngine(config.engine).apply({ unitId, workingDir, inputs, mode: "plan" }).
*/

import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import type { EngineConfig, EngineMode } from "../core/config.js";
import { CancelledError, ExecutionError } from "../core/errors.js";
import { isValueMap, toValue, type ValueMap } from "../resolve/values.js";

import type { EngineApplyInput, EngineApplyResult, ProvisioningEngine } from "./engine.js";

// =============================================================================
// TYPES
// =============================================================================

export const TFVARS_FILE = "strata.auto.tfvars.json";

export type TerraformEngineOptions = {
  sleep?: (ms: number) => Promise<void>;
};

type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

const MODE_ARGS: Record<EngineMode, string[]> = {
  plan: ["plan", "-input=false"],
  apply: ["apply", "-input=false", "-auto-approve"],
  destroy: ["destroy", "-input=false", "-auto-approve"],
};

// =============================================================================
// ENGINE
// =============================================================================

export class TerraformEngine implements ProvisioningEngine {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: EngineConfig,
    options: TerraformEngineOptions = {},
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async apply(input: EngineApplyInput): Promise<EngineApplyResult> {
    await fse.outputJson(path.join(input.workingDir, TFVARS_FILE), input.inputs, { spaces: 2 });

    const initialized = await fse.pathExists(path.join(input.workingDir, ".terraform"));
    if (this.config.auto_init && !initialized) {
      await this.runWithRetry(["init", "-input=false"], input);
    }

    await this.runWithRetry(MODE_ARGS[input.mode], input);

    if (input.mode !== "apply") return { outputs: null };

    const output = await this.runWithRetry(["output", "-json"], input);
    return { outputs: parseTerraformOutputs(output.stdout, input.unitId) };
  }

  private async runWithRetry(args: string[], input: EngineApplyInput): Promise<CommandResult> {
    const maxAttempts = this.config.retry_attempts + 1;

    for (let attempt = 1; ; attempt += 1) {
      const result = await this.run(args, input);
      if (result.exitCode === 0) return result;

      const retryable = this.isRetryable(result.stderr);
      if (!retryable || attempt >= maxAttempts) {
        throw new ExecutionError(
          `${this.config.binary} ${args[0] ?? ""} exited with code ${result.exitCode}` +
            (attempt > 1 ? ` after ${attempt} attempts` : ""),
          { unitId: input.unitId, cause: new Error(lastLines(result.stderr)) },
        );
      }

      await this.sleep(this.config.retry_delay_seconds * 1000 * attempt);
    }
  }

  private async run(args: string[], input: EngineApplyInput): Promise<CommandResult> {
    if (input.signal?.aborted) {
      throw new CancelledError(`Unit ${input.unitId} cancelled before ${args[0] ?? "command"}`, {
        unitId: input.unitId,
      });
    }

    const result = await execa(this.config.binary, args, {
      cwd: input.workingDir,
      env: { ...this.config.env, TF_IN_AUTOMATION: "1" },
      stdio: "pipe",
      reject: false,
      cancelSignal: input.signal,
    });

    if (result.isCanceled) {
      throw new CancelledError(`Unit ${input.unitId} cancelled during ${args[0] ?? "command"}`, {
        unitId: input.unitId,
      });
    }

    return {
      exitCode: result.exitCode ?? 1,
      stdout: typeof result.stdout === "string" ? result.stdout : String(result.stdout ?? ""),
      stderr: typeof result.stderr === "string" ? result.stderr : String(result.stderr ?? ""),
    };
  }

  private isRetryable(stderr: string): boolean {
    return this.config.retryable_errors.some((pattern) => stderr.includes(pattern));
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/** `terraform output -json` prints `{ name: { value, type, sensitive } }`. */
export function parseTerraformOutputs(stdout: string, unitId: string): ValueMap {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout.trim() || "{}");
  } catch (err) {
    throw new ExecutionError("Could not parse `output -json`", { unitId, cause: err });
  }

  const converted = toValue(raw, "outputs");
  if ("error" in converted || !isValueMap(converted.value)) {
    throw new ExecutionError("`output -json` did not return an object", { unitId });
  }

  const outputs: ValueMap = {};
  for (const [name, entry] of Object.entries(converted.value)) {
    outputs[name] = isValueMap(entry) && "value" in entry ? (entry.value ?? null) : entry;
  }
  return outputs;
}

function lastLines(text: string, count = 20): string {
  const lines = text.trimEnd().split("\n");
  return lines.slice(-count).join("\n");
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
