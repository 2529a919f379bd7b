import { execa } from "execa";

import type { EngineMode, HookConfig, HooksConfig } from "../core/config.js";
import { HookError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type HookPhase = "before" | "after" | "error";

export type HookRunInput = {
  phase: HookPhase;
  unitId: string;
  workingDir: string;
  mode: EngineMode;
  signal?: AbortSignal;
};

export type HookOutcome = {
  name: string;
  command: string;
  exitCode: number;
  ignored: boolean;
};

export interface HookRunner {
  run(input: HookRunInput): Promise<HookOutcome[]>;
}

// =============================================================================
// SHELL HOOKS
// =============================================================================

/** Runs project hooks through the shell in the unit directory, in declaration order. */
export class ShellHookRunner implements HookRunner {
  constructor(
    private readonly hooks: HooksConfig,
    private readonly env: Record<string, string> = {},
  ) {}

  async run(input: HookRunInput): Promise<HookOutcome[]> {
    const outcomes: HookOutcome[] = [];

    for (const hook of selectHooks(this.hooks[input.phase], input.mode)) {
      for (const command of hook.execute) {
        const result = await execa(command, {
          shell: true,
          cwd: input.workingDir,
          env: {
            ...this.env,
            STRATA_UNIT_ID: input.unitId,
            STRATA_MODE: input.mode,
            STRATA_HOOK_PHASE: input.phase,
          },
          stdio: "pipe",
          reject: false,
          cancelSignal: input.signal,
        });

        const exitCode = result.exitCode ?? 1;
        if (exitCode === 0) {
          outcomes.push({ name: hook.name, command, exitCode, ignored: false });
          continue;
        }

        if (!hook.continue_on_error) {
          const stderr =
            typeof result.stderr === "string" ? result.stderr : String(result.stderr ?? "");
          throw new HookError(
            `${input.phase} hook ${hook.name} failed: \`${command}\` exited with code ${exitCode}`,
            { unitId: input.unitId, cause: new Error(stderr.trim() || `exit code ${exitCode}`) },
          );
        }
        outcomes.push({ name: hook.name, command, exitCode, ignored: true });
        break;
      }
    }

    return outcomes;
  }
}

export function selectHooks(hooks: HookConfig[], mode: EngineMode): HookConfig[] {
  return hooks.filter((hook) => hook.commands.includes("all") || hook.commands.includes(mode));
}
