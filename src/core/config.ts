import { z } from "zod";

export const ExecutionModeSchema = z.enum(["plan", "apply", "destroy", "validate"]);
export type ExecutionMode = z.infer<typeof ExecutionModeSchema>;

export const EngineModeSchema = z.enum(["plan", "apply", "destroy"]);
export type EngineMode = z.infer<typeof EngineModeSchema>;

export const FailurePolicySchema = z.enum(["skip-downstream", "fail-fast"]);
export type FailurePolicy = z.infer<typeof FailurePolicySchema>;

export const HookSchema = z
  .object({
    name: z.string().min(1),
    commands: z.array(z.enum(["plan", "apply", "destroy", "all"])).default(["all"]),
    execute: z.array(z.string().min(1)).min(1),
    continue_on_error: z.boolean().default(false),
  })
  .strict();

export type HookConfig = z.infer<typeof HookSchema>;

export const HooksSchema = z
  .object({
    before: z.array(HookSchema).default([]),
    after: z.array(HookSchema).default([]),
    error: z.array(HookSchema).default([]),
  })
  .strict();

export type HooksConfig = z.infer<typeof HooksSchema>;

export const EngineConfigSchema = z
  .object({
    binary: z.string().min(1).default("terraform"),
    auto_init: z.boolean().default(true),
    retry_attempts: z.number().int().nonnegative().default(0),
    retry_delay_seconds: z.number().nonnegative().default(5),
    retryable_errors: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const ProjectConfigSchema = z
  .object({
    units_root: z.string().min(1).default("."),
    unit_file: z.string().min(1).default("unit.yaml"),
    include_dirs: z.array(z.string()).default([]),
    exclude_dirs: z.array(z.string()).default([]),
    default_tier: z.string().min(1).default("dev"),
    parallelism: z.number().int().positive().default(4),
    failure_policy: FailurePolicySchema.default("skip-downstream"),
    unit_timeout_seconds: z.number().positive().optional(),
    engine: EngineConfigSchema.default({}),
    hooks: HooksSchema.default({}),
    outputs_dir: z.string().min(1).default(".strata/outputs"),
    logs_dir: z.string().min(1).default(".strata/logs"),
    runs_dir: z.string().min(1).default(".strata/runs"),
  })
  .strict();

export type ProjectConfigInput = z.input<typeof ProjectConfigSchema>;

// project_root is filled in by the loader; every *_dir/_root path is absolute after loading.
export type ProjectConfig = z.infer<typeof ProjectConfigSchema> & {
  project_root: string;
};

export function isDryRunMode(mode: ExecutionMode): boolean {
  return mode === "plan" || mode === "validate";
}
