import { z } from "zod";

import { ExecutionModeSchema } from "../core/config.js";

// Values stay `unknown` here; the loader compiles them into expressions.
const ValueRecordSchema = z.record(z.unknown());

export const IncludeSchema = z.union([
  z.object({ path: z.string().min(1) }).strict(),
  z.object({ find_in_parent: z.string().min(1) }).strict(),
]);

export type IncludeEntry = z.infer<typeof IncludeSchema>;

export const DependencySchema = z
  .object({
    name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, "must be an identifier"),
    config_path: z.string().min(1),
    skip_outputs: z.boolean().default(false),
    mock_outputs: ValueRecordSchema.optional(),
    mock_outputs_allowed_modes: z.array(ExecutionModeSchema).optional(),
    enabled: z.boolean().default(true),
  })
  .strict();

export type DependencyEntry = z.infer<typeof DependencySchema>;

export const IfExistsSchema = z.enum(["overwrite", "skip", "error"]);
export type IfExists = z.infer<typeof IfExistsSchema>;

export const GenerateSchema = z
  .object({
    name: z.string().min(1),
    path: z.string().min(1),
    if_exists: IfExistsSchema.default("overwrite"),
    contents: z.string(),
    comment_prefix: z.string().default("# "),
    disable_signature: z.boolean().default(false),
  })
  .strict();

export type GenerateEntry = z.infer<typeof GenerateSchema>;

export const UnitFileSchema = z
  .object({
    tier: z.string().min(1).optional(),
    include: z.array(IncludeSchema).default([]),
    locals: ValueRecordSchema.default({}),
    inputs: ValueRecordSchema.default({}),
    dependencies: z.array(DependencySchema).default([]),
    generate: z.array(GenerateSchema).default([]),
  })
  .strict();

export type UnitFile = z.infer<typeof UnitFileSchema>;
