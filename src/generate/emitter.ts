/*
Purpose: render a resolved unit's generate templates and write them into the unit directory.
Assumptions: contents are Handlebars templates rendered against { unit, tier, inputs, locals };
rendering the same resolved unit twice yields the same bytes.
Usage: await emitArtifacts(resolvedUnit); await emitArtifacts(resolvedUnit, { dryRun: true }).
*/

import path from "node:path";

import fse from "fs-extra";
import Handlebars from "handlebars";

import type { GenerateSpec } from "../config-tree/loader.js";
import { ArtifactError } from "../core/errors.js";
import { toPosixPath } from "../core/utils.js";
import type { ResolvedUnit } from "../resolve/resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export type ArtifactStatus = "written" | "unchanged" | "skipped" | "rendered";

export type EmittedArtifact = {
  name: string;
  path: string;
  status: ArtifactStatus;
  contents: string;
};

export type EmitOptions = {
  // Render and run collision checks without touching the filesystem.
  dryRun?: boolean;
};

export const SIGNATURE_TEXT = "Generated by strata. Manual edits will be overwritten.";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function emitArtifacts(
  unit: ResolvedUnit,
  options: EmitOptions = {},
): Promise<EmittedArtifact[]> {
  const emitted: EmittedArtifact[] = [];

  for (const spec of unit.generate) {
    const target = artifactPath(unit, spec);
    const contents = renderArtifact(unit, spec);
    const exists = await fse.pathExists(target);

    if (exists && spec.ifExists === "error") {
      throw new ArtifactError(
        `generate ${spec.name}: ${displayPath(unit, target)} already exists (if_exists: error)`,
        { unitId: unit.id },
      );
    }

    if (exists && spec.ifExists === "skip") {
      emitted.push({ name: spec.name, path: target, status: "skipped", contents });
      continue;
    }

    if (options.dryRun) {
      emitted.push({ name: spec.name, path: target, status: "rendered", contents });
      continue;
    }

    if (exists && (await fse.readFile(target, "utf8")) === contents) {
      emitted.push({ name: spec.name, path: target, status: "unchanged", contents });
      continue;
    }

    try {
      await fse.outputFile(target, contents, "utf8");
    } catch (err) {
      throw new ArtifactError(`generate ${spec.name}: cannot write ${displayPath(unit, target)}`, {
        unitId: unit.id,
        cause: err,
      });
    }
    emitted.push({ name: spec.name, path: target, status: "written", contents });
  }

  return emitted;
}

export function renderArtifact(unit: ResolvedUnit, spec: GenerateSpec): string {
  const template = compileTemplate(unit, spec);

  let body: string;
  try {
    body = template({
      unit: { id: unit.id, name: unit.name, dir: toPosixPath(unit.dir) },
      tier: unit.tier,
      inputs: unit.inputs,
      locals: unit.locals,
    });
  } catch (err) {
    throw new ArtifactError(`generate ${spec.name}: template failed to render`, {
      unitId: unit.id,
      cause: err,
    });
  }

  if (spec.disableSignature) return body;
  return `${spec.commentPrefix}${SIGNATURE_TEXT}\n${body}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

const templates = Handlebars.create();
templates.registerHelper("json", (value: unknown) => JSON.stringify(value ?? null));

const TEMPLATE_CACHE = new Map<string, Handlebars.TemplateDelegate>();

function compileTemplate(unit: ResolvedUnit, spec: GenerateSpec): Handlebars.TemplateDelegate {
  const cached = TEMPLATE_CACHE.get(spec.contents);
  if (cached) return cached;

  // compile() defers parsing to the first render; parse up front so syntax errors read as such.
  try {
    templates.parse(spec.contents);
  } catch (err) {
    throw new ArtifactError(`generate ${spec.name}: template is not valid Handlebars`, {
      unitId: unit.id,
      cause: err,
    });
  }

  const compiled = templates.compile(spec.contents, { noEscape: true, strict: true });
  TEMPLATE_CACHE.set(spec.contents, compiled);
  return compiled;
}

function artifactPath(unit: ResolvedUnit, spec: GenerateSpec): string {
  const target = path.resolve(unit.dir, spec.path);
  const relative = path.relative(unit.dir, target);
  const escapes = relative === ".." || relative.startsWith(`..${path.sep}`);
  if (relative === "" || escapes || path.isAbsolute(relative)) {
    throw new ArtifactError(
      `generate ${spec.name}: path ${spec.path} must stay inside the unit directory`,
      { unitId: unit.id },
    );
  }
  return target;
}

function displayPath(unit: ResolvedUnit, target: string): string {
  return toPosixPath(path.relative(unit.dir, target));
}
