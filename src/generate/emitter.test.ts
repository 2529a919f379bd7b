import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import type { GenerateSpec } from "../config-tree/loader.js";
import {
  makeTemporaryDirectory,
  registerTreeTempCleanup,
} from "../config-tree/tree.test-helpers.js";
import { ArtifactError } from "../core/errors.js";
import type { ResolvedUnit } from "../resolve/resolver.js";
import { UnknownValue, type ValueMap } from "../resolve/values.js";

import { emitArtifacts, renderArtifact } from "./emitter.js";

registerTreeTempCleanup();

// =============================================================================
// HELPERS
// =============================================================================

function template(overrides: Partial<GenerateSpec> & { contents: string }): GenerateSpec {
  return {
    name: "backend",
    path: "backend.tf",
    ifExists: "overwrite",
    commentPrefix: "# ",
    disableSignature: false,
    ...overrides,
  };
}

function resolvedUnit(generate: GenerateSpec[], inputs: ValueMap = {}): ResolvedUnit {
  const dir = makeTemporaryDirectory("strata-emit-");
  return {
    id: "prod/app",
    name: "app",
    dir,
    tier: "prod",
    locals: { region: "eu-west-1" },
    inputs,
    dependencies: [],
    generate,
    substitutions: [],
  };
}

const BACKEND = 'bucket = "{{inputs.bucket}}"\nkey    = "{{unit.id}}/terraform.tfstate"\n';

// =============================================================================
// TESTS
// =============================================================================

describe("emitArtifacts", () => {
  it("writes rendered templates with a signature line", async () => {
    const unit = resolvedUnit([template({ contents: BACKEND })], { bucket: "state-bucket" });

    const emitted = await emitArtifacts(unit);

    expect(emitted.map((artifact) => artifact.status)).toEqual(["written"]);
    expect(fs.readFileSync(path.join(unit.dir, "backend.tf"), "utf8")).toBe(
      [
        "# Generated by strata. Manual edits will be overwritten.",
        'bucket = "state-bucket"',
        'key    = "prod/app/terraform.tfstate"',
        "",
      ].join("\n"),
    );
  });

  it("reports an identical second render as unchanged", async () => {
    const unit = resolvedUnit([template({ contents: BACKEND })], { bucket: "state-bucket" });

    const first = await emitArtifacts(unit);
    const second = await emitArtifacts(unit);

    expect(second[0]?.status).toBe("unchanged");
    expect(second[0]?.contents).toBe(first[0]?.contents);
  });

  it("leaves existing files alone with if_exists: skip", async () => {
    const unit = resolvedUnit([template({ contents: BACKEND, ifExists: "skip" })], {
      bucket: "state-bucket",
    });
    fs.writeFileSync(path.join(unit.dir, "backend.tf"), "manual\n", "utf8");

    const emitted = await emitArtifacts(unit);

    expect(emitted[0]?.status).toBe("skipped");
    expect(fs.readFileSync(path.join(unit.dir, "backend.tf"), "utf8")).toBe("manual\n");
  });

  it("rejects existing files with if_exists: error", async () => {
    const unit = resolvedUnit([template({ contents: BACKEND, ifExists: "error" })], {
      bucket: "state-bucket",
    });
    fs.writeFileSync(path.join(unit.dir, "backend.tf"), "manual\n", "utf8");

    const error = await emitArtifacts(unit).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ArtifactError);
    expect((error as ArtifactError).message).toBe(
      "generate backend: backend.tf already exists (if_exists: error)",
    );
    expect((error as ArtifactError).unitId).toBe("prod/app");
  });

  it("rejects paths outside the unit directory", async () => {
    const unit = resolvedUnit([template({ contents: "x", path: "../shared/backend.tf" })]);

    await expect(emitArtifacts(unit)).rejects.toThrow(
      "generate backend: path ../shared/backend.tf must stay inside the unit directory",
    );
  });

  it("renders without writing in dry-run mode", async () => {
    const unit = resolvedUnit([template({ contents: BACKEND })], { bucket: "state-bucket" });

    const emitted = await emitArtifacts(unit, { dryRun: true });

    expect(emitted[0]?.status).toBe("rendered");
    expect(fs.existsSync(path.join(unit.dir, "backend.tf"))).toBe(false);
  });
});

describe("renderArtifact", () => {
  it("serializes values with the json helper and honors disable_signature", () => {
    const spec = template({
      contents: "tags = {{json inputs.tags}}\nregion = {{locals.region}} ({{tier}})\n",
      disableSignature: true,
    });
    const unit = resolvedUnit([spec], { tags: { team: "core", cost: 3 } });

    expect(renderArtifact(unit, spec)).toBe(
      'tags = {"team":"core","cost":3}\nregion = eu-west-1 (prod)\n',
    );
  });

  it("uses the configured comment prefix for the signature", () => {
    const spec = template({ contents: "{}\n", commentPrefix: "// " });
    const unit = resolvedUnit([spec]);

    expect(renderArtifact(unit, spec)).toBe(
      "// Generated by strata. Manual edits will be overwritten.\n{}\n",
    );
  });

  it("renders unknown placeholders while validating", () => {
    const spec = template({ contents: "vpc = {{inputs.vpc_id}}", disableSignature: true });
    const unit = resolvedUnit([spec], {
      vpc_id: new UnknownValue("dependency.vpc.outputs.id"),
    });

    expect(renderArtifact(unit, spec)).toBe("vpc = <unknown: dependency.vpc.outputs.id>");
  });

  it("fails on references the unit does not define", () => {
    const spec = template({ contents: "{{inputs.missing}}" });
    const unit = resolvedUnit([spec]);

    expect(() => renderArtifact(unit, spec)).toThrow("generate backend: template failed to render");
  });

  it("reports template syntax errors", () => {
    const spec = template({ name: "broken", contents: "{{#if inputs.x}}" });
    const unit = resolvedUnit([spec]);

    expect(() => renderArtifact(unit, spec)).toThrow(
      "generate broken: template is not valid Handlebars",
    );
  });
});
