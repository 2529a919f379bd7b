import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import { EngineConfigSchema } from "../core/config.js";
import { loadProjectConfig } from "../core/config-loader.js";
import { toUserFacingError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { TerraformEngine } from "../engine/terraform-engine.js";

import { renderCliError } from "./error-output.js";

// =============================================================================
// TEST SETUP
// =============================================================================

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);
const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;

  execaMock.mockReset();
});

// =============================================================================
// HELPERS
// =============================================================================

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

async function failingPlan(): Promise<unknown> {
  execaMock.mockResolvedValueOnce({
    stdout: "",
    stderr: "Error: Unsupported argument\n",
    exitCode: 1,
  } as Awaited<ReturnType<typeof execa>>);

  const engine = new TerraformEngine(EngineConfigSchema.parse({ auto_init: false }));
  return engine
    .apply({ unitId: "prod/app", workingDir: makeTempDir("engine-"), inputs: {}, mode: "plan" })
    .catch((err: unknown) => err);
}

// =============================================================================
// TESTS
// =============================================================================

describe("error mapping", () => {
  it("maps a failing engine command to an execution error naming the unit", async () => {
    const userError = toUserFacingError(await failingPlan());

    expect(userError.code).toBe(USER_FACING_ERROR_CODES.execution);
    expect(userError.title).toBe("Execution failed (unit prod/app).");
    expect(userError.message).toBe("terraform plan exited with code 1");
  });

  it("renders short output with the unit line and no causes", async () => {
    const lines = renderCliError(await failingPlan(), { useColor: false });

    expect(lines).toEqual([
      "error: Execution failed (unit prod/app).",
      "  terraform plan exited with code 1",
      "  unit: prod/app",
    ]);
  });

  it("walks the causal chain in debug mode", async () => {
    const lines = renderCliError(await failingPlan(), { useColor: false, debug: true });

    expect(lines).toContain("  code: EXECUTION_ERROR");
    expect(lines).toContain("  caused by: Error: Error: Unsupported argument");
  });

  it("maps invalid YAML config to a config error with a hint", () => {
    const root = makeTempDir("config-");
    const configPath = path.join(root, ".strata", "config.yaml");
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, "units_root: [\n", "utf8");

    const error = (() => {
      try {
        loadProjectConfig(configPath);
        return null;
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(UserFacingError);
    expect(renderCliError(error, { useColor: false })).toEqual([
      "error: Project config invalid.",
      `  Config file is not valid YAML. (${configPath})`,
      "  hint: Fix the highlighted keys in .strata/config.yaml.",
    ]);
  });

  it("maps unknown values to a generic error", () => {
    const userError = toUserFacingError("boom");

    expect(userError.code).toBe(USER_FACING_ERROR_CODES.unknown);
    expect(userError.title).toBe("Unexpected error");
    expect(userError.message).toBe("boom");
  });
});
