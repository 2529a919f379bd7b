import fse from "fs-extra";
import { z } from "zod";

import { LoadError } from "../core/errors.js";
import { unitOutputsPath } from "../core/paths.js";
import { isoNow } from "../core/utils.js";
import { isValueMap, toValue, type ValueMap } from "../resolve/values.js";

// =============================================================================
// TYPES
// =============================================================================

export interface OutputStore {
  read(unitId: string): Promise<ValueMap | null>;
  write(unitId: string, outputs: ValueMap): Promise<void>;
  remove(unitId: string): Promise<void>;
}

const StoredOutputsSchema = z.object({
  unit_id: z.string(),
  saved_at: z.string(),
  outputs: z.record(z.unknown()),
});

// =============================================================================
// FILE STORE
// =============================================================================

/** One JSON file per unit under the outputs directory (`<unit-slug>.json`). */
export class FileOutputStore implements OutputStore {
  constructor(
    private readonly outputsDir: string,
    private readonly now: () => string = isoNow,
  ) {}

  pathFor(unitId: string): string {
    return unitOutputsPath(this.outputsDir, unitId);
  }

  async read(unitId: string): Promise<ValueMap | null> {
    const filePath = this.pathFor(unitId);
    if (!(await fse.pathExists(filePath))) return null;

    let raw: unknown;
    try {
      raw = await fse.readJson(filePath);
    } catch (err) {
      throw new LoadError(`Stored outputs for ${unitId} are not valid JSON`, {
        unitId,
        filePath,
        cause: err,
      });
    }

    const parsed = StoredOutputsSchema.safeParse(raw);
    const converted = parsed.success ? toValue(parsed.data.outputs, "outputs") : null;
    if (!converted || "error" in converted || !isValueMap(converted.value)) {
      throw new LoadError(`Stored outputs for ${unitId} at ${filePath} are malformed`, {
        unitId,
        filePath,
      });
    }
    return converted.value;
  }

  async write(unitId: string, outputs: ValueMap): Promise<void> {
    await fse.outputJson(
      this.pathFor(unitId),
      { unit_id: unitId, saved_at: this.now(), outputs },
      { spaces: 2 },
    );
  }

  async remove(unitId: string): Promise<void> {
    await fse.remove(this.pathFor(unitId));
  }
}

export async function loadStoredOutputs(
  store: OutputStore,
  unitIds: Iterable<string>,
): Promise<Map<string, ValueMap | null>> {
  const stored = new Map<string, ValueMap | null>();
  for (const unitId of unitIds) {
    if (stored.has(unitId)) continue;
    stored.set(unitId, await store.read(unitId));
  }
  return stored;
}
