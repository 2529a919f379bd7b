import type { EngineMode } from "../core/config.js";
import type { ValueMap } from "../resolve/values.js";

export type EngineApplyInput = {
  unitId: string;
  workingDir: string;
  inputs: ValueMap;
  mode: EngineMode;
  signal?: AbortSignal;
};

export type EngineApplyResult = {
  // null when the mode produces no outputs (plan, destroy).
  outputs: ValueMap | null;
};

/** Provisioning backend that applies one unit's resolved inputs in its working directory. */
export interface ProvisioningEngine {
  apply(input: EngineApplyInput): Promise<EngineApplyResult>;
}
