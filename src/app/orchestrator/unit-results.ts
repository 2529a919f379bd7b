/**
 * Unit result table for one run.
 * Purpose: record each unit's outcome exactly once and let dependents read real outputs.
 * Assumptions: the only state shared between concurrently running units.
 * Usage: results.record(result); results.passOutputs(unitId); results.inOrder(plan.order).
 */

import { describeCausalChain, formatErrorMessage } from "../../core/error-format.js";
import {
  isOrchestratorError,
  OrchestratorError,
  type OrchestratorErrorKind,
} from "../../core/errors.js";
import type { EmittedArtifact } from "../../generate/emitter.js";
import type { Substitution } from "../../resolve/resolver.js";
import type { ValueMap } from "../../resolve/values.js";

// =============================================================================
// TYPES
// =============================================================================

export type SkipReason = "upstream_failed" | "fail_fast" | "cancelled";

export type UnitFailure = {
  kind: OrchestratorErrorKind;
  message: string;
  causes: string[];
};

export type UnitResult =
  | {
      unitId: string;
      status: "succeeded";
      outputs: ValueMap | null;
      substitutions: Substitution[];
      artifacts: Array<Pick<EmittedArtifact, "name" | "path" | "status">>;
      startedAt: string;
      finishedAt: string;
      durationMs: number;
    }
  | {
      unitId: string;
      status: "failed";
      error: UnitFailure;
      startedAt: string;
      finishedAt: string;
      durationMs: number;
    }
  | {
      unitId: string;
      status: "skipped";
      reason: SkipReason;
      blockedBy?: string;
    };

// =============================================================================
// TABLE
// =============================================================================

export class UnitResultTable {
  private readonly results = new Map<string, UnitResult>();

  record(result: UnitResult): void {
    if (this.results.has(result.unitId)) {
      throw new OrchestratorError(`Result for ${result.unitId} was already recorded`, {
        unitId: result.unitId,
      });
    }
    this.results.set(result.unitId, result);
  }

  get(unitId: string): UnitResult | undefined {
    return this.results.get(unitId);
  }

  /** Real outputs produced by the unit in this run, if it succeeded with any. */
  passOutputs(unitId: string): ValueMap | null {
    const result = this.results.get(unitId);
    return result?.status === "succeeded" ? result.outputs : null;
  }

  inOrder(unitIds: readonly string[]): UnitResult[] {
    return unitIds.flatMap((unitId) => {
      const result = this.results.get(unitId);
      return result ? [result] : [];
    });
  }
}

export function toUnitFailure(error: unknown): UnitFailure {
  return {
    kind: isOrchestratorError(error) ? error.kind : "internal",
    message: formatErrorMessage(error),
    causes: describeCausalChain(error).slice(1),
  };
}
