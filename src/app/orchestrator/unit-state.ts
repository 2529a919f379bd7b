import { OrchestratorError } from "../../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type UnitStatus = "pending" | "ready" | "running" | "succeeded" | "failed" | "skipped";

export const UNIT_TRANSITIONS: Readonly<Record<UnitStatus, readonly UnitStatus[]>> = {
  pending: ["ready", "skipped"],
  ready: ["running", "skipped"],
  running: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
  skipped: [],
};

export type TransitionListener = (unitId: string, from: UnitStatus, to: UnitStatus) => void;

// =============================================================================
// STATE MACHINE
// =============================================================================

export class UnitStateMachine {
  private readonly statuses = new Map<string, UnitStatus>();

  constructor(
    unitIds: readonly string[],
    private readonly onTransition?: TransitionListener,
  ) {
    for (const unitId of unitIds) this.statuses.set(unitId, "pending");
  }

  status(unitId: string): UnitStatus {
    const status = this.statuses.get(unitId);
    if (!status) throw new OrchestratorError(`Unknown unit ${unitId}`, { unitId });
    return status;
  }

  transition(unitId: string, to: UnitStatus): void {
    const from = this.status(unitId);
    if (!UNIT_TRANSITIONS[from].includes(to)) {
      throw new OrchestratorError(`Invalid unit transition for ${unitId}: ${from} -> ${to}`, {
        unitId,
      });
    }
    this.statuses.set(unitId, to);
    this.onTransition?.(unitId, from, to);
  }
}
