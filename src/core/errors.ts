/*
Purpose: error taxonomy shared by loading, resolution, graph building, execution and CLI output.
Assumptions: UserFacingError instances are safe to display to end users; every other error
carries the originating unit (when there is one) and its cause.
Usage: throw new LoadError("...", { filePath }); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export type OrchestratorErrorKind =
  | "internal"
  | "config"
  | "load"
  | "cycle"
  | "resolution"
  | "missing_output"
  | "execution"
  | "timeout"
  | "cancelled"
  | "artifact"
  | "hook";

export type OrchestratorErrorOptions = {
  unitId?: string;
  cause?: unknown;
};

export class OrchestratorError extends Error {
  public readonly kind: OrchestratorErrorKind = "internal";
  public readonly unitId?: string;
  public readonly cause?: unknown;

  constructor(message: string, options: OrchestratorErrorOptions = {}) {
    super(message);
    this.name = "OrchestratorError";
    this.unitId = options.unitId;
    this.cause = options.cause;
  }
}

export class ConfigError extends OrchestratorError {
  public override readonly kind = "config";

  constructor(message: string, options: OrchestratorErrorOptions = {}) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export class LoadError extends OrchestratorError {
  public override readonly kind = "load";
  public readonly filePath?: string;

  constructor(message: string, options: OrchestratorErrorOptions & { filePath?: string } = {}) {
    super(message, options);
    this.name = "LoadError";
    this.filePath = options.filePath;
  }
}

export class CycleError extends OrchestratorError {
  public override readonly kind = "cycle";
  public readonly cyclePath: string[];

  constructor(
    subject: "include" | "dependency",
    cyclePath: string[],
    options: OrchestratorErrorOptions = {},
  ) {
    super(`${subject === "include" ? "Include" : "Dependency"} cycle: ${cyclePath.join(" -> ")}`, {
      unitId: options.unitId ?? (subject === "dependency" ? cyclePath[0] : undefined),
      cause: options.cause,
    });
    this.name = "CycleError";
    this.cyclePath = cyclePath;
  }
}

export class ResolutionError extends OrchestratorError {
  public override readonly kind = "resolution";
  public readonly filePath?: string;

  constructor(message: string, options: OrchestratorErrorOptions & { filePath?: string } = {}) {
    super(message, options);
    this.name = "ResolutionError";
    this.filePath = options.filePath;
  }
}

export class MissingOutputError extends OrchestratorError {
  public override readonly kind = "missing_output";
  public readonly dependency: string;

  constructor(message: string, options: OrchestratorErrorOptions & { dependency: string }) {
    super(message, options);
    this.name = "MissingOutputError";
    this.dependency = options.dependency;
  }
}

export class ExecutionError extends OrchestratorError {
  public override readonly kind = "execution";

  constructor(message: string, options: OrchestratorErrorOptions = {}) {
    super(message, options);
    this.name = "ExecutionError";
  }
}

export class TimeoutError extends OrchestratorError {
  public override readonly kind = "timeout";
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, options: OrchestratorErrorOptions = {}) {
    super(`Unit ${options.unitId ?? "<unknown>"} exceeded its ${timeoutMs}ms deadline`, options);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends OrchestratorError {
  public override readonly kind = "cancelled";

  constructor(message: string, options: OrchestratorErrorOptions = {}) {
    super(message, options);
    this.name = "CancelledError";
  }
}

export class ArtifactError extends OrchestratorError {
  public override readonly kind = "artifact";

  constructor(message: string, options: OrchestratorErrorOptions = {}) {
    super(message, options);
    this.name = "ArtifactError";
  }
}

export class HookError extends OrchestratorError {
  public override readonly kind = "hook";

  constructor(message: string, options: OrchestratorErrorOptions = {}) {
    super(message, options);
    this.name = "HookError";
  }
}

export function isOrchestratorError(value: unknown): value is OrchestratorError {
  return value instanceof OrchestratorError;
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  load: "LOAD_ERROR",
  resolution: "RESOLUTION_ERROR",
  graph: "GRAPH_ERROR",
  execution: "EXECUTION_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) return error;
  if (!(error instanceof OrchestratorError)) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.unknown,
      title: "Unexpected error",
      message: error instanceof Error ? error.message : String(error),
      cause: error,
    });
  }

  const where = error.unitId ? ` (unit ${error.unitId})` : "";
  switch (error.kind) {
    case "config":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Project config invalid.",
        message: error.message,
        hint: "Check .strata/config.yaml or run `strata init` to create a default one.",
        cause: error,
      });
    case "load":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.load,
        title: `Failed to load configuration tree${where}.`,
        message: error.message,
        hint: "Fix the unit file or include reference named above.",
        cause: error,
      });
    case "cycle":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.graph,
        title: "Configuration cycle detected.",
        message: error.message,
        hint: "Remove one of the edges in the reported cycle.",
        next: "Inspect edges with `strata graph --format mermaid`.",
        cause: error,
      });
    case "resolution":
    case "missing_output":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.resolution,
        title: `Failed to resolve unit values${where}.`,
        message: error.message,
        hint: "Declare mock_outputs on the dependency or apply the upstream unit first.",
        cause: error,
      });
    default:
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.execution,
        title: `Execution failed${where}.`,
        message: error.message,
        cause: error,
      });
  }
}
