/*
Purpose: turn errors into user-facing lines (with the causal chain back to the root error)
and provide ANSI styling helpers for the CLI.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import { OrchestratorError, toUserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "unit"
  | "hint"
  | "next"
  | "code"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "green" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) return value;
    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream?.isTTY);
  if (options.useColor === undefined) return isTty;
  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

const MAX_CAUSE_DEPTH = 10;

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const userError = toUserFacingError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: userError.title.trim() }];

  const message = userError.message.trim();
  if (message.length > 0 && message !== userError.title.trim()) {
    lines.push({ kind: "message", text: message });
  }

  const unitId = findUnitId(userError.cause);
  if (unitId) {
    lines.push({ kind: "unit", text: `unit: ${unitId}` });
  }

  if (userError.hint) lines.push({ kind: "hint", text: userError.hint });
  if (userError.next) lines.push({ kind: "next", text: userError.next });

  if (mode === "debug") {
    lines.push({ kind: "code", text: userError.code });

    const chain = describeCausalChain(userError.cause);
    for (const cause of chain) {
      if (cause === message) continue;
      lines.push({ kind: "cause", text: cause });
    }

    const stack = findRootStack(userError.cause);
    if (stack) lines.push({ kind: "stack", text: stack });
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    if (message.length > 0) return message;
    return error.name;
  }

  if (typeof error === "string") return error;

  if (error && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message.trim()) return message.trim();
  }

  return String(error);
}

/**
 * Walks `cause` links from the given error to the root, returning one line per hop
 * in the form `Name: message`.
 */
export function describeCausalChain(error: unknown): string[] {
  const lines: string[] = [];
  let current: unknown = error;
  let depth = 0;

  while (current !== undefined && current !== null && depth < MAX_CAUSE_DEPTH) {
    const name = current instanceof Error ? current.name : typeof current;
    lines.push(`${name}: ${formatErrorMessage(current)}`);
    current = current instanceof Error ? current.cause : undefined;
    depth += 1;
  }

  return lines;
}

// =============================================================================
// INTERNALS
// =============================================================================

function findUnitId(error: unknown): string | undefined {
  let current: unknown = error;
  let depth = 0;
  while (current instanceof Error && depth < MAX_CAUSE_DEPTH) {
    if (current instanceof OrchestratorError && current.unitId) return current.unitId;
    current = current.cause;
    depth += 1;
  }
  return undefined;
}

function findRootStack(error: unknown): string | undefined {
  let stack: string | undefined;
  let current: unknown = error;
  let depth = 0;
  while (current instanceof Error && depth < MAX_CAUSE_DEPTH) {
    stack = current.stack ?? stack;
    current = current.cause;
    depth += 1;
  }
  return stack;
}
