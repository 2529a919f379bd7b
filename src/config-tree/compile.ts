import { parseTemplate, type ExprNode } from "../resolve/expressions.js";
import { toValue, type Value } from "../resolve/values.js";

/** A configuration value with every template string parsed, ready for evaluation. */
export type CompiledValue =
  | { kind: "literal"; value: Value }
  | { kind: "expr"; node: ExprNode; source: string }
  | { kind: "list"; items: CompiledValue[] }
  | { kind: "map"; entries: Array<[string, CompiledValue]> };

export class CompileError extends Error {
  constructor(
    message: string,
    public readonly at: string,
  ) {
    super(`${at}: ${message}`);
    this.name = "CompileError";
  }
}

export function compileValue(raw: unknown, at: string): CompiledValue {
  if (typeof raw === "string") {
    let node: ExprNode;
    try {
      node = parseTemplate(raw);
    } catch (err) {
      throw new CompileError(err instanceof Error ? err.message : String(err), at);
    }
    return node.type === "literal"
      ? { kind: "literal", value: node.value }
      : { kind: "expr", node, source: raw };
  }

  if (Array.isArray(raw)) {
    const items = raw.map((item, index) => compileValue(item, `${at}[${index}]`));
    return items.every(isLiteral)
      ? { kind: "literal", value: items.map((item) => item.value) }
      : { kind: "list", items };
  }

  if (typeof raw === "object" && raw !== null) {
    const entries = Object.entries(raw).map(
      ([key, item]): [string, CompiledValue] => [key, compileValue(item, `${at}.${key}`)],
    );
    return { kind: "map", entries };
  }

  const converted = toValue(raw, at);
  if ("error" in converted) throw new CompileError("unsupported value", at);
  return { kind: "literal", value: converted.value };
}

export function compileRecord(
  raw: Record<string, unknown>,
  at: string,
): Record<string, CompiledValue> {
  const compiled: Record<string, CompiledValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    compiled[key] = compileValue(value, `${at}.${key}`);
  }
  return compiled;
}

function isLiteral(value: CompiledValue): value is Extract<CompiledValue, { kind: "literal" }> {
  return value.kind === "literal";
}
