/**
 * Expression and template parsing for unit configuration values.
 *
 * A YAML string is a template: literal text with `${ ... }` interpolations (`$${` escapes).
 * A template made of exactly one interpolation evaluates to that expression's typed value.
 *
 * Expression grammar (lowest precedence first):
 *
 *   conditional  := or ("?" conditional ":" conditional)?
 *   or           := and ("||" and)*
 *   and          := equality ("&&" equality)*
 *   equality     := comparison (("==" | "!=") comparison)*
 *   comparison   := additive (("<" | "<=" | ">" | ">=") additive)*
 *   additive     := multiplicative (("+" | "-") multiplicative)*
 *   multiplicative := unary (("*" | "/" | "%") unary)*
 *   unary        := ("!" | "-") unary | postfix
 *   postfix      := primary ("." IDENT | "[" conditional "]")*
 *   primary      := NUMBER | STRING | "true" | "false" | "null" | IDENT "(" args ")"
 *                 | IDENT | "(" conditional ")" | "[" items "]" | "{" entries "}"
 */

import type { Value } from "./values.js";

// =============================================================================
// AST
// =============================================================================

export type BinaryOperator =
  | "||"
  | "&&"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "+"
  | "-"
  | "*"
  | "/"
  | "%";

export type ExprNode =
  | { type: "literal"; value: Value }
  | { type: "template"; parts: Array<string | ExprNode> }
  | { type: "variable"; name: string }
  | { type: "getattr"; object: ExprNode; name: string }
  | { type: "index"; object: ExprNode; index: ExprNode }
  | { type: "call"; name: string; args: ExprNode[] }
  | { type: "unary"; operator: "!" | "-"; operand: ExprNode }
  | { type: "binary"; operator: BinaryOperator; left: ExprNode; right: ExprNode }
  | { type: "conditional"; test: ExprNode; consequent: ExprNode; alternate: ExprNode }
  | { type: "list"; items: ExprNode[] }
  | { type: "map"; entries: Array<{ key: string; value: ExprNode }> };

export class ExpressionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly offset: number,
  ) {
    super(`${message} at offset ${offset} in ${JSON.stringify(source)}`);
    this.name = "ExpressionSyntaxError";
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseTemplate(source: string): ExprNode {
  const parts: Array<string | ExprNode> = [];
  let text = "";
  let index = 0;

  while (index < source.length) {
    if (source.startsWith("$${", index)) {
      text += "${";
      index += 3;
      continue;
    }

    if (source.startsWith("${", index)) {
      const end = findInterpolationEnd(source, index + 2);
      const inner = source.slice(index + 2, end);
      if (inner.trim().length === 0) {
        throw new ExpressionSyntaxError("Empty interpolation", source, index);
      }
      if (text.length > 0) parts.push(text);
      text = "";
      parts.push(parseExpression(inner));
      index = end + 1;
      continue;
    }

    text += source[index];
    index += 1;
  }

  if (text.length > 0) parts.push(text);

  if (parts.length === 0) return { type: "literal", value: "" };
  if (parts.length === 1) {
    const only = parts[0];
    if (typeof only === "string") return { type: "literal", value: only };
    if (only !== undefined) return only;
  }
  return { type: "template", parts };
}

export function parseExpression(source: string): ExprNode {
  const parser = new Parser(source, tokenize(source));
  return parser.parseRoot();
}

export function referencesRoot(node: ExprNode, root: string): boolean {
  let hit = false;
  visit(node, (current) => {
    if (current.type === "variable" && current.name === root) hit = true;
  });
  return hit;
}

// =============================================================================
// LEXER
// =============================================================================

type TokenType = "number" | "string" | "ident" | "punct" | "eof";

type Token = {
  type: TokenType;
  value: string;
  offset: number;
  template?: ExprNode;
};

const PUNCTUATORS = [
  "&&",
  "||",
  "==",
  "!=",
  "<=",
  ">=",
  "(",
  ")",
  "[",
  "]",
  "{",
  "}",
  ",",
  ".",
  "?",
  ":",
  "=",
  "<",
  ">",
  "+",
  "-",
  "*",
  "/",
  "%",
  "!",
];

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source[index] ?? "";

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (/[0-9]/.test(char)) {
      const match = /^[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?/.exec(source.slice(index));
      const raw = match?.[0] ?? char;
      tokens.push({ type: "number", value: raw, offset: index });
      index += raw.length;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const match = /^[A-Za-z_][A-Za-z0-9_-]*/.exec(source.slice(index));
      const raw = match?.[0] ?? char;
      tokens.push({ type: "ident", value: raw, offset: index });
      index += raw.length;
      continue;
    }

    if (char === '"') {
      const { raw, end } = readStringLiteral(source, index);
      tokens.push({ type: "string", value: raw, offset: index, template: parseTemplate(raw) });
      index = end;
      continue;
    }

    const punct = PUNCTUATORS.find((candidate) => source.startsWith(candidate, index));
    if (!punct) {
      throw new ExpressionSyntaxError(`Unexpected character ${JSON.stringify(char)}`, source, index);
    }
    tokens.push({ type: "punct", value: punct, offset: index });
    index += punct.length;
  }

  tokens.push({ type: "eof", value: "", offset: source.length });
  return tokens;
}

const STRING_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  '"': '"',
  "\\": "\\",
};

/** Reads a quoted literal starting at `start` (the opening quote); escapes are decoded. */
function readStringLiteral(source: string, start: number): { raw: string; end: number } {
  let raw = "";
  let index = start + 1;

  while (index < source.length) {
    const char = source[index];

    if (char === "\\") {
      const next = source[index + 1] ?? "";
      const decoded = STRING_ESCAPES[next];
      if (decoded === undefined) {
        throw new ExpressionSyntaxError(`Unknown escape \\${next}`, source, index);
      }
      raw += decoded;
      index += 2;
      continue;
    }

    if (char === '"') return { raw, end: index + 1 };

    if (char === "$" && source[index + 1] === "{") {
      const end = findInterpolationEnd(source, index + 2);
      raw += source.slice(index, end + 1);
      index = end + 1;
      continue;
    }

    raw += char;
    index += 1;
  }

  throw new ExpressionSyntaxError("Unterminated string", source, start);
}

/** Finds the `}` closing an interpolation whose body starts at `start`. */
function findInterpolationEnd(source: string, start: number): number {
  let depth = 0;
  let index = start;

  while (index < source.length) {
    const char = source[index];
    if (char === '"') {
      index = readStringLiteral(source, index).end;
      continue;
    }
    if (char === "{") depth += 1;
    if (char === "}") {
      if (depth === 0) return index;
      depth -= 1;
    }
    index += 1;
  }

  throw new ExpressionSyntaxError("Unterminated interpolation", source, start - 2);
}

// =============================================================================
// PARSER
// =============================================================================

const BINARY_LEVELS: BinaryOperator[][] = [
  ["||"],
  ["&&"],
  ["==", "!="],
  ["<", "<=", ">", ">="],
  ["+", "-"],
  ["*", "/", "%"],
];

class Parser {
  private position = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parseRoot(): ExprNode {
    const node = this.parseConditional();
    const next = this.peek();
    if (next.type !== "eof") {
      throw this.error(`Unexpected ${JSON.stringify(next.value)}`, next);
    }
    return node;
  }

  private parseConditional(): ExprNode {
    const test = this.parseBinary(0);
    if (!this.matchPunct("?")) return test;
    const consequent = this.parseConditional();
    this.expectPunct(":");
    const alternate = this.parseConditional();
    return { type: "conditional", test, consequent, alternate };
  }

  private parseBinary(level: number): ExprNode {
    const operators = BINARY_LEVELS[level];
    if (!operators) return this.parseUnary();

    let left = this.parseBinary(level + 1);
    while (true) {
      const next = this.peek();
      const operator = operators.find((op) => next.type === "punct" && next.value === op);
      if (!operator) return left;
      this.position += 1;
      const right = this.parseBinary(level + 1);
      left = { type: "binary", operator, left, right };
    }
  }

  private parseUnary(): ExprNode {
    if (this.matchPunct("!")) return { type: "unary", operator: "!", operand: this.parseUnary() };
    if (this.matchPunct("-")) return { type: "unary", operator: "-", operand: this.parseUnary() };
    return this.parsePostfix();
  }

  private parsePostfix(): ExprNode {
    let node = this.parsePrimary();
    while (true) {
      if (this.matchPunct(".")) {
        const name = this.next();
        if (name.type !== "ident" && name.type !== "number") {
          throw this.error("Expected attribute name after '.'", name);
        }
        node = { type: "getattr", object: node, name: name.value };
        continue;
      }
      if (this.matchPunct("[")) {
        const index = this.parseConditional();
        this.expectPunct("]");
        node = { type: "index", object: node, index };
        continue;
      }
      return node;
    }
  }

  private parsePrimary(): ExprNode {
    const token = this.next();

    if (token.type === "number") {
      return { type: "literal", value: Number(token.value) };
    }

    if (token.type === "string") {
      return token.template ?? { type: "literal", value: token.value };
    }

    if (token.type === "ident") {
      if (token.value === "true") return { type: "literal", value: true };
      if (token.value === "false") return { type: "literal", value: false };
      if (token.value === "null") return { type: "literal", value: null };
      if (this.matchPunct("(")) {
        return { type: "call", name: token.value, args: this.parseSequence(")") };
      }
      return { type: "variable", name: token.value };
    }

    if (token.type === "punct") {
      if (token.value === "(") {
        const inner = this.parseConditional();
        this.expectPunct(")");
        return inner;
      }
      if (token.value === "[") {
        return { type: "list", items: this.parseSequence("]") };
      }
      if (token.value === "{") {
        return this.parseMap();
      }
    }

    throw this.error(
      token.type === "eof" ? "Unexpected end of expression" : `Unexpected ${JSON.stringify(token.value)}`,
      token,
    );
  }

  private parseSequence(close: ")" | "]"): ExprNode[] {
    const items: ExprNode[] = [];
    if (this.matchPunct(close)) return items;
    while (true) {
      items.push(this.parseConditional());
      if (this.matchPunct(close)) return items;
      this.expectPunct(",");
      if (this.matchPunct(close)) return items;
    }
  }

  private parseMap(): ExprNode {
    const entries: Array<{ key: string; value: ExprNode }> = [];
    if (this.matchPunct("}")) return { type: "map", entries };

    while (true) {
      const keyToken = this.next();
      let key: string;
      if (keyToken.type === "ident") {
        key = keyToken.value;
      } else if (keyToken.type === "string" && keyToken.template?.type === "literal") {
        key = String(keyToken.template.value);
      } else {
        throw this.error("Map keys must be identifiers or plain strings", keyToken);
      }

      if (!this.matchPunct("=") && !this.matchPunct(":")) {
        throw this.error("Expected '=' or ':' after map key", this.peek());
      }
      entries.push({ key, value: this.parseConditional() });

      if (this.matchPunct("}")) return { type: "map", entries };
      this.expectPunct(",");
      if (this.matchPunct("}")) return { type: "map", entries };
    }
  }

  private peek(): Token {
    return this.tokens[this.position] ?? this.eofToken();
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== "eof") this.position += 1;
    return token;
  }

  private matchPunct(value: string): boolean {
    const token = this.peek();
    if (token.type === "punct" && token.value === value) {
      this.position += 1;
      return true;
    }
    return false;
  }

  private expectPunct(value: string): void {
    const token = this.peek();
    if (!this.matchPunct(value)) {
      throw this.error(`Expected ${JSON.stringify(value)}`, token);
    }
  }

  private eofToken(): Token {
    return { type: "eof", value: "", offset: this.source.length };
  }

  private error(message: string, token: Token): ExpressionSyntaxError {
    return new ExpressionSyntaxError(message, this.source, token.offset);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function visit(node: ExprNode, callback: (node: ExprNode) => void): void {
  callback(node);
  switch (node.type) {
    case "template":
      for (const part of node.parts) {
        if (typeof part !== "string") visit(part, callback);
      }
      return;
    case "getattr":
      visit(node.object, callback);
      return;
    case "index":
      visit(node.object, callback);
      visit(node.index, callback);
      return;
    case "call":
      node.args.forEach((arg) => visit(arg, callback));
      return;
    case "unary":
      visit(node.operand, callback);
      return;
    case "binary":
      visit(node.left, callback);
      visit(node.right, callback);
      return;
    case "conditional":
      visit(node.test, callback);
      visit(node.consequent, callback);
      visit(node.alternate, callback);
      return;
    case "list":
      node.items.forEach((item) => visit(item, callback));
      return;
    case "map":
      node.entries.forEach((entry) => visit(entry.value, callback));
      return;
    default:
      return;
  }
}
