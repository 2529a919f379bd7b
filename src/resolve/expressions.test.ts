import { describe, expect, it } from "vitest";

import {
  ExpressionSyntaxError,
  parseExpression,
  parseTemplate,
  referencesRoot,
} from "./expressions.js";

describe("parseTemplate", () => {
  it("keeps plain strings as literals", () => {
    expect(parseTemplate("plain")).toEqual({ type: "literal", value: "plain" });
    expect(parseTemplate("")).toEqual({ type: "literal", value: "" });
  });

  it("returns the bare expression for a single interpolation", () => {
    expect(parseTemplate("${local.region}")).toEqual({
      type: "getattr",
      object: { type: "variable", name: "local" },
      name: "region",
    });
  });

  it("splits mixed text and interpolations into parts", () => {
    expect(parseTemplate("app-${tier}-db")).toEqual({
      type: "template",
      parts: ["app-", { type: "variable", name: "tier" }, "-db"],
    });
  });

  it("treats $${ as an escaped literal", () => {
    expect(parseTemplate("$${not.an.expr}")).toEqual({ type: "literal", value: "${not.an.expr}" });
  });

  it("finds the closing brace past nested maps and strings", () => {
    const node = parseTemplate('${lookup({ a = "}" }, "a")}');
    expect(node.type).toBe("call");
  });

  it("rejects unterminated and empty interpolations", () => {
    expect(() => parseTemplate("${local.a")).toThrow(ExpressionSyntaxError);
    expect(() => parseTemplate("x ${ } y")).toThrow(/Empty interpolation/);
  });
});

describe("parseExpression", () => {
  it("applies operator precedence", () => {
    expect(parseExpression("1 + 2 * 3")).toEqual({
      type: "binary",
      operator: "+",
      left: { type: "literal", value: 1 },
      right: {
        type: "binary",
        operator: "*",
        left: { type: "literal", value: 2 },
        right: { type: "literal", value: 3 },
      },
    });
  });

  it("parses conditionals, indexing and calls", () => {
    const node = parseExpression('tier == "prod" ? sizes[0] : lower("S")');
    expect(node.type).toBe("conditional");
    if (node.type !== "conditional") return;
    expect(node.consequent).toEqual({
      type: "index",
      object: { type: "variable", name: "sizes" },
      index: { type: "literal", value: 0 },
    });
    expect(node.alternate).toEqual({
      type: "call",
      name: "lower",
      args: [{ type: "literal", value: "S" }],
    });
  });

  it("accepts both = and : in map literals", () => {
    expect(parseExpression('{ a = 1, "b": true }')).toEqual({
      type: "map",
      entries: [
        { key: "a", value: { type: "literal", value: 1 } },
        { key: "b", value: { type: "literal", value: true } },
      ],
    });
  });

  it("parses templates nested in string literals", () => {
    expect(parseExpression('"x-${tier}"')).toEqual({
      type: "template",
      parts: ["x-", { type: "variable", name: "tier" }],
    });
  });

  it("reports the offset of unexpected tokens", () => {
    expect(() => parseExpression("1 +")).toThrow(/Unexpected end of expression at offset 3/);
    expect(() => parseExpression("a b")).toThrow(/Unexpected "b"/);
    expect(() => parseExpression("a @ b")).toThrow(/Unexpected character "@"/);
  });
});

describe("referencesRoot", () => {
  it("detects dependency references anywhere in the tree", () => {
    expect(referencesRoot(parseTemplate("id-${dependency.vpc.outputs.id}"), "dependency")).toBe(
      true,
    );
    expect(referencesRoot(parseTemplate("${local.dependency}"), "dependency")).toBe(false);
  });
});
