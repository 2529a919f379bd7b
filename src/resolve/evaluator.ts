import { MissingOutputError, ResolutionError } from "../core/errors.js";

import type { BinaryOperator, ExprNode } from "./expressions.js";
import { callBuiltin, interpolate, type FunctionContext } from "./functions.js";
import {
  AppendList,
  describeType,
  isValueMap,
  ownValue,
  UnknownValue,
  valuesEqual,
  type Value,
  type ValueMap,
} from "./values.js";

// =============================================================================
// TYPES
// =============================================================================

export type UnitReference = {
  id: string;
  name: string;
  dir: string;
};

/**
 * Everything an expression can see. `dependencyOutputs` is absent where dependency
 * references are not allowed (locals and layers shared between units).
 */
export type EvalScope = {
  local: (name: string) => Value;
  tier: string;
  unit?: UnitReference;
  dependencyOutputs?: (name: string) => ValueMap | UnknownValue;
  functions: FunctionContext;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** Evaluates a whole configuration value; only here may `append(...)` survive. */
export function evaluateRoot(node: ExprNode, scope: EvalScope): Value | AppendList {
  if (node.type === "call" && node.name === "append") {
    return evaluateCall(node, scope);
  }
  return evaluate(node, scope);
}

export function evaluate(node: ExprNode, scope: EvalScope): Value {
  switch (node.type) {
    case "literal":
      return node.value;
    case "template":
      return evaluateTemplate(node.parts, scope);
    case "variable":
      return evaluateVariable(node.name, scope);
    case "getattr":
      return evaluateGetattr(node.object, node.name, scope);
    case "index":
      return evaluateIndex(node.object, node.index, scope);
    case "call":
      return expectPlain(evaluateCall(node, scope), node.name);
    case "unary":
      return evaluateUnary(node.operator, evaluate(node.operand, scope));
    case "binary":
      return evaluateBinary(node.operator, node.left, node.right, scope);
    case "conditional": {
      const test = evaluate(node.test, scope);
      if (test instanceof UnknownValue) return new UnknownValue(`conditional on ${test.reference}`);
      if (typeof test !== "boolean") {
        throw new ResolutionError(`Condition must be a bool, got ${describeType(test)}`);
      }
      return evaluate(test ? node.consequent : node.alternate, scope);
    }
    case "list":
      return node.items.map((item) => evaluate(item, scope));
    case "map": {
      const result: ValueMap = {};
      for (const entry of node.entries) {
        result[entry.key] = evaluate(entry.value, scope);
      }
      return result;
    }
  }
}

// =============================================================================
// REFERENCES
// =============================================================================

function evaluateVariable(name: string, scope: EvalScope): Value {
  switch (name) {
    case "tier":
      return scope.tier;
    case "unit":
      if (!scope.unit) {
        throw new ResolutionError("unit.* references are only available in unit files");
      }
      return { id: scope.unit.id, name: scope.unit.name, dir: scope.unit.dir };
    case "local":
    case "dependency":
      throw new ResolutionError(`${name} must be followed by an attribute, e.g. ${name}.name`);
    default:
      throw new ResolutionError(`Unknown reference ${name}`);
  }
}

function evaluateGetattr(objectNode: ExprNode, name: string, scope: EvalScope): Value {
  if (objectNode.type === "variable" && objectNode.name === "local") {
    return scope.local(name);
  }

  const dependency = matchDependencyOutputs(objectNode);
  if (dependency) {
    return outputValue(dependency, name, scope);
  }

  if (objectNode.type === "getattr" && isDependencyRoot(objectNode.object)) {
    if (name !== "outputs") {
      throw new ResolutionError(
        `Unknown attribute dependency.${objectNode.name}.${name}; only outputs is exposed`,
      );
    }
    return dependencyOutputs(objectNode.name, scope);
  }

  if (isDependencyRoot(objectNode)) {
    throw new ResolutionError(`dependency.${name} must be followed by .outputs`);
  }

  const object = evaluate(objectNode, scope);
  return accessAttribute(object, name);
}

function evaluateIndex(objectNode: ExprNode, indexNode: ExprNode, scope: EvalScope): Value {
  const index = evaluate(indexNode, scope);
  const dependency = matchDependencyOutputs(objectNode);
  if (dependency && typeof index === "string") {
    return outputValue(dependency, index, scope);
  }

  const object = evaluate(objectNode, scope);
  if (object instanceof UnknownValue) return new UnknownValue(`${object.reference}[...]`);
  if (index instanceof UnknownValue) return index;

  if (Array.isArray(object)) {
    if (typeof index !== "number" || !Number.isInteger(index)) {
      throw new ResolutionError(`List index must be an integer, got ${describeType(index)}`);
    }
    const item = object[index];
    if (index < 0 || item === undefined) {
      throw new ResolutionError(`List index ${index} out of range (length ${object.length})`);
    }
    return item;
  }

  if (isValueMap(object)) {
    if (typeof index !== "string") {
      throw new ResolutionError(`Map key must be a string, got ${describeType(index)}`);
    }
    return accessAttribute(object, index);
  }

  throw new ResolutionError(`Cannot index a ${describeType(object)} value`);
}

function accessAttribute(object: Value, name: string): Value {
  if (object instanceof UnknownValue) return new UnknownValue(`${object.reference}.${name}`);
  if (!isValueMap(object)) {
    throw new ResolutionError(`Cannot read attribute ${name} of a ${describeType(object)} value`);
  }
  const value = ownValue(object, name);
  if (value === undefined) {
    throw new ResolutionError(`Unknown attribute ${name}`);
  }
  return value;
}

function isDependencyRoot(node: ExprNode): boolean {
  return node.type === "variable" && node.name === "dependency";
}

/** Matches `dependency.<name>.outputs` and returns `<name>`. */
function matchDependencyOutputs(node: ExprNode): string | null {
  if (
    node.type === "getattr" &&
    node.name === "outputs" &&
    node.object.type === "getattr" &&
    isDependencyRoot(node.object.object)
  ) {
    return node.object.name;
  }
  return null;
}

function dependencyOutputs(name: string, scope: EvalScope): ValueMap | UnknownValue {
  if (!scope.dependencyOutputs) {
    throw new ResolutionError(
      `dependency.${name} cannot be referenced here; dependency outputs are only available in inputs`,
    );
  }
  return scope.dependencyOutputs(name);
}

function outputValue(dependency: string, key: string, scope: EvalScope): Value {
  const outputs = dependencyOutputs(dependency, scope);
  if (outputs instanceof UnknownValue) {
    return new UnknownValue(`dependency.${dependency}.outputs.${key}`);
  }
  const value = ownValue(outputs, key);
  if (value === undefined) {
    throw new MissingOutputError(
      `Dependency ${dependency} has no output ${JSON.stringify(key)}`,
      { dependency, unitId: scope.unit?.id },
    );
  }
  return value;
}

// =============================================================================
// OPERATORS
// =============================================================================

function evaluateTemplate(parts: Array<string | ExprNode>, scope: EvalScope): Value {
  let text = "";
  let unknown: UnknownValue | null = null;
  for (const part of parts) {
    if (typeof part === "string") {
      text += part;
      continue;
    }
    // Later parts are still evaluated so their errors surface.
    const value = evaluate(part, scope);
    if (value instanceof UnknownValue) {
      if (!unknown) unknown = value;
      continue;
    }
    text += interpolate("template", value);
  }
  return unknown ? new UnknownValue(`template with ${unknown.reference}`) : text;
}

function evaluateUnary(operator: "!" | "-", operand: Value): Value {
  if (operand instanceof UnknownValue) return operand;
  if (operator === "!") {
    if (typeof operand !== "boolean") {
      throw new ResolutionError(`Operator ! requires a bool, got ${describeType(operand)}`);
    }
    return !operand;
  }
  if (typeof operand !== "number") {
    throw new ResolutionError(`Operator - requires a number, got ${describeType(operand)}`);
  }
  return -operand;
}

function evaluateBinary(
  operator: BinaryOperator,
  leftNode: ExprNode,
  rightNode: ExprNode,
  scope: EvalScope,
): Value {
  const left = evaluate(leftNode, scope);

  if (operator === "&&" || operator === "||") {
    if (left instanceof UnknownValue) {
      evaluate(rightNode, scope);
      return left;
    }
    const lhs = expectBool(operator, left);
    if (operator === "&&" && !lhs) return false;
    if (operator === "||" && lhs) return true;
    const right = evaluate(rightNode, scope);
    if (right instanceof UnknownValue) return right;
    return expectBool(operator, right);
  }

  const right = evaluate(rightNode, scope);
  if (left instanceof UnknownValue) return left;
  if (right instanceof UnknownValue) return right;

  switch (operator) {
    case "==":
      return valuesEqual(left, right);
    case "!=":
      return !valuesEqual(left, right);
    case "<":
      return expectNumber(operator, left) < expectNumber(operator, right);
    case "<=":
      return expectNumber(operator, left) <= expectNumber(operator, right);
    case ">":
      return expectNumber(operator, left) > expectNumber(operator, right);
    case ">=":
      return expectNumber(operator, left) >= expectNumber(operator, right);
    case "+":
      return expectNumber(operator, left) + expectNumber(operator, right);
    case "-":
      return expectNumber(operator, left) - expectNumber(operator, right);
    case "*":
      return expectNumber(operator, left) * expectNumber(operator, right);
    case "/":
    case "%": {
      const divisor = expectNumber(operator, right);
      if (divisor === 0) throw new ResolutionError(`Division by zero in ${operator}`);
      const dividend = expectNumber(operator, left);
      return operator === "/" ? dividend / divisor : dividend % divisor;
    }
  }
}

function evaluateCall(
  node: Extract<ExprNode, { type: "call" }>,
  scope: EvalScope,
): Value | AppendList {
  const args = node.args.map((arg) => evaluate(arg, scope));
  const unknown = args.find((arg): arg is UnknownValue => arg instanceof UnknownValue);
  if (unknown) return new UnknownValue(`${node.name}(${unknown.reference})`);
  return callBuiltin(node.name, args, scope.functions);
}

function expectPlain(value: Value | AppendList, functionName: string): Value {
  if (value instanceof AppendList) {
    throw new ResolutionError(
      `${functionName}() result can only be used as a whole value, not inside an expression`,
    );
  }
  return value;
}

function expectBool(operator: string, value: Value): boolean {
  if (typeof value === "boolean") return value;
  throw new ResolutionError(`Operator ${operator} requires bools, got ${describeType(value)}`);
}

function expectNumber(operator: string, value: Value): number {
  if (typeof value === "number") return value;
  throw new ResolutionError(`Operator ${operator} requires numbers, got ${describeType(value)}`);
}
