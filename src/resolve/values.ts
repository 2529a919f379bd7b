/*
Purpose: value domain shared by the resolver, the output layer and the emitter.
Assumptions: resolved values are JSON-shaped; UnknownValue only appears while validating,
AppendList only between evaluating a layer and merging it onto the inherited value.
*/

export type ScalarValue = string | number | boolean | null;

export type Value = ScalarValue | Value[] | ValueMap | UnknownValue;

export interface ValueMap {
  [key: string]: Value;
}

/** Placeholder for an output that is not known until the upstream unit is applied. */
export class UnknownValue {
  constructor(public readonly reference: string) {}

  toString(): string {
    return `<unknown: ${this.reference}>`;
  }

  toJSON(): string {
    return this.toString();
  }
}

/** Produced by `append(...)`: concatenates onto the inherited list instead of replacing it. */
export class AppendList {
  constructor(public readonly items: Value[]) {}
}

export type MergeValue = ScalarValue | Value[] | MergeValueMap | UnknownValue | AppendList;

export interface MergeValueMap {
  [key: string]: MergeValue;
}

export function isValueMap(value: unknown): value is ValueMap {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof UnknownValue) &&
    !(value instanceof AppendList)
  );
}

/** Own-key lookup; inherited `Object.prototype` members are not values. */
export function ownValue<T>(map: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

export function isUnknown(value: unknown): value is UnknownValue {
  return value instanceof UnknownValue;
}

export function containsUnknown(value: Value): boolean {
  if (value instanceof UnknownValue) return true;
  if (Array.isArray(value)) return value.some(containsUnknown);
  if (isValueMap(value)) return Object.values(value).some(containsUnknown);
  return false;
}

export function describeType(value: MergeValue | undefined): string {
  if (value === undefined) return "undefined";
  if (value === null) return "null";
  if (value instanceof UnknownValue) return "unknown";
  if (value instanceof AppendList) return "append";
  if (Array.isArray(value)) return "list";
  if (typeof value === "object") return "map";
  return typeof value;
}

export function valuesEqual(left: Value, right: Value): boolean {
  if (left instanceof UnknownValue || right instanceof UnknownValue) return false;
  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right) || left.length !== right.length) {
      return false;
    }
    return left.every((item, index) => valuesEqual(item, right[index] ?? null));
  }
  if (isValueMap(left) || isValueMap(right)) {
    if (!isValueMap(left) || !isValueMap(right)) return false;
    const leftKeys = Object.keys(left).sort();
    const rightKeys = Object.keys(right).sort();
    if (leftKeys.join("\u0000") !== rightKeys.join("\u0000")) return false;
    return leftKeys.every((key) => valuesEqual(left[key] ?? null, right[key] ?? null));
  }
  return left === right;
}

/**
 * Converts parsed JSON/YAML data into a Value, rejecting anything JSON cannot carry.
 * Reports the offending path when the input does not fit.
 */
export function toValue(raw: unknown, at = "$"): { value: Value } | { error: string } {
  if (raw === null || typeof raw === "string" || typeof raw === "boolean") {
    return { value: raw };
  }
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? { value: raw } : { error: `${at}: non-finite number` };
  }
  if (Array.isArray(raw)) {
    const items: Value[] = [];
    for (const [index, item] of raw.entries()) {
      const converted = toValue(item, `${at}[${index}]`);
      if ("error" in converted) return converted;
      items.push(converted.value);
    }
    return { value: items };
  }
  if (typeof raw === "object" && Object.getPrototypeOf(raw) === Object.prototype) {
    const map: ValueMap = {};
    for (const [key, item] of Object.entries(raw)) {
      const converted = toValue(item, `${at}.${key}`);
      if ("error" in converted) return converted;
      map[key] = converted.value;
    }
    return { value: map };
  }
  return { error: `${at}: unsupported ${typeof raw}` };
}
