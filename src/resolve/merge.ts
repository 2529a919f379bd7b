import { ResolutionError } from "../core/errors.js";

import {
  AppendList,
  describeType,
  isValueMap,
  ownValue,
  UnknownValue,
  type MergeValue,
  type MergeValueMap,
  type Value,
  type ValueMap,
} from "./values.js";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Merges an overriding layer onto an inherited value.
 * Scalars and lists replace, maps merge key by key, `append(...)` results extend the inherited list.
 * Keys keep inherited order, with keys new to the override appended after them.
 */
export function deepMerge(base: Value | undefined, override: MergeValue, at = ""): Value {
  if (override instanceof AppendList) {
    if (base === undefined || base === null) return [...override.items];
    if (base instanceof UnknownValue) return base;
    if (!Array.isArray(base)) {
      throw new ResolutionError(
        `Cannot append to ${describeType(base)} value${at ? ` at ${at}` : ""}; append() requires an inherited list`,
      );
    }
    return [...base, ...override.items];
  }

  if (isMergeMap(override)) {
    const result: ValueMap = isValueMap(base) ? { ...base } : {};
    for (const [key, value] of Object.entries(override)) {
      result[key] = deepMerge(ownValue(result, key), value, at ? `${at}.${key}` : key);
    }
    return result;
  }

  return override;
}

export function deepMergeMaps(base: ValueMap, override: MergeValueMap): ValueMap {
  const merged = deepMerge(base, override);
  return isValueMap(merged) ? merged : {};
}

/** Collapses any AppendList left in a value that had nothing to inherit from. */
export function finalizeValue(value: MergeValue): Value {
  return deepMerge(undefined, value);
}

// =============================================================================
// INTERNALS
// =============================================================================

function isMergeMap(value: MergeValue): value is MergeValueMap {
  return isValueMap(value);
}
