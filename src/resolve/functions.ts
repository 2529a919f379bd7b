import crypto from "node:crypto";
import path from "node:path";

import { ResolutionError } from "../core/errors.js";
import { toPosixPath } from "../core/utils.js";

import { deepMerge } from "./merge.js";
import {
  AppendList,
  describeType,
  isValueMap,
  ownValue,
  valuesEqual,
  type Value,
  type ValueMap,
} from "./values.js";

// =============================================================================
// TYPES
// =============================================================================

export type FunctionContext = {
  rootDir: string;
  configDir: string;
  env: Readonly<Record<string, string | undefined>>;
};

export type BuiltinFunction = (args: Value[], context: FunctionContext) => Value | AppendList;

// =============================================================================
// REGISTRY
// =============================================================================

export const BUILTIN_FUNCTIONS: Readonly<Record<string, BuiltinFunction>> = {
  format: (args) => {
    const [template, ...rest] = args;
    return formatString(expectString("format", template, 0), rest);
  },
  lower: (args) => expectString("lower", args[0], 0).toLowerCase(),
  upper: (args) => expectString("upper", args[0], 0).toUpperCase(),
  trimspace: (args) => expectString("trimspace", args[0], 0).trim(),
  replace: (args) => {
    expectArity("replace", args, 3);
    const input = expectString("replace", args[0], 0);
    const search = expectString("replace", args[1], 1);
    const replacement = expectString("replace", args[2], 2);
    if (search.length === 0) return input;
    return input.split(search).join(replacement);
  },
  split: (args) => {
    expectArity("split", args, 2);
    const separator = expectString("split", args[0], 0);
    const input = expectString("split", args[1], 1);
    if (input.length === 0) return [];
    return input.split(separator);
  },
  join: (args) => {
    expectArity("join", args, 2);
    const separator = expectString("join", args[0], 0);
    const items = expectList("join", args[1], 1);
    return items.map((item, index) => interpolate("join", item, index)).join(separator);
  },
  concat: (args) => args.flatMap((arg, index) => expectList("concat", arg, index)),
  append: (args) => {
    expectArity("append", args, 1);
    return new AppendList(expectList("append", args[0], 0));
  },
  length: (args) => {
    expectArity("length", args, 1);
    const [value] = args;
    if (typeof value === "string") return Array.from(value).length;
    if (Array.isArray(value)) return value.length;
    if (isValueMap(value)) return Object.keys(value).length;
    throw argumentError("length", 0, "string, list or map", value);
  },
  contains: (args) => {
    expectArity("contains", args, 2);
    const items = expectList("contains", args[0], 0);
    const needle = args[1] ?? null;
    return items.some((item) => valuesEqual(item, needle));
  },
  keys: (args) => Object.keys(expectMap("keys", args[0], 0)).sort(),
  values: (args) => {
    const map = expectMap("values", args[0], 0);
    return Object.keys(map)
      .sort()
      .map((key) => map[key] ?? null);
  },
  lookup: (args) => {
    if (args.length < 2 || args.length > 3) {
      throw new ResolutionError(`lookup() takes 2 or 3 arguments, got ${args.length}`);
    }
    const map = expectMap("lookup", args[0], 0);
    const key = expectString("lookup", args[1], 1);
    const found = ownValue(map, key);
    if (found !== undefined) return found;
    const fallback = args[2];
    if (fallback !== undefined) return fallback;
    throw new ResolutionError(`lookup(): key ${JSON.stringify(key)} not found and no default given`);
  },
  coalesce: (args) => {
    for (const arg of args) {
      if (arg !== null && arg !== "") return arg;
    }
    throw new ResolutionError("coalesce(): all arguments are null or empty");
  },
  merge: (args) => {
    const merged: ValueMap = {};
    args.forEach((arg, index) => Object.assign(merged, expectMap("merge", arg, index)));
    return merged;
  },
  deep_merge: (args) => {
    let merged: Value = {};
    args.forEach((arg, index) => {
      merged = deepMerge(merged, expectMap("deep_merge", arg, index));
    });
    return merged;
  },
  tostring: (args) => {
    expectArity("tostring", args, 1);
    const [value] = args;
    if (value === null || value === undefined) return null;
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    throw argumentError("tostring", 0, "string, number or bool", value);
  },
  tonumber: (args) => {
    expectArity("tonumber", args, 1);
    const [value] = args;
    if (value === null || value === undefined) return null;
    if (typeof value === "number") return value;
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) return parsed;
    }
    throw new ResolutionError(`tonumber(): cannot convert ${JSON.stringify(value)} to a number`);
  },
  jsonencode: (args) => {
    expectArity("jsonencode", args, 1);
    return JSON.stringify(args[0] ?? null);
  },
  cidrsubnet: (args) => {
    expectArity("cidrsubnet", args, 3);
    const network = parseCidr(expectString("cidrsubnet", args[0], 0));
    const newBits = expectInteger("cidrsubnet", args[1], 1);
    const netNum = expectInteger("cidrsubnet", args[2], 2);
    const prefix = network.prefix + newBits;
    if (newBits < 0 || prefix > 32) {
      throw new ResolutionError(
        `cidrsubnet(): cannot extend prefix /${network.prefix} by ${newBits} bits`,
      );
    }
    if (netNum < 0 || netNum >= 2 ** newBits) {
      throw new ResolutionError(
        `cidrsubnet(): network number ${netNum} does not fit in ${newBits} bits`,
      );
    }
    const address = network.address + netNum * 2 ** (32 - prefix);
    return `${formatIpv4(address)}/${prefix}`;
  },
  cidrhost: (args) => {
    expectArity("cidrhost", args, 2);
    const network = parseCidr(expectString("cidrhost", args[0], 0));
    const hostNum = expectInteger("cidrhost", args[1], 1);
    const size = 2 ** (32 - network.prefix);
    const offset = hostNum < 0 ? size + hostNum : hostNum;
    if (offset < 0 || offset >= size) {
      throw new ResolutionError(
        `cidrhost(): host number ${hostNum} is outside /${network.prefix}`,
      );
    }
    return formatIpv4(network.address + offset);
  },
  short_hash: (args) => {
    if (args.length < 1 || args.length > 2) {
      throw new ResolutionError(`short_hash() takes 1 or 2 arguments, got ${args.length}`);
    }
    const [value] = args;
    const input = typeof value === "string" ? value : JSON.stringify(value ?? null);
    const length = args[1] === undefined ? 8 : expectInteger("short_hash", args[1], 1);
    if (length < 1 || length > 64) {
      throw new ResolutionError(`short_hash(): length must be between 1 and 64, got ${length}`);
    }
    return crypto.createHash("sha256").update(input).digest("hex").slice(0, length);
  },
  get_env: (args, context) => {
    if (args.length < 1 || args.length > 2) {
      throw new ResolutionError(`get_env() takes 1 or 2 arguments, got ${args.length}`);
    }
    const name = expectString("get_env", args[0], 0);
    const value = context.env[name];
    if (value !== undefined) return value;
    return args[1] === undefined ? "" : args[1];
  },
  get_root_dir: (args, context) => {
    expectArity("get_root_dir", args, 0);
    return toPosixPath(context.rootDir);
  },
  get_config_dir: (args, context) => {
    expectArity("get_config_dir", args, 0);
    return toPosixPath(context.configDir);
  },
  path_relative_to_root: (args, context) => {
    expectArity("path_relative_to_root", args, 0);
    const relative = path.relative(context.rootDir, context.configDir);
    return relative === "" ? "." : toPosixPath(relative);
  },
};

export function callBuiltin(
  name: string,
  args: Value[],
  context: FunctionContext,
): Value | AppendList {
  const fn = Object.hasOwn(BUILTIN_FUNCTIONS, name) ? BUILTIN_FUNCTIONS[name] : undefined;
  if (!fn) {
    throw new ResolutionError(`Unknown function ${name}()`);
  }
  return fn(args, context);
}

/** String form of a value placed inside a template; null, lists and maps cannot be interpolated. */
export function interpolate(where: string, value: Value | undefined, position?: number): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  const at = position === undefined ? "" : ` (element ${position})`;
  throw new ResolutionError(`${where}: cannot interpolate a ${describeType(value)} value${at}`);
}

// =============================================================================
// FORMAT
// =============================================================================

function formatString(template: string, args: Value[]): string {
  let next = 0;
  const take = (verb: string): Value => {
    if (next >= args.length) {
      throw new ResolutionError(`format(): not enough arguments for %${verb}`);
    }
    const value = args[next] ?? null;
    next += 1;
    return value;
  };

  const result = template.replace(/%([%sdvq])/g, (_match, verb: string) => {
    switch (verb) {
      case "%":
        return "%";
      case "s":
        return interpolate("format()", take(verb));
      case "d": {
        const value = take(verb);
        if (typeof value !== "number" || !Number.isInteger(value)) {
          throw new ResolutionError(`format(): %d requires an integer, got ${describeType(value)}`);
        }
        return String(value);
      }
      case "q":
        return JSON.stringify(interpolate("format()", take(verb)));
      default: {
        const value = take(verb);
        return typeof value === "string" ? value : JSON.stringify(value);
      }
    }
  });

  if (next < args.length) {
    throw new ResolutionError(`format(): ${args.length - next} unused argument(s)`);
  }
  return result;
}

// =============================================================================
// NETWORK HELPERS
// =============================================================================

function parseCidr(value: string): { address: number; prefix: number } {
  const match = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/.exec(value);
  if (!match) {
    throw new ResolutionError(`Invalid IPv4 CIDR ${JSON.stringify(value)}`);
  }
  const octets = match.slice(1, 5).map(Number);
  const prefix = Number(match[5]);
  if (octets.some((octet) => octet > 255) || prefix > 32) {
    throw new ResolutionError(`Invalid IPv4 CIDR ${JSON.stringify(value)}`);
  }
  const raw = octets.reduce((acc, octet) => acc * 256 + octet, 0);
  const blockSize = 2 ** (32 - prefix);
  return { address: Math.floor(raw / blockSize) * blockSize, prefix };
}

function formatIpv4(address: number): string {
  const octets: number[] = [];
  let remaining = address;
  for (let index = 0; index < 4; index += 1) {
    octets.unshift(remaining % 256);
    remaining = Math.floor(remaining / 256);
  }
  return octets.join(".");
}

// =============================================================================
// ARGUMENT CHECKS
// =============================================================================

function expectArity(name: string, args: Value[], count: number): void {
  if (args.length !== count) {
    throw new ResolutionError(`${name}() takes ${count} argument(s), got ${args.length}`);
  }
}

function expectString(name: string, value: Value | undefined, position: number): string {
  if (typeof value === "string") return value;
  throw argumentError(name, position, "string", value);
}

function expectInteger(name: string, value: Value | undefined, position: number): number {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  throw argumentError(name, position, "integer", value);
}

function expectList(name: string, value: Value | undefined, position: number): Value[] {
  if (Array.isArray(value)) return value;
  throw argumentError(name, position, "list", value);
}

function expectMap(name: string, value: Value | undefined, position: number): ValueMap {
  if (isValueMap(value)) return value;
  throw argumentError(name, position, "map", value);
}

function argumentError(
  name: string,
  position: number,
  expected: string,
  value: Value | undefined,
): ResolutionError {
  return new ResolutionError(
    `${name}(): argument ${position + 1} must be a ${expected}, got ${describeType(value)}`,
  );
}
