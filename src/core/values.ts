import {
  bigint,
  boolean,
  is,
  maxValue,
  minValue,
  pipe,
  regex,
  string,
} from "valibot";
import { ExecutionFailure } from "./errors";
import type { Address } from "../types/brands";
import { isAddress } from "../types/brands";
import type { Args, BinaryOp, Param, ParamType, Value } from "./types";

export const MAX_UINT256 = 2n ** 256n - 1n;

export const uint256Schema = pipe(bigint(), minValue(0n), maxValue(MAX_UINT256));
export const addressSchema = pipe(string(), regex(/^0x[0-9a-f]{40}$/));

const schemas = {
  uint256: uint256Schema,
  bool: boolean(),
  address: addressSchema,
  string: string(),
} as const;

export const conforms = (type: ParamType, value: unknown): value is Value =>
  is(schemas[type], value);

export const defaultOf = (type: ParamType): Value => {
  switch (type) {
    case "uint256":
      return 0n;
    case "bool":
      return false;
    case "address":
      return "0x0000000000000000000000000000000000000000";
    case "string":
      return "";
  }
};

/** Binds caller-supplied arguments to declared params; exact match required. */
export const bindArgs = (
  params: readonly Param[] = [],
  args: Args = {},
): Map<string, Value> => {
  const bound = new Map<string, Value>();
  for (const p of params) {
    const v = args[p.name];
    if (v === undefined) {
      throw new ExecutionFailure("InvalidArguments", `missing argument ${p.name}`);
    }
    if (!conforms(p.type, v)) {
      throw new ExecutionFailure(
        "InvalidArguments",
        `argument ${p.name} is not a ${p.type}`,
      );
    }
    bound.set(p.name, v);
  }
  const extra = Object.keys(args).filter((k) => !bound.has(k));
  if (extra.length) {
    throw new ExecutionFailure(
      "InvalidArguments",
      `unexpected argument ${extra.join(", ")}`,
    );
  }
  return bound;
};

/* ── coercions used by the interpreter ───────────────────── */
export const asUint = (v: Value): bigint => {
  if (typeof v !== "bigint") throw new ExecutionFailure("AssertFailed", "expected uint256");
  return v;
};

export const asBool = (v: Value): boolean => {
  if (typeof v !== "boolean") throw new ExecutionFailure("AssertFailed", "expected bool");
  return v;
};

export const asAddressValue = (v: Value): Address => {
  if (!isAddress(v)) throw new ExecutionFailure("AssertFailed", "expected address");
  return v;
};

export const keyOf = (v: Value): string =>
  typeof v === "string" ? v : v.toString();

export const slotKey = (base: string, keys: readonly Value[]): string =>
  keys.reduce<string>((acc, k) => `${acc}[${keyOf(k)}]`, base);

const checked = (n: bigint): bigint => {
  if (n < 0n) throw new ExecutionFailure("AssertFailed", "arithmetic underflow");
  if (n > MAX_UINT256) throw new ExecutionFailure("AssertFailed", "arithmetic overflow");
  return n;
};

export const binary = (fn: BinaryOp, l: Value, r: Value): Value => {
  switch (fn) {
    case "add":
      return checked(asUint(l) + asUint(r));
    case "sub":
      return checked(asUint(l) - asUint(r));
    case "mul":
      return checked(asUint(l) * asUint(r));
    case "div":
    case "mod": {
      const d = asUint(r);
      if (d === 0n) throw new ExecutionFailure("AssertFailed", "division by zero");
      return fn === "div" ? asUint(l) / d : asUint(l) % d;
    }
    case "eq":
      return l === r;
    case "neq":
      return l !== r;
    case "lt":
      return asUint(l) < asUint(r);
    case "lte":
      return asUint(l) <= asUint(r);
    case "gt":
      return asUint(l) > asUint(r);
    case "gte":
      return asUint(l) >= asUint(r);
    case "and":
      return asBool(l) && asBool(r);
    case "or":
      return asBool(l) || asBool(r);
  }
};
