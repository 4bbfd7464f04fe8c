import type {
  BinaryOp,
  CallInstr,
  EnvField,
  Expr,
  Instr,
  Value,
} from "./types";

/* ── expressions ─────────────────────────────────────────── */
export const lit = (value: Value): Expr => ({ op: "const", value });
export const arg = (name: string): Expr => ({ op: "arg", name });
export const local = (name: string): Expr => ({ op: "local", name });
export const env = (field: EnvField): Expr => ({ op: "env", field });
export const sender = env("sender");
export const self = env("self");
export const msgValue = env("value");
export const balance = (of: Expr): Expr => ({ op: "balance", of });

/** `base[k1][k2]…` */
export const slot = (base: string, ...keys: Expr[]): Expr => ({ op: "slot", base, keys });
export const sload = (key: Expr | string): Expr => ({
  op: "sload",
  key: typeof key === "string" ? lit(key) : key,
});

const bin =
  (fn: BinaryOp) =>
  (left: Expr, right: Expr): Expr => ({ op: "bin", fn, left, right });

export const add = bin("add");
export const sub = bin("sub");
export const mul = bin("mul");
export const div = bin("div");
export const mod = bin("mod");
export const eq = bin("eq");
export const neq = bin("neq");
export const lt = bin("lt");
export const lte = bin("lte");
export const gt = bin("gt");
export const gte = bin("gte");
export const and = bin("and");
export const or = bin("or");
export const not = (e: Expr): Expr => ({ op: "not", arg: e });

/* ── statements ──────────────────────────────────────────── */
export const letVar = (name: string, value: Expr): Instr => ({ op: "let", name, value });
export const sstore = (key: Expr | string, value: Expr): Instr => ({
  op: "sstore",
  key: typeof key === "string" ? lit(key) : key,
  value,
});
export const requireThat = (cond: Expr, reason: string): Instr => ({ op: "require", cond, reason });
export const assertThat = (cond: Expr): Instr => ({ op: "assert", cond });
export const revert = (reason: string): Instr => ({ op: "revert", reason });
export const emit = (event: string, args: Record<string, Expr>): Instr => ({
  op: "emit",
  event,
  args,
});
export const invoke = (
  fn: string,
  args: Record<string, Expr> = {},
  result?: string,
): Instr => ({ op: "invoke", fn, args, result });
export const ifThen = (cond: Expr, then: Instr[], otherwise?: Instr[]): Instr => ({
  op: "if",
  cond,
  then,
  else: otherwise,
});
export const ret = (value: Expr): Instr => ({ op: "return", value });
export const selfDestruct = (beneficiary: Expr): Instr => ({ op: "selfdestruct", beneficiary });

type CallOpts = Partial<Pick<CallInstr, "args" | "value" | "gas" | "success" | "result">>;

/** High-level call: a callee failure propagates into the caller. */
export const call = (target: Expr, fn: string, opts: CallOpts = {}): CallInstr => ({
  op: "call",
  kind: "call",
  target,
  fn,
  ...opts,
});

/** Low-level call: failure is reported through `success` (default local `ok`). */
export const tryCall = (target: Expr, fn: string, opts: CallOpts = {}): CallInstr => ({
  op: "call",
  kind: "call",
  target,
  fn,
  try: true,
  success: "ok",
  ...opts,
});

export const delegateCall = (
  target: Expr,
  fn: string,
  opts: Omit<CallOpts, "value"> & { try?: boolean } = {},
): CallInstr => ({
  op: "call",
  kind: "delegatecall",
  target,
  fn,
  ...opts,
});
