import type { Address } from "../types/brands";

export type { Address, Hex } from "../types/brands";

/* ── primitive values ────────────────────────────────────── */
export type Value = bigint | boolean | string;
export type ParamType = "uint256" | "bool" | "address" | "string";
export type Args = Readonly<Record<string, Value>>;

export interface Param {
  name: string;
  type: ParamType;
}

/* ── instruction IR: expressions ─────────────────────────── */
export type EnvField =
  | "sender"
  | "origin"
  | "value"
  | "self"
  | "timestamp"
  | "blockNumber"
  | "gasLeft";

export type BinaryOp =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "mod"
  | "eq"
  | "neq"
  | "lt"
  | "lte"
  | "gt"
  | "gte"
  | "and"
  | "or";

export type Expr =
  | { op: "const"; value: Value }
  | { op: "arg"; name: string }
  | { op: "local"; name: string }
  | { op: "env"; field: EnvField }
  | { op: "balance"; of: Expr }
  // mapping-style key: `base[k1][k2]`
  | { op: "slot"; base: string; keys: Expr[] }
  | { op: "sload"; key: Expr }
  | { op: "bin"; fn: BinaryOp; left: Expr; right: Expr }
  | { op: "not"; arg: Expr };

/* ── instruction IR: statements ──────────────────────────── */
export type CallKind = "call" | "delegatecall";

export interface CallInstr {
  op: "call";
  kind: CallKind;
  target: Expr;
  fn: string; // "" selects the fallback / a plain value send
  args?: Record<string, Expr>;
  value?: Expr;
  gas?: Expr;
  /** low-level call: failure lands in `success` instead of propagating */
  try?: boolean;
  success?: string;
  result?: string;
}

export type Instr =
  | { op: "let"; name: string; value: Expr }
  | { op: "sstore"; key: Expr; value: Expr }
  | { op: "require"; cond: Expr; reason: string }
  | { op: "assert"; cond: Expr }
  | { op: "revert"; reason: string }
  | { op: "emit"; event: string; args: Record<string, Expr> }
  | CallInstr
  | { op: "invoke"; fn: string; args?: Record<string, Expr>; result?: string }
  | { op: "if"; cond: Expr; then: Instr[]; else?: Instr[] }
  | { op: "return"; value: Expr }
  | { op: "selfdestruct"; beneficiary: Expr };

/* ── contract code ───────────────────────────────────────── */
export type Visibility = "external" | "public" | "internal" | "private";
export type Mutability = "view" | "pure" | "payable" | "mutating";

export interface FunctionDef {
  name: string;
  params?: Param[];
  returns?: ParamType;
  visibility: Visibility;
  mutability: Mutability;
  nonReentrant?: boolean;
  virtual?: boolean;
  override?: boolean;
  body: Instr[];
}

export interface InitDef {
  params?: Param[];
  payable?: boolean;
  body: Instr[];
}

export interface FallbackDef {
  payable?: boolean;
  nonReentrant?: boolean;
  body: Instr[];
}

export interface EventFieldDecl {
  name: string;
  type: ParamType;
  indexed?: boolean;
}

export interface EventDecl {
  name: string;
  fields: EventFieldDecl[];
}

export interface ContractCode {
  name: string;
  bases?: ContractCode[];
  init?: InitDef;
  fallback?: FallbackDef;
  functions: FunctionDef[];
  events?: EventDecl[];
}

/* ── deployed contract (flattened once at deploy) ────────── */
export interface ResolvedFunction extends FunctionDef {
  definedIn: string;
}

export interface ResolvedInit extends InitDef {
  definedIn: string;
}

export interface ResolvedFallback extends FallbackDef {
  definedIn: string;
}

export interface Contract {
  readonly address: Address;
  readonly name: string;
  readonly functions: ReadonlyMap<string, ResolvedFunction>;
  readonly events: ReadonlyMap<string, EventDecl>;
  /** base-first, each run exactly once at deploy */
  readonly inits: readonly ResolvedInit[];
  readonly fallback?: ResolvedFallback;
}

/* ── events ──────────────────────────────────────────────── */
export interface EventField {
  name: string;
  value: Value;
  indexed: boolean;
}

export interface ContractEvent {
  address: Address;
  name: string;
  fields: EventField[];
}

export interface LoggedEvent extends ContractEvent {
  logIndex: number;
}

export interface EventFilter {
  address?: Address;
  event?: string;
  where?: Record<string, Value>;
}

/* ── failures & results ──────────────────────────────────── */
export type FailureKind =
  | "OutOfGas"
  | "RequireFailed"
  | "AssertFailed"
  | "RevertedExplicit"
  | "ReentrancyBlocked"
  | "VisibilityViolation"
  | "PayableViolation"
  | "NoSuchContract"
  | "DeploymentError"
  | "InvalidArguments"
  | "StaticViolation"
  | "CallDepthExceeded"
  | "InsufficientBalance";

export interface Failure {
  kind: FailureKind;
  reason?: string;
}

export type CallResult =
  | {
      status: "committed";
      returnValue: Value | undefined;
      gasUsed: bigint;
      events: LoggedEvent[];
    }
  | {
      status: "reverted";
      failure: Failure;
      gasUsed: bigint;
      events: [];
    };

export interface BlockContext {
  timestamp: bigint;
  number: bigint;
}
