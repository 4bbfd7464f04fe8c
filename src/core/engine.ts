import { resolveConfig, type EngineConfig } from "../config";
import { makeLogger, type ILogger } from "../logging";
import { asAddress } from "../types/brands";
import { DeploymentError, EngineError, ExecutionFailure } from "./errors";
import { EventLog } from "./events";
import { CallFrame } from "./frame";
import { GAS, GasMeter, failurePolicy } from "./gas";
import { ReentrancyGuard } from "./guard";
import { computeStateRoot } from "./hash";
import { StateJournal } from "./journal";
import { ContractRegistry } from "./registry";
import { StorageModel } from "./storage";
import type {
  Address,
  Args,
  BlockContext,
  CallInstr,
  CallResult,
  Contract,
  ContractCode,
  EnvField,
  EventFilter,
  Expr,
  Failure,
  FunctionDef,
  Hex,
  Instr,
  LoggedEvent,
  Mutability,
  ResolvedFallback,
  ResolvedFunction,
  ResolvedInit,
  Value,
} from "./types";
import {
  asAddressValue,
  asBool,
  asUint,
  binary,
  bindArgs,
  conforms,
  defaultOf,
  keyOf,
  slotKey,
} from "./values";

export const ZERO_ADDRESS = asAddress("0x0000000000000000000000000000000000000000");

const CONSTRUCTOR = Symbol("constructor");

interface FrameRequest {
  caller: Address;
  origin: Address;
  codeAddress: Address;
  storageAddress: Address;
  fn: string | typeof CONSTRUCTOR;
  args: Args;
  value: bigint;
  /** false under delegatecall: value is only apparent */
  transfer: boolean;
  gas: bigint;
  isStatic: boolean;
  constructing: boolean;
  delegated: boolean;
}

type FrameResult =
  | { ok: true; value: Value | undefined; gasLeft: bigint; events: LoggedEvent[] }
  | { ok: false; failure: Failure; gasLeft: bigint };

type Bound =
  | { kind: "function"; fn: ResolvedFunction; args: Map<string, Value> }
  | { kind: "fallback"; fallback: ResolvedFallback }
  | { kind: "init"; inits: { init: ResolvedInit; args: Map<string, Value> }[] };

interface Scope {
  frame: CallFrame;
  contract: Contract;
  definedIn: string;
  mutability: Mutability;
  args: ReadonlyMap<string, Value>;
  locals: Map<string, Value>;
}

interface Staged {
  entry: Uint8Array;
  retired: Address[];
}

/** Signals that a body finished early (`return`, `selfdestruct`). */
interface Completion {
  value?: Value;
}

/** A host stack overflow, as thrown by V8 once recursion outruns the call stack. */
const isStackOverflow = (err: unknown): err is RangeError =>
  err instanceof RangeError && err.message.includes("Maximum call stack size exceeded");

const assertSpendable = (what: string, value: bigint, gas: bigint): void => {
  if (value < 0n) throw new EngineError(`${what} with negative value ${value}`, "InvalidArguments");
  if (gas < 0n) throw new EngineError(`${what} with negative gas ${gas}`, "InvalidArguments");
};

const RANK: Record<Mutability, number> = { pure: 0, view: 1, mutating: 2, payable: 2 };

const narrower = (outer: Mutability, inner: Mutability): Mutability =>
  RANK[outer] < RANK[inner] ? outer : inner;

/** Whether the entry point a call would land on carries a reentrancy guard. */
const isGuarded = (contract: Contract, fn: string): boolean => {
  const def = fn === "" ? undefined : contract.functions.get(fn);
  if (def) return Boolean(def.nonReentrant);
  return Boolean(contract.fallback?.nonReentrant);
};

export interface EngineOptions {
  config?: Partial<EngineConfig>;
  logger?: ILogger;
}

export interface DeployOptions {
  deployer?: Address;
  value?: bigint;
  gas?: bigint;
}

export class Engine {
  readonly registry = new ContractRegistry();
  readonly storage = new StorageModel();
  readonly events = new EventLog();
  readonly guard = new ReentrancyGuard();
  readonly journal = new StateJournal();
  readonly config: EngineConfig;
  private readonly log: ILogger;
  private blockCtx: BlockContext = { timestamp: 0n, number: 0n };

  constructor(opts: EngineOptions = {}) {
    this.config = resolveConfig(opts.config);
    this.log = opts.logger ?? makeLogger(this.config.logLevel, this.config.logPretty);
  }

  /* ── host API ──────────────────────────────────────────── */
  get block(): BlockContext {
    return this.blockCtx;
  }

  setBlock(ctx: BlockContext): void {
    this.blockCtx = { ...ctx };
  }

  deploy(code: ContractCode, args: Args = {}, opts: DeployOptions = {}): Address {
    const deployer = opts.deployer ?? ZERO_ADDRESS;
    const gas = opts.gas ?? this.config.deployGas;
    const value = opts.value ?? 0n;
    assertSpendable("deploy", value, gas);
    const address = this.registry.nextAddress(deployer);
    const contract = this.registry.register(address, code);
    let res: FrameResult;
    try {
      res = this.runTop({
        caller: deployer,
        origin: deployer,
        codeAddress: address,
        storageAddress: address,
        fn: CONSTRUCTOR,
        args,
        value,
        transfer: true,
        gas,
        isStatic: false,
        constructing: true,
        delegated: false,
      });
    } catch (err) {
      this.registry.unregister(address);
      throw err;
    }
    if (!res.ok) {
      this.registry.unregister(address);
      this.log.debug({ name: code.name, address, failure: res.failure }, "deploy reverted");
      throw new DeploymentError(
        `constructor of ${code.name} failed: ${res.failure.kind}${res.failure.reason ? ` (${res.failure.reason})` : ""}`,
        res.failure,
      );
    }
    this.events.declare(address, contract.events.values());
    this.log.info({ name: code.name, address, gasUsed: (gas - res.gasLeft).toString() }, "deployed");
    return address;
  }

  call(
    caller: Address,
    contract: Address,
    fn: string,
    args: Args = {},
    value = 0n,
    gas: bigint = this.config.defaultGas,
  ): CallResult {
    assertSpendable("call", value, gas);
    const res = this.runTop({
      caller,
      origin: caller,
      codeAddress: contract,
      storageAddress: contract,
      fn,
      args,
      value,
      transfer: true,
      gas,
      isStatic: false,
      constructing: false,
      delegated: false,
    });
    const gasUsed = gas - res.gasLeft;
    if (res.ok) {
      this.log.debug({ contract, fn, gasUsed: gasUsed.toString(), events: res.events.length }, "call committed");
      return { status: "committed", returnValue: res.value, gasUsed, events: res.events };
    }
    this.log.debug({ contract, fn, gasUsed: gasUsed.toString(), failure: res.failure }, "call reverted");
    return { status: "reverted", failure: res.failure, gasUsed, events: [] };
  }

  queryEvents(filter: EventFilter = {}): IterableIterator<LoggedEvent> {
    return this.events.query(filter);
  }

  /** Off-chain read of persisted state; charges nothing. */
  readStorage(contract: Address, key: string): Value {
    return this.storage.readPersisted(contract, key);
  }

  balanceOf(address: Address): bigint {
    return this.storage.balanceOf(address);
  }

  /** Genesis-style mint for externally owned accounts. */
  fund(address: Address, amount: bigint): void {
    if (amount < 0n) throw new EngineError("cannot fund a negative amount");
    this.storage.snapshot();
    this.storage.setBalance(address, this.storage.balanceOf(address) + amount);
    this.commitHost([]);
  }

  terminate(address: Address, beneficiary?: Address): void {
    if (!this.registry.find(address)) {
      throw new EngineError(`cannot terminate unknown contract ${address}`, "NoSuchContract");
    }
    this.storage.snapshot();
    if (beneficiary) {
      this.storage.setBalance(
        beneficiary,
        this.storage.balanceOf(beneficiary) + this.storage.balanceOf(address),
      );
      this.storage.setBalance(address, 0n);
    }
    this.commitHost([address]);
    this.log.info({ address }, "terminated");
  }

  stateRoot(): Hex {
    return computeStateRoot(this.storage.dump());
  }

  /* ── frames ────────────────────────────────────────────── */
  /**
   * Entry for host calls. Recursion deep enough to exhaust the host stack
   * reverts the whole transaction as a depth failure and burns its gas.
   */
  private runTop(req: FrameRequest): FrameResult {
    const depth = this.storage.depth;
    try {
      return this.runFrame(req);
    } catch (err) {
      if (!isStackOverflow(err)) throw err;
      this.storage.rollbackTo(depth);
      this.guard.clear();
      this.log.warn({ contract: req.codeAddress }, "host stack exhausted");
      return {
        ok: false,
        failure: { kind: "CallDepthExceeded", reason: "host stack exhausted" },
        gasLeft: 0n,
      };
    }
  }

  private runFrame(req: FrameRequest, parent?: CallFrame): FrameResult {
    const frame = new CallFrame(
      {
        sender: req.caller,
        origin: req.origin,
        value: req.value,
        self: req.storageAddress,
        codeAddress: req.codeAddress,
        timestamp: this.blockCtx.timestamp,
        blockNumber: this.blockCtx.number,
      },
      new GasMeter(req.gas),
      { isStatic: req.isStatic, constructing: req.constructing, delegated: req.delegated },
      parent,
    );
    parent?.adopt(frame);
    this.storage.snapshot();
    let open = true;
    try {
      frame.transition("Binding");
      const contract = this.registry.lookup(req.codeAddress);
      const bound = this.bind(contract, req);
      if (req.transfer) this.storage.transfer(req.caller, req.storageAddress, req.value);
      if (bound.kind !== "init" && isGuarded(contract, req.fn === CONSTRUCTOR ? "" : req.fn)) {
        frame.guardTokens.push(this.guard.enter(req.storageAddress));
      }

      frame.transition("Executing");
      const value = this.runEntry(frame, contract, bound);

      frame.transition("Committing");
      if (parent) {
        this.storage.commit();
        open = false;
        frame.passTerminations(parent);
      } else {
        const entry = this.stage(frame.terminations, this.events.staged(frame));
        this.storage.commit();
        open = false;
        this.seal(entry);
      }
      const events = this.events.flush(frame);
      frame.transition("Done");
      return { ok: true, value, gasLeft: frame.meter.remaining, events };
    } catch (err) {
      if (!(err instanceof ExecutionFailure) || !open) {
        if (open) this.storage.rollback();
        throw err;
      }
      frame.transition("Reverting");
      this.storage.rollback();
      this.events.discard(frame);
      frame.terminations.length = 0;
      frame.meter.fail(failurePolicy(err.kind, err.propagated));
      frame.transition("Done");
      this.log.debug(
        { depth: frame.depth, contract: req.codeAddress, kind: err.kind, reason: err.reason },
        "frame reverted",
      );
      return { ok: false, failure: err.toFailure(), gasLeft: frame.meter.remaining };
    } finally {
      for (const token of frame.guardTokens.splice(0)) token.release();
      parent?.release(frame);
    }
  }

  /**
   * Encodes the journal entry for the one open layer before anything is
   * merged, so a failed encode leaves persisted state as it was.
   */
  private stage(terminations: readonly Address[], events: readonly LoggedEvent[]): Staged {
    const delta = this.storage.staged();
    const retired = [...new Set(terminations)];
    delta.destroyed.push(...retired);
    return { entry: this.journal.encode(delta, events), retired };
  }

  /** Runs once the staged layer has been merged: retire self-destructed contracts, journal. */
  private seal({ entry, retired }: Staged): void {
    for (const address of retired) {
      this.registry.terminate(address);
      this.storage.destroy(address);
    }
    this.journal.push(entry);
  }

  /** Commits a host-level state change made on a fresh snapshot. */
  private commitHost(terminations: readonly Address[]): void {
    let entry: Staged;
    try {
      entry = this.stage(terminations, []);
    } catch (err) {
      this.storage.rollback();
      throw err;
    }
    this.storage.commit();
    this.seal(entry);
  }

  private bind(contract: Contract, req: FrameRequest): Bound {
    if (req.fn === CONSTRUCTOR) {
      const last = contract.inits[contract.inits.length - 1];
      if (req.value > 0n && !last?.payable) {
        throw new ExecutionFailure("PayableViolation", `constructor of ${contract.name} is not payable`);
      }
      const used = new Set<string>();
      const inits = contract.inits.map((init) => {
        const params = init.params ?? [];
        for (const p of params) used.add(p.name);
        const own = Object.fromEntries(
          params.filter((p) => p.name in req.args).map((p) => [p.name, req.args[p.name]]),
        );
        return { init, args: bindArgs(params, own) };
      });
      const extra = Object.keys(req.args).filter((k) => !used.has(k));
      if (extra.length) {
        throw new ExecutionFailure("InvalidArguments", `unexpected argument ${extra.join(", ")}`);
      }
      return { kind: "init", inits };
    }

    const fn = req.fn === "" ? undefined : contract.functions.get(req.fn);
    if (fn) {
      if (fn.visibility !== "external" && fn.visibility !== "public") {
        throw new ExecutionFailure(
          "VisibilityViolation",
          `${contract.name}.${fn.name} is ${fn.visibility}`,
        );
      }
      if (req.value > 0n && fn.mutability !== "payable") {
        throw new ExecutionFailure("PayableViolation", `${contract.name}.${fn.name} is not payable`);
      }
      return { kind: "function", fn, args: bindArgs(fn.params, req.args) };
    }
    if (contract.fallback) {
      if (req.value > 0n && !contract.fallback.payable) {
        throw new ExecutionFailure("PayableViolation", `fallback of ${contract.name} is not payable`);
      }
      return { kind: "fallback", fallback: contract.fallback };
    }
    throw new ExecutionFailure(
      "VisibilityViolation",
      `${contract.name} has no function ${req.fn || "fallback"}`,
    );
  }

  private runEntry(frame: CallFrame, contract: Contract, bound: Bound): Value | undefined {
    const scope = (
      definedIn: string,
      mutability: Mutability,
      args: ReadonlyMap<string, Value>,
    ): Scope => ({ frame, contract, definedIn, mutability, args, locals: new Map() });

    switch (bound.kind) {
      case "init":
        frame.meter.charge(GAS.create);
        for (const { init, args } of bound.inits) {
          this.exec(scope(init.definedIn, "payable", args), init.body);
        }
        return undefined;
      case "fallback": {
        const { fallback } = bound;
        this.exec(
          scope(fallback.definedIn, fallback.payable ? "payable" : "mutating", new Map()),
          fallback.body,
        );
        return undefined;
      }
      case "function": {
        const done = this.exec(scope(bound.fn.definedIn, bound.fn.mutability, bound.args), bound.fn.body);
        return this.returned(bound.fn, done);
      }
    }
  }

  private returned(fn: FunctionDef, done: Completion | undefined): Value | undefined {
    if (!fn.returns) return undefined;
    const value = done?.value ?? defaultOf(fn.returns);
    if (!conforms(fn.returns, value)) {
      throw new ExecutionFailure("AssertFailed", `${fn.name} must return ${fn.returns}`);
    }
    return value;
  }

  /* ── interpreter ───────────────────────────────────────── */
  private exec(scope: Scope, body: readonly Instr[]): Completion | undefined {
    for (const ins of body) {
      const done = this.step(scope, ins);
      if (done) return done;
    }
    return undefined;
  }

  private step(scope: Scope, ins: Instr): Completion | undefined {
    const { frame } = scope;
    switch (ins.op) {
      case "let":
        scope.locals.set(ins.name, this.eval(scope, ins.value));
        return undefined;
      case "sstore": {
        this.ensureWritable(scope, "sstore");
        const key = keyOf(this.eval(scope, ins.key));
        const value = this.eval(scope, ins.value);
        this.storage.write(frame.ctx.self, key, value, frame.meter);
        return undefined;
      }
      case "require":
        if (!asBool(this.eval(scope, ins.cond))) {
          throw new ExecutionFailure("RequireFailed", ins.reason);
        }
        return undefined;
      case "assert":
        if (!asBool(this.eval(scope, ins.cond))) throw new ExecutionFailure("AssertFailed");
        return undefined;
      case "revert":
        throw new ExecutionFailure("RevertedExplicit", ins.reason);
      case "emit":
        this.emit(scope, ins.event, ins.args);
        return undefined;
      case "call":
        this.externalCall(scope, ins);
        return undefined;
      case "invoke":
        this.invoke(scope, ins.fn, ins.args ?? {}, ins.result);
        return undefined;
      case "if":
        return asBool(this.eval(scope, ins.cond))
          ? this.exec(scope, ins.then)
          : this.exec(scope, ins.else ?? []);
      case "return":
        return { value: this.eval(scope, ins.value) };
      case "selfdestruct": {
        this.ensureWritable(scope, "selfdestruct");
        const to = asAddressValue(this.eval(scope, ins.beneficiary));
        frame.meter.charge(GAS.selfDestruct);
        this.storage.transfer(frame.ctx.self, to, this.storage.balanceOf(frame.ctx.self));
        frame.terminations.push(frame.ctx.self);
        return {};
      }
    }
  }

  private eval(scope: Scope, ex: Expr): Value {
    const { frame } = scope;
    switch (ex.op) {
      case "const":
        return ex.value;
      case "arg": {
        const v = scope.args.get(ex.name);
        if (v === undefined) throw new ExecutionFailure("AssertFailed", `unbound argument ${ex.name}`);
        return v;
      }
      case "local": {
        const v = scope.locals.get(ex.name);
        if (v === undefined) throw new ExecutionFailure("AssertFailed", `unbound local ${ex.name}`);
        return v;
      }
      case "env":
        this.ensureReadable(scope, ex.field);
        return this.env(frame, ex.field);
      case "balance": {
        this.ensureReadable(scope, "balance");
        const of = asAddressValue(this.eval(scope, ex.of));
        frame.meter.charge(GAS.read);
        return this.storage.balanceOf(of);
      }
      case "slot":
        return slotKey(
          ex.base,
          ex.keys.map((k) => this.eval(scope, k)),
        );
      case "sload": {
        this.ensureReadable(scope, "sload");
        const key = keyOf(this.eval(scope, ex.key));
        frame.meter.charge(GAS.read);
        return this.storage.read(frame.ctx.self, key);
      }
      case "bin": {
        const l = this.eval(scope, ex.left);
        const r = this.eval(scope, ex.right);
        frame.meter.charge(GAS.op);
        return binary(ex.fn, l, r);
      }
      case "not": {
        const v = asBool(this.eval(scope, ex.arg));
        frame.meter.charge(GAS.op);
        return !v;
      }
    }
  }

  private env(frame: CallFrame, field: EnvField): Value {
    switch (field) {
      case "sender":
        return frame.ctx.sender;
      case "origin":
        return frame.ctx.origin;
      case "value":
        return frame.ctx.value;
      case "self":
        return frame.ctx.self;
      case "timestamp":
        return frame.ctx.timestamp;
      case "blockNumber":
        return frame.ctx.blockNumber;
      case "gasLeft":
        return frame.meter.remaining;
    }
  }

  private ensureWritable(scope: Scope, what: string): void {
    if (scope.frame.flags.isStatic) {
      throw new ExecutionFailure("StaticViolation", `${what} inside a static call`);
    }
    if (scope.mutability === "view" || scope.mutability === "pure") {
      throw new ExecutionFailure("StaticViolation", `${what} inside a ${scope.mutability} function`);
    }
  }

  private ensureReadable(scope: Scope, what: string): void {
    if (scope.mutability === "pure") {
      throw new ExecutionFailure("StaticViolation", `${what} inside a pure function`);
    }
  }

  private emit(scope: Scope, name: string, args: Record<string, Expr>): void {
    this.ensureWritable(scope, "emit");
    const decl = scope.contract.events.get(name);
    if (!decl) throw new ExecutionFailure("AssertFailed", `undeclared event ${name}`);
    const fields = decl.fields.map((f) => {
      const expr = args[f.name];
      if (!expr) throw new ExecutionFailure("AssertFailed", `${name}.${f.name} is not set`);
      const value = this.eval(scope, expr);
      if (!conforms(f.type, value)) {
        throw new ExecutionFailure("AssertFailed", `${name}.${f.name} is not a ${f.type}`);
      }
      return { name: f.name, value, indexed: Boolean(f.indexed) };
    });
    const topics = BigInt(fields.filter((f) => f.indexed).length);
    scope.frame.meter.charge(GAS.log + GAS.logTopic * topics);
    this.events.emit(scope.frame, { address: scope.frame.ctx.self, name, fields });
  }

  private invoke(
    scope: Scope,
    name: string,
    argExprs: Record<string, Expr>,
    result: string | undefined,
  ): void {
    const { frame, contract } = scope;
    const fn = contract.functions.get(name);
    if (!fn) throw new ExecutionFailure("VisibilityViolation", `${contract.name} has no function ${name}`);
    if (fn.visibility === "external") {
      throw new ExecutionFailure("VisibilityViolation", `${contract.name}.${name} is external`);
    }
    if (fn.visibility === "private" && fn.definedIn !== scope.definedIn) {
      throw new ExecutionFailure("VisibilityViolation", `${name} is private to ${fn.definedIn}`);
    }
    frame.meter.charge(GAS.jump);
    const args = bindArgs(fn.params, this.evalArgs(scope, argExprs));
    const token = fn.nonReentrant ? this.guard.enter(frame.ctx.self) : undefined;
    try {
      const done = this.exec(
        {
          frame,
          contract,
          definedIn: fn.definedIn,
          mutability: narrower(scope.mutability, fn.mutability),
          args,
          locals: new Map(),
        },
        fn.body,
      );
      const value = this.returned(fn, done);
      if (result !== undefined && value !== undefined) scope.locals.set(result, value);
    } finally {
      token?.release();
    }
  }

  private evalArgs(scope: Scope, exprs: Record<string, Expr>): Record<string, Value> {
    const out: Record<string, Value> = {};
    for (const [k, e] of Object.entries(exprs)) out[k] = this.eval(scope, e);
    return out;
  }

  /**
   * Runs the child frame to completion before returning, so any write the
   * caller issues afterwards is observable to a re-entrant callee.
   */
  private externalCall(scope: Scope, ins: CallInstr): void {
    const { frame } = scope;
    if (frame.flags.constructing) {
      throw new ExecutionFailure("DeploymentError", "external call during construction");
    }
    const delegated = ins.kind === "delegatecall";
    if (delegated && ins.value) {
      throw new ExecutionFailure("InvalidArguments", "delegatecall cannot attach value");
    }
    const target = asAddressValue(this.eval(scope, ins.target));
    const value = ins.value ? asUint(this.eval(scope, ins.value)) : 0n;
    if (value > 0n) this.ensureWritable(scope, "value transfer");
    const args = this.evalArgs(scope, ins.args ?? {});
    const requested = ins.gas ? asUint(this.eval(scope, ins.gas)) : undefined;

    frame.meter.charge(GAS.call + (value > 0n ? GAS.callValue : 0n));

    if (frame.depth + 1 > this.config.maxCallDepth) {
      return this.callFailed(
        scope,
        ins,
        new ExecutionFailure("CallDepthExceeded", `depth ${frame.depth + 1}`),
      );
    }

    const callee = this.registry.find(target);
    if (!callee) {
      // plain value send to an account without code
      if (!delegated && ins.fn === "" && !this.registry.isRetired(target)) {
        try {
          this.storage.transfer(frame.ctx.self, target, value);
        } catch (err) {
          if (err instanceof ExecutionFailure) return this.callFailed(scope, ins, err);
          throw err;
        }
        if (ins.success) scope.locals.set(ins.success, true);
        return undefined;
      }
      return this.callFailed(scope, ins, new ExecutionFailure("NoSuchContract", target));
    }

    const storageAddress = delegated ? frame.ctx.self : target;
    if (isGuarded(callee, ins.fn) && this.guard.isLocked(storageAddress)) {
      return this.callFailed(
        scope,
        ins,
        new ExecutionFailure("ReentrancyBlocked", `${storageAddress} is already entered`),
      );
    }

    // all but one 64th of what is left
    const cap = frame.meter.remaining - frame.meter.remaining / 64n;
    const forwarded = requested !== undefined && requested < cap ? requested : cap;
    frame.meter.charge(forwarded);

    const res = this.runFrame(
      {
        caller: delegated ? frame.ctx.sender : frame.ctx.self,
        origin: frame.ctx.origin,
        codeAddress: target,
        storageAddress,
        fn: ins.fn,
        args,
        value: delegated ? frame.ctx.value : value,
        transfer: !delegated,
        gas: forwarded + (value > 0n ? GAS.callStipend : 0n),
        isStatic:
          frame.flags.isStatic || scope.mutability === "view" || scope.mutability === "pure",
        constructing: false,
        delegated,
      },
      frame,
    );
    frame.meter.refund(res.gasLeft);

    if (!res.ok) return this.callFailed(scope, ins, ExecutionFailure.propagate(res.failure));
    if (ins.success) scope.locals.set(ins.success, true);
    if (ins.result && res.value !== undefined) scope.locals.set(ins.result, res.value);
    return undefined;
  }

  /** Low-level calls swallow the failure into their success flag. */
  private callFailed(scope: Scope, ins: CallInstr, failure: ExecutionFailure): void {
    if (!ins.try) throw failure;
    if (ins.success) scope.locals.set(ins.success, false);
    this.log.trace({ fn: ins.fn, kind: failure.kind }, "low-level call failed");
  }
}
