import { EngineError, ExecutionFailure } from "./errors";
import { GAS, type GasMeter } from "./gas";
import type { Address, Value } from "./types";

type Namespace = Map<string, Value>;

interface Layer {
  slots: Map<Address, Namespace>;
  balances: Map<Address, bigint>;
}

export interface SlotWrite {
  address: Address;
  key: string;
  value: Value;
}

export interface BalanceWrite {
  address: Address;
  balance: bigint;
}

/** What one top-level transaction committed to persisted state. */
export interface StateDelta {
  slots: SlotWrite[];
  balances: BalanceWrite[];
  destroyed: Address[];
}

export interface AccountDump {
  address: Address;
  balance: bigint;
  slots: [string, Value][];
}

export type WriteClass = "new" | "update";

const emptyLayer = (): Layer => ({ slots: new Map(), balances: new Map() });

const toDelta = (layer: Layer): StateDelta => ({
  slots: [...layer.slots].flatMap(([address, ns]) =>
    [...ns].map(([key, value]) => ({ address, key, value })),
  ),
  balances: [...layer.balances].map(([address, balance]) => ({ address, balance })),
  destroyed: [],
});

/**
 * Per-contract key/value storage plus native balances. Frames stack overlay
 * layers with `snapshot()`; reads fall through every open layer to persisted
 * state, so a child frame observes its ancestors' uncommitted writes.
 */
export class StorageModel {
  private readonly persisted: Layer = emptyLayer();
  private readonly layers: Layer[] = [];

  get depth(): number {
    return this.layers.length;
  }

  peek(contract: Address, key: string): Value | undefined {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const v = this.layers[i].slots.get(contract)?.get(key);
      if (v !== undefined) return v;
    }
    return this.persisted.slots.get(contract)?.get(key);
  }

  has(contract: Address, key: string): boolean {
    return this.peek(contract, key) !== undefined;
  }

  read(contract: Address, key: string): Value {
    return this.peek(contract, key) ?? 0n;
  }

  readPersisted(contract: Address, key: string): Value {
    return this.persisted.slots.get(contract)?.get(key) ?? 0n;
  }

  /** Classifies new-vs-update, charges the meter, then writes. */
  write(contract: Address, key: string, value: Value, meter: GasMeter): WriteClass {
    const top = this.top();
    const cls: WriteClass = this.has(contract, key) ? "update" : "new";
    meter.charge(cls === "new" ? GAS.storageSet : GAS.storageUpdate);
    let ns = top.slots.get(contract);
    if (!ns) {
      ns = new Map();
      top.slots.set(contract, ns);
    }
    ns.set(key, value);
    return cls;
  }

  balanceOf(address: Address): bigint {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const b = this.layers[i].balances.get(address);
      if (b !== undefined) return b;
    }
    return this.persisted.balances.get(address) ?? 0n;
  }

  setBalance(address: Address, balance: bigint): void {
    this.top().balances.set(address, balance);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new ExecutionFailure("InvalidArguments", `negative transfer of ${amount}`);
    }
    if (amount === 0n) return;
    const have = this.balanceOf(from);
    if (have < amount) {
      throw new ExecutionFailure(
        "InsufficientBalance",
        `${from} holds ${have}, needs ${amount}`,
      );
    }
    this.setBalance(from, have - amount);
    this.setBalance(to, this.balanceOf(to) + amount);
  }

  /* ── transactional layer stack ─────────────────────────── */
  snapshot(): number {
    this.layers.push(emptyLayer());
    return this.layers.length;
  }

  /** Merges the top layer down; returns the delta when it reaches persisted state. */
  commit(): StateDelta | undefined {
    const layer = this.layers.pop();
    if (!layer) throw new EngineError("commit without snapshot");
    const below = this.layers[this.layers.length - 1];
    if (below) {
      merge(below, layer);
      return undefined;
    }
    merge(this.persisted, layer);
    return toDelta(layer);
  }

  rollback(): void {
    if (!this.layers.pop()) throw new EngineError("rollback without snapshot");
  }

  /** Drops every layer above `depth`. */
  rollbackTo(depth: number): void {
    if (depth < 0 || depth > this.layers.length) {
      throw new EngineError(`cannot roll back to depth ${depth}`);
    }
    this.layers.length = depth;
  }

  /** The delta the single open layer would commit, without merging it. */
  staged(): StateDelta {
    if (this.layers.length !== 1) {
      throw new EngineError(`staged delta needs one open layer, found ${this.layers.length}`);
    }
    return toDelta(this.layers[0]);
  }

  /* ── persisted-state maintenance ───────────────────────── */
  destroy(contract: Address): void {
    this.assertIdle("destroy");
    this.persisted.slots.delete(contract);
    this.persisted.balances.delete(contract);
  }

  apply(delta: StateDelta): void {
    this.assertIdle("apply");
    for (const w of delta.slots) {
      let ns = this.persisted.slots.get(w.address);
      if (!ns) {
        ns = new Map();
        this.persisted.slots.set(w.address, ns);
      }
      ns.set(w.key, w.value);
    }
    for (const b of delta.balances) this.persisted.balances.set(b.address, b.balance);
    for (const a of delta.destroyed) {
      this.persisted.slots.delete(a);
      this.persisted.balances.delete(a);
    }
  }

  /** Persisted state in canonical (sorted) order. */
  dump(): AccountDump[] {
    const addrs = new Set<Address>([
      ...this.persisted.slots.keys(),
      ...this.persisted.balances.keys(),
    ]);
    return [...addrs].sort().map((address) => ({
      address,
      balance: this.persisted.balances.get(address) ?? 0n,
      slots: [...(this.persisted.slots.get(address) ?? new Map<string, Value>())].sort(
        ([a], [b]) => (a < b ? -1 : a > b ? 1 : 0),
      ),
    }));
  }

  private top(): Layer {
    const top = this.layers[this.layers.length - 1];
    if (!top) throw new EngineError("storage mutation outside of a snapshot");
    return top;
  }

  private assertIdle(op: string): void {
    if (this.layers.length) throw new EngineError(`${op} while a frame is open`);
  }
}

const merge = (into: Layer, from: Layer): void => {
  for (const [addr, ns] of from.slots) {
    let target = into.slots.get(addr);
    if (!target) {
      target = new Map();
      into.slots.set(addr, target);
    }
    for (const [k, v] of ns) target.set(k, v);
  }
  for (const [addr, b] of from.balances) into.balances.set(addr, b);
};
