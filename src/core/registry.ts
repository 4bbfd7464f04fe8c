import { DeploymentError, EngineError, ExecutionFailure } from "./errors";
import { MAX_INDEXED_FIELDS } from "./events";
import { deriveAddress } from "./hash";
import type {
  Address,
  Contract,
  ContractCode,
  EventDecl,
  Instr,
  ResolvedFallback,
  ResolvedFunction,
  ResolvedInit,
} from "./types";

/* ── inheritance: depth-first, first occurrence wins, most-derived last ── */
const linearize = (code: ContractCode, seen = new Set<string>()): ContractCode[] => {
  if (seen.has(code.name)) return [];
  seen.add(code.name);
  const out: ContractCode[] = [];
  for (const base of code.bases ?? []) out.push(...linearize(base, seen));
  out.push(code);
  return out;
};

const sameShape = (a: EventDecl, b: EventDecl) =>
  a.fields.length === b.fields.length &&
  a.fields.every(
    (f, i) =>
      f.name === b.fields[i].name &&
      f.type === b.fields[i].type &&
      Boolean(f.indexed) === Boolean(b.fields[i].indexed),
  );

function* walk(body: readonly Instr[]): Generator<Instr> {
  for (const ins of body) {
    yield ins;
    if (ins.op === "if") {
      yield* walk(ins.then);
      yield* walk(ins.else ?? []);
    }
  }
}

/** Flattens the inheritance chain into one immutable dispatch table. */
export const flatten = (address: Address, code: ContractCode): Contract => {
  const chain = linearize(code);
  const functions = new Map<string, ResolvedFunction>();
  const events = new Map<string, EventDecl>();
  const inits: ResolvedInit[] = [];
  let fallback: ResolvedFallback | undefined;

  for (const c of chain) {
    for (const fn of c.functions) {
      const prior = functions.get(fn.name);
      if (prior?.definedIn === c.name) {
        throw new DeploymentError(`${c.name}.${fn.name} is declared twice`);
      }
      if (prior && !(prior.virtual && fn.override)) {
        throw new DeploymentError(
          `${c.name}.${fn.name} overrides ${prior.definedIn}.${fn.name} without virtual/override`,
        );
      }
      if (!prior && fn.override) {
        throw new DeploymentError(`${c.name}.${fn.name} overrides nothing`);
      }
      functions.set(fn.name, { ...fn, definedIn: c.name });
    }
    for (const ev of c.events ?? []) {
      const indexed = ev.fields.filter((f) => f.indexed).length;
      if (indexed > MAX_INDEXED_FIELDS) {
        throw new DeploymentError(
          `event ${ev.name} marks ${indexed} fields indexed (max ${MAX_INDEXED_FIELDS})`,
        );
      }
      const prior = events.get(ev.name);
      if (prior && !sameShape(prior, ev)) {
        throw new DeploymentError(`event ${ev.name} is declared with two shapes`);
      }
      events.set(ev.name, ev);
    }
    if (c.init) inits.push({ ...c.init, definedIn: c.name });
    if (c.fallback) fallback = { ...c.fallback, definedIn: c.name };
  }

  const bodies = [
    ...[...functions.values()].map((f) => f.body),
    ...inits.map((i) => i.body),
    ...(fallback ? [fallback.body] : []),
  ];
  for (const body of bodies) {
    for (const ins of walk(body)) {
      if (ins.op === "emit") {
        const decl = events.get(ins.event);
        if (!decl) throw new DeploymentError(`emit of undeclared event ${ins.event}`);
        const given = Object.keys(ins.args).sort().join(",");
        const wanted = decl.fields.map((f) => f.name).sort().join(",");
        if (given !== wanted) {
          throw new DeploymentError(`emit ${ins.event} must set exactly ${wanted}`);
        }
      }
      if (ins.op === "invoke" && !functions.has(ins.fn)) {
        throw new DeploymentError(`invoke of unknown function ${ins.fn}`);
      }
    }
  }

  return { address, name: code.name, functions, events, inits, fallback };
};

/** Address → contract arena. Contracts refer to each other by address only. */
export class ContractRegistry {
  private readonly contracts = new Map<Address, Contract>();
  private readonly nonces = new Map<Address, bigint>();
  private readonly retired = new Set<Address>();

  nextAddress(deployer: Address): Address {
    const nonce = this.nonces.get(deployer) ?? 0n;
    this.nonces.set(deployer, nonce + 1n);
    return deriveAddress(deployer, nonce);
  }

  register(address: Address, code: ContractCode): Contract {
    if (this.contracts.has(address) || this.retired.has(address)) {
      throw new DeploymentError(`address ${address} is already taken`);
    }
    const contract = flatten(address, code);
    this.contracts.set(address, contract);
    return contract;
  }

  /** Drops a contract whose constructor failed; the address stays unusable. */
  unregister(address: Address): void {
    this.contracts.delete(address);
    this.retired.add(address);
  }

  find(address: Address): Contract | undefined {
    return this.contracts.get(address);
  }

  lookup(address: Address): Contract {
    const c = this.contracts.get(address);
    if (!c) throw new ExecutionFailure("NoSuchContract", address);
    return c;
  }

  isRetired(address: Address): boolean {
    return this.retired.has(address);
  }

  terminate(address: Address): void {
    if (!this.contracts.has(address)) {
      throw new EngineError(`cannot terminate unknown contract ${address}`, "NoSuchContract");
    }
    this.contracts.delete(address);
    this.retired.add(address);
  }

  get size(): number {
    return this.contracts.size;
  }
}
