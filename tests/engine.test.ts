import { describe, it, expect } from "vitest";
import {
  arg,
  call,
  emit,
  env,
  eq,
  gt,
  invoke,
  lit,
  local,
  requireThat,
  ret,
  self,
  sstore,
  assertThat,
  tryCall,
} from "../src/core/builder";
import { Engine, ZERO_ADDRESS } from "../src/core/engine";
import { DeploymentError, EngineError } from "../src/core/errors";
import { deriveAddress } from "../src/core/hash";
import type { CallResult, ContractCode, Failure } from "../src/core/types";
import { ALICE, BOB, mkAddr } from "./helpers/frame";
import { BURNER, COUNTER, PROBE, TOKEN, VAULT } from "./helpers/contracts";

const failureOf = (r: CallResult): Failure | undefined =>
  r.status === "reverted" ? r.failure : undefined;

const deployError = (fn: () => unknown): DeploymentError => {
  try {
    fn();
  } catch (err) {
    if (err instanceof DeploymentError) return err;
    throw err;
  }
  throw new Error("expected a DeploymentError");
};

const GAS_PROBES: ContractCode = {
  name: "GasProbes",
  functions: [
    {
      name: "touch",
      visibility: "public",
      mutability: "mutating",
      body: [sstore("x", lit(1n)), sstore("x", lit(2n))],
    },
    {
      name: "failRequire",
      visibility: "public",
      mutability: "mutating",
      body: [requireThat(eq(lit(1n), lit(2n)), "nope")],
    },
    {
      name: "failAssert",
      visibility: "public",
      mutability: "mutating",
      body: [assertThat(eq(lit(1n), lit(2n)))],
    },
    {
      name: "sneakyWrite",
      visibility: "public",
      mutability: "view",
      body: [sstore("x", lit(1n))],
    },
    {
      name: "now",
      returns: "uint256",
      visibility: "public",
      mutability: "view",
      body: [ret(env("timestamp"))],
    },
    {
      name: "pureNow",
      returns: "uint256",
      visibility: "public",
      mutability: "pure",
      body: [ret(env("timestamp"))],
    },
  ],
};

describe("Engine: gas", () => {
  it("charges a new write then an update", () => {
    const e = new Engine();
    const c = e.deploy(GAS_PROBES);
    const r = e.call(ALICE, c, "touch");
    expect(r.status).toBe("committed");
    expect(r.gasUsed).toBe(25_000n);
    expect(e.readStorage(c, "x")).toBe(2n);
  });

  it("keeps unused gas on a failed require", () => {
    const e = new Engine();
    const c = e.deploy(GAS_PROBES);
    const r = e.call(ALICE, c, "failRequire", {}, 0n, 100_000n);
    expect(failureOf(r)).toEqual({ kind: "RequireFailed", reason: "nope" });
    expect(r.gasUsed).toBe(3n);
    expect(r.events).toEqual([]);
  });

  it("burns the whole budget on a failed assert", () => {
    const e = new Engine();
    const c = e.deploy(GAS_PROBES);
    const r = e.call(ALICE, c, "failAssert", {}, 0n, 100_000n);
    expect(failureOf(r)).toEqual({ kind: "AssertFailed" });
    expect(r.gasUsed).toBe(100_000n);
  });

  it("prices reads, arithmetic and writes on a counter", () => {
    const e = new Engine();
    const c = e.deploy(COUNTER);
    expect(e.call(ALICE, c, "increment").gasUsed).toBe(20_203n);
    expect(e.call(ALICE, c, "increment").gasUsed).toBe(5_203n);
    const got = e.call(BOB, c, "get");
    expect(got).toEqual({ status: "committed", returnValue: 2n, gasUsed: 200n, events: [] });
  });

  it("runs out of gas without writing anything", () => {
    const e = new Engine();
    const c = e.deploy(COUNTER);
    const r = e.call(ALICE, c, "increment", {}, 0n, 20_000n);
    expect(failureOf(r)?.kind).toBe("OutOfGas");
    expect(r.gasUsed).toBe(20_000n);
    expect(e.readStorage(c, "count")).toBe(0n);
  });

  it("isolates a low-level callee that burns its gas", () => {
    const e = new Engine();
    const burner = e.deploy(BURNER);
    const probe = e.deploy(PROBE, { target: burner });
    const r = e.call(ALICE, probe, "probe");
    expect(r.status).toBe("committed");
    // read 200 + call 700 + forwarded 5000 + new slot 20000
    expect(r.gasUsed).toBe(25_900n);
    expect(e.readStorage(probe, "ok")).toBe(false);
  });

  it("charges each event for its indexed fields", () => {
    const e = new Engine();
    const code: ContractCode = {
      name: "Logger",
      events: [
        { name: "Plain", fields: [{ name: "a", type: "uint256" }] },
        {
          name: "Tagged",
          fields: [
            { name: "a", type: "uint256", indexed: true },
            { name: "b", type: "uint256", indexed: true },
            { name: "c", type: "uint256", indexed: true },
          ],
        },
      ],
      functions: [
        {
          name: "plain",
          visibility: "public",
          mutability: "mutating",
          body: [emit("Plain", { a: lit(1n) })],
        },
        {
          name: "tagged",
          visibility: "public",
          mutability: "mutating",
          body: [emit("Tagged", { a: lit(1n), b: lit(2n), c: lit(3n) })],
        },
      ],
    };
    const c = e.deploy(code);
    expect(e.call(ALICE, c, "plain").gasUsed).toBe(375n);
    expect(e.call(ALICE, c, "tagged").gasUsed).toBe(1_500n);
  });

  it("charges only the call fee for a try-call the guard turns away", () => {
    const e = new Engine();
    const code: ContractCode = {
      name: "Loop",
      functions: [
        {
          name: "enter",
          visibility: "public",
          mutability: "mutating",
          nonReentrant: true,
          body: [tryCall(self, "enter"), sstore("ok", local("ok"))],
        },
      ],
    };
    const c = e.deploy(code);
    const r = e.call(ALICE, c, "enter");
    expect(r.status).toBe("committed");
    // call 700 + new slot 20000, nothing forwarded
    expect(r.gasUsed).toBe(20_700n);
    expect(e.readStorage(c, "ok")).toBe(false);
  });

  it("fails a deployment that cannot pay the creation fee", () => {
    const e = new Engine();
    const err = deployError(() => e.deploy(COUNTER, {}, { gas: 31_999n }));
    expect(err.failure?.kind).toBe("OutOfGas");
  });
});

describe("Engine: calls", () => {
  it("refuses a negative value or gas budget before touching state", () => {
    const e = new Engine();
    e.fund(ALICE, 5n);
    const c = e.deploy(COUNTER);
    const root = e.stateRoot();
    const entries = e.journal.length;
    const codeOf = (fn: () => unknown): string | undefined => {
      try {
        fn();
      } catch (err) {
        if (err instanceof EngineError) return err.code;
        throw err;
      }
      return undefined;
    };

    expect(codeOf(() => e.call(ALICE, c, "increment", {}, -1n))).toBe("InvalidArguments");
    expect(codeOf(() => e.call(ALICE, c, "increment", {}, 0n, -1n))).toBe("InvalidArguments");
    expect(codeOf(() => e.deploy(COUNTER, {}, { deployer: ALICE, value: -3n }))).toBe(
      "InvalidArguments",
    );
    expect(codeOf(() => e.deploy(COUNTER, {}, { gas: -1n }))).toBe("InvalidArguments");

    expect(e.balanceOf(ALICE)).toBe(5n);
    expect(e.balanceOf(c)).toBe(0n);
    expect(e.stateRoot()).toBe(root);
    expect(e.journal.length).toBe(entries);
    // rejected deployments consume no nonce
    expect(e.deploy(COUNTER, {}, { deployer: ALICE })).toBe(deriveAddress(ALICE, 0n));
  });

  it("moves tokens and logs the transfer", () => {
    const e = new Engine();
    const t = e.deploy(TOKEN, { supply: 100n }, { deployer: ALICE });
    const r = e.call(ALICE, t, "transfer", { to: BOB, amount: 30n });
    expect(r.status).toBe("committed");
    expect(r.events).toEqual([
      {
        address: t,
        name: "Transfer",
        logIndex: 0,
        fields: [
          { name: "from", value: ALICE, indexed: true },
          { name: "to", value: BOB, indexed: true },
          { name: "amount", value: 30n, indexed: false },
        ],
      },
    ]);
    expect(e.readStorage(t, `bal[${ALICE}]`)).toBe(70n);
    expect(e.readStorage(t, `bal[${BOB}]`)).toBe(30n);
    expect([...e.queryEvents({ event: "Transfer", where: { to: BOB } })]).toHaveLength(1);
  });

  it("leaves state and the log untouched when a call reverts", () => {
    const e = new Engine();
    const t = e.deploy(TOKEN, { supply: 100n }, { deployer: ALICE });
    const root = e.stateRoot();
    const r = e.call(ALICE, t, "transfer", { to: BOB, amount: 1_000n });
    expect(failureOf(r)).toEqual({ kind: "RequireFailed", reason: "insufficient" });
    expect(e.stateRoot()).toBe(root);
    expect(e.events.size).toBe(0);
  });

  it("rejects calls with missing or mistyped arguments", () => {
    const e = new Engine();
    const t = e.deploy(TOKEN, { supply: 1n }, { deployer: ALICE });
    expect(failureOf(e.call(ALICE, t, "transfer", { to: BOB }))).toEqual({
      kind: "InvalidArguments",
      reason: "missing argument amount",
    });
    expect(failureOf(e.call(ALICE, t, "transfer", { to: BOB, amount: "1" }))?.kind).toBe(
      "InvalidArguments",
    );
  });

  it("reports an unknown target", () => {
    const e = new Engine();
    expect(failureOf(e.call(ALICE, mkAddr("9"), "anything"))?.kind).toBe("NoSuchContract");
  });

  it("refuses value sent to a non-payable function", () => {
    const e = new Engine();
    const c = e.deploy(COUNTER);
    e.fund(ALICE, 5n);
    const r = e.call(ALICE, c, "increment", {}, 1n);
    expect(failureOf(r)?.kind).toBe("PayableViolation");
    expect(r.gasUsed).toBe(0n);
    expect(e.balanceOf(ALICE)).toBe(5n);
  });

  it("refuses value the caller does not hold", () => {
    const e = new Engine();
    const err = deployError(() => e.deploy(VAULT, {}, { deployer: ALICE, value: 1n }));
    expect(err.failure?.kind).toBe("InsufficientBalance");
  });

  it("exposes the block context to view functions but not pure ones", () => {
    const e = new Engine();
    const c = e.deploy(GAS_PROBES);
    e.setBlock({ timestamp: 1_700_000_000n, number: 42n });
    const r = e.call(ALICE, c, "now");
    expect(r.status === "committed" && r.returnValue).toBe(1_700_000_000n);
    expect(failureOf(e.call(ALICE, c, "pureNow"))?.kind).toBe("StaticViolation");
  });

  it("burns gas on a write from a view function", () => {
    const e = new Engine();
    const c = e.deploy(GAS_PROBES);
    const r = e.call(ALICE, c, "sneakyWrite", {}, 0n, 50_000n);
    expect(failureOf(r)?.kind).toBe("StaticViolation");
    expect(r.gasUsed).toBe(50_000n);
  });
});

describe("Engine: visibility and inheritance", () => {
  const BASE: ContractCode = {
    name: "Base",
    functions: [
      {
        name: "secret",
        returns: "uint256",
        visibility: "private",
        mutability: "view",
        body: [ret(lit(41n))],
      },
      {
        name: "helper",
        returns: "uint256",
        visibility: "internal",
        mutability: "view",
        body: [ret(lit(7n))],
      },
      {
        name: "open",
        returns: "uint256",
        visibility: "public",
        mutability: "view",
        body: [invoke("secret", {}, "s"), ret(local("s"))],
      },
      {
        name: "greet",
        returns: "uint256",
        visibility: "public",
        mutability: "pure",
        virtual: true,
        body: [ret(lit(1n))],
      },
    ],
  };
  const DERIVED: ContractCode = {
    name: "Derived",
    bases: [BASE],
    functions: [
      {
        name: "greet",
        returns: "uint256",
        visibility: "public",
        mutability: "pure",
        override: true,
        body: [ret(lit(2n))],
      },
      {
        name: "viaHelper",
        returns: "uint256",
        visibility: "external",
        mutability: "view",
        body: [invoke("helper", {}, "h"), ret(local("h"))],
      },
      {
        name: "peek",
        returns: "uint256",
        visibility: "public",
        mutability: "view",
        body: [invoke("secret", {}, "s"), ret(local("s"))],
      },
    ],
  };

  const returned = (r: CallResult) => (r.status === "committed" ? r.returnValue : undefined);

  it("dispatches to the most-derived override", () => {
    const e = new Engine();
    const d = e.deploy(DERIVED);
    expect(returned(e.call(ALICE, d, "greet"))).toBe(2n);
  });

  it("runs internal and private functions only from inside", () => {
    const e = new Engine();
    const d = e.deploy(DERIVED);
    expect(returned(e.call(ALICE, d, "viaHelper"))).toBe(7n);
    expect(returned(e.call(ALICE, d, "open"))).toBe(41n);
    expect(failureOf(e.call(ALICE, d, "helper"))).toEqual({
      kind: "VisibilityViolation",
      reason: "Derived.helper is internal",
    });
    expect(failureOf(e.call(ALICE, d, "peek"))).toEqual({
      kind: "VisibilityViolation",
      reason: "secret is private to Base",
    });
  });

  it("reports a missing function when there is no fallback", () => {
    const e = new Engine();
    const d = e.deploy(DERIVED);
    expect(failureOf(e.call(ALICE, d, "missing"))).toEqual({
      kind: "VisibilityViolation",
      reason: "Derived has no function missing",
    });
  });
});

describe("Engine: deployment and termination", () => {
  const STRICT: ContractCode = {
    name: "Strict",
    init: {
      params: [{ name: "n", type: "uint256" }],
      body: [requireThat(gt(arg("n"), lit(0n)), "zero"), sstore("n", arg("n"))],
    },
    functions: [],
  };

  it("derives addresses from the deployer nonce, even for failed deploys", () => {
    const e = new Engine();
    const err = deployError(() => e.deploy(STRICT, { n: 0n }));
    expect(err.failure).toEqual({ kind: "RequireFailed", reason: "zero" });
    expect(e.registry.size).toBe(0);
    const ok = e.deploy(STRICT, { n: 3n });
    expect(ok).toBe(deriveAddress(ZERO_ADDRESS, 1n));
    expect(e.readStorage(ok, "n")).toBe(3n);
  });

  it("forbids external calls while constructing", () => {
    const e = new Engine();
    const code: ContractCode = {
      name: "Eager",
      init: { body: [call(self, "")] },
      functions: [],
    };
    expect(deployError(() => e.deploy(code)).failure?.kind).toBe("DeploymentError");
  });

  it("self-destructs into a beneficiary and retires the address", () => {
    const e = new Engine();
    e.fund(ALICE, 10n);
    const v = e.deploy(VAULT, {}, { deployer: ALICE, value: 5n });
    expect(e.balanceOf(v)).toBe(5n);
    expect(e.readStorage(v, "open")).toBe(true);

    expect(e.call(ALICE, v, "kill", { to: BOB }).status).toBe("committed");
    expect(e.balanceOf(BOB)).toBe(5n);
    expect(e.balanceOf(v)).toBe(0n);
    expect(e.readStorage(v, "open")).toBe(0n);
    expect(e.registry.isRetired(v)).toBe(true);
    expect(failureOf(e.call(ALICE, v, "kill", { to: BOB }))?.kind).toBe("NoSuchContract");
  });

  it("terminates from the host and refuses unknown contracts", () => {
    const e = new Engine();
    const c = e.deploy(COUNTER);
    e.call(ALICE, c, "increment");
    e.terminate(c);
    expect(e.readStorage(c, "count")).toBe(0n);
    expect(failureOf(e.call(ALICE, c, "increment"))?.kind).toBe("NoSuchContract");
    expect(() => e.terminate(c)).toThrow(EngineError);
  });
});

const DIVER: ContractCode = {
  name: "Diver",
  functions: [
    {
      name: "dive",
      visibility: "public",
      mutability: "mutating",
      body: [call(self, "dive")],
    },
  ],
};

describe("Engine: call depth", () => {
  it("stops recursion at the configured depth", () => {
    const e = new Engine({ config: { maxCallDepth: 3 } });
    const d = e.deploy(DIVER);
    expect(failureOf(e.call(ALICE, d, "dive"))).toEqual({
      kind: "CallDepthExceeded",
      reason: "depth 4",
    });
  });

  it("reaches the default depth limit", () => {
    const e = new Engine({ config: { logLevel: "silent" } });
    const d = e.deploy(DIVER);
    const r = e.call(ALICE, d, "dive");
    expect(failureOf(r)).toEqual({ kind: "CallDepthExceeded", reason: "depth 257" });
    expect(e.storage.depth).toBe(0);
  });

  it("reverts cleanly when recursion outruns the host stack", () => {
    const e = new Engine({ config: { maxCallDepth: 10_000_000, logLevel: "silent" } });
    const d = e.deploy(DIVER);
    const c = e.deploy(COUNTER);
    const root = e.stateRoot();
    const gas = 10n ** 200n;
    const r = e.call(ALICE, d, "dive", {}, 0n, gas);
    expect(failureOf(r)).toEqual({ kind: "CallDepthExceeded", reason: "host stack exhausted" });
    expect(r.gasUsed).toBe(gas);
    expect(e.storage.depth).toBe(0);
    expect(e.stateRoot()).toBe(root);
    expect(e.call(ALICE, c, "increment").status).toBe("committed");
  });
});

describe("Engine: value", () => {
  it("sends value to an account without code", () => {
    const e = new Engine();
    e.fund(ALICE, 10n);
    const code: ContractCode = {
      name: "Payer",
      init: { payable: true, body: [] },
      functions: [
        {
          name: "pay",
          params: [
            { name: "to", type: "address" },
            { name: "amt", type: "uint256" },
          ],
          visibility: "public",
          mutability: "mutating",
          body: [call(arg("to"), "", { value: arg("amt") })],
        },
      ],
    };
    const p = e.deploy(code, {}, { deployer: ALICE, value: 10n });
    expect(e.call(ALICE, p, "pay", { to: BOB, amt: 4n }).status).toBe("committed");
    expect(e.balanceOf(BOB)).toBe(4n);
    expect(e.balanceOf(p)).toBe(6n);
    expect(failureOf(e.call(ALICE, p, "pay", { to: BOB, amt: 7n }))?.kind).toBe(
      "InsufficientBalance",
    );
  });
});
