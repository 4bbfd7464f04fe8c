import { ExecutionFailure } from "./errors";
import type { FailureKind } from "./types";

/** Fee schedule. Only the ordering write > call > read > op is load-bearing. */
export const GAS = {
  op: 3n,
  jump: 8n,
  read: 200n,
  call: 700n,
  callValue: 9_000n,
  callStipend: 2_300n,
  storageSet: 20_000n,
  storageUpdate: 5_000n,
  log: 375n,
  logTopic: 375n,
  create: 32_000n,
  selfDestruct: 5_000n,
} as const;

export type FailurePolicy = "assertFail" | "requireFail" | "revertFail";

export const failurePolicy = (
  kind: FailureKind,
  propagated = false,
): FailurePolicy => {
  // the frame that re-raises a child's failure keeps its own gas
  if (propagated) return "revertFail";
  switch (kind) {
    case "OutOfGas":
    case "AssertFailed":
    case "StaticViolation":
      return "assertFail";
    case "RequireFailed":
      return "requireFail";
    default:
      return "revertFail";
  }
};

export class GasMeter {
  private left: bigint;

  constructor(readonly budget: bigint) {
    if (budget < 0n) throw new RangeError("negative gas budget");
    this.left = budget;
  }

  get remaining(): bigint {
    return this.left;
  }

  get used(): bigint {
    return this.budget - this.left;
  }

  charge(amount: bigint): bigint {
    if (amount > this.left) {
      throw new ExecutionFailure("OutOfGas", `needed ${amount}, had ${this.left}`);
    }
    this.left -= amount;
    return this.left;
  }

  refund(amount: bigint): bigint {
    const next = this.left + amount;
    this.left = next > this.budget ? this.budget : next;
    return this.left;
  }

  fail(policy: FailurePolicy): bigint {
    if (policy === "assertFail") this.left = 0n;
    return this.left;
  }
}
