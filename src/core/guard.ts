import { ExecutionFailure } from "./errors";
import type { Address } from "./types";

export interface GuardToken {
  readonly address: Address;
  release(): void;
}

/**
 * Per-contract reentrancy lock, keyed by storage address so a proxy and the
 * code it delegates to share one lock.
 */
export class ReentrancyGuard {
  private readonly locked = new Set<Address>();

  isLocked(address: Address): boolean {
    return this.locked.has(address);
  }

  /** Drops every lock, for recovery after an aborted transaction. */
  clear(): void {
    this.locked.clear();
  }

  enter(address: Address): GuardToken {
    if (this.locked.has(address)) {
      throw new ExecutionFailure("ReentrancyBlocked", `${address} is already entered`);
    }
    this.locked.add(address);
    let held = true;
    return {
      address,
      release: () => {
        if (!held) return;
        held = false;
        this.locked.delete(address);
      },
    };
  }
}
