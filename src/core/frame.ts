import { EngineError } from "./errors";
import type { GasMeter } from "./gas";
import type { GuardToken } from "./guard";
import type { Address, ContractEvent } from "./types";

export type FrameState =
  | "Pending"
  | "Binding"
  | "Executing"
  | "Committing"
  | "Reverting"
  | "Done";

export type FrameOutcome = "Committed" | "Reverted";

/** msg.* and block.* for one frame; never ambient. */
export interface MsgContext {
  sender: Address;
  origin: Address;
  value: bigint;
  /** storage (and event) address; the caller's own under delegatecall */
  self: Address;
  codeAddress: Address;
  timestamp: bigint;
  blockNumber: bigint;
}

export interface FrameFlags {
  isStatic: boolean;
  constructing: boolean;
  delegated: boolean;
}

const NEXT: Record<FrameState, readonly FrameState[]> = {
  Pending: ["Binding"],
  Binding: ["Executing", "Reverting"],
  Executing: ["Committing", "Reverting"],
  Committing: ["Done"],
  Reverting: ["Done"],
  Done: [],
};

export class CallFrame {
  private current: FrameState = "Pending";
  private result: FrameOutcome | undefined;
  private active: CallFrame | undefined;

  readonly depth: number;
  readonly pendingEvents: ContractEvent[] = [];
  readonly terminations: Address[] = [];
  readonly guardTokens: GuardToken[] = [];

  constructor(
    readonly ctx: MsgContext,
    readonly meter: GasMeter,
    readonly flags: FrameFlags,
    readonly parent?: CallFrame,
  ) {
    this.depth = parent ? parent.depth + 1 : 0;
  }

  get state(): FrameState {
    return this.current;
  }

  get outcome(): FrameOutcome | undefined {
    return this.result;
  }

  /** The child currently executing on top of this frame, if any. */
  get child(): CallFrame | undefined {
    return this.active;
  }

  transition(next: FrameState): void {
    if (!NEXT[this.current].includes(next)) {
      throw new EngineError(`illegal frame transition ${this.current} -> ${next}`);
    }
    if (next === "Done") this.result = this.current === "Committing" ? "Committed" : "Reverted";
    this.current = next;
  }

  adopt(child: CallFrame): void {
    if (child.parent !== this) throw new EngineError("frame adopted by a non-parent");
    if (this.active) throw new EngineError("frame already has an active child");
    this.active = child;
  }

  release(child: CallFrame): void {
    if (this.active === child) this.active = undefined;
  }

  /** Hands pending self-destructs to the parent on commit. */
  passTerminations(parent: CallFrame): void {
    parent.terminations.push(...this.terminations);
    this.terminations.length = 0;
  }
}
