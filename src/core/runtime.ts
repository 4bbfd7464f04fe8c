import { makeLogger, type ILogger } from "../logging";
import { txId, type TxId } from "../uuid";
import { Engine, type EngineOptions } from "./engine";
import { DeploymentError } from "./errors";
import { Mutex } from "./lock";
import type { Address, Args, CallResult, ContractCode, Failure, Hex } from "./types";

/* ──────────── transactions ──────────── */
export type Transaction =
  | {
      kind: "deploy";
      from: Address;
      code: ContractCode;
      args?: Args;
      value?: bigint;
      gas?: bigint;
    }
  | {
      kind: "call";
      from: Address;
      to: Address;
      fn: string;
      args?: Args;
      value?: bigint;
      gas?: bigint;
    };

export type DeployOutcome =
  | { status: "deployed"; address: Address }
  | { status: "failed"; failure: Failure };

export type Receipt =
  | { txId: TxId; kind: "deploy"; outcome: DeployOutcome }
  | { txId: TxId; kind: "call"; outcome: CallResult };

export interface Block {
  height: number;
  timestamp: bigint;
  stateRoot: Hex;
  receipts: Receipt[];
}

interface Queued {
  id: TxId;
  tx: Transaction;
  resolve: (r: Receipt) => void;
  reject: (e: unknown) => void;
}

/* ──────────── runtime shell ──────────── */
export class Runtime {
  readonly engine: Engine;
  private readonly mutex = new Mutex();
  private readonly log: ILogger;
  private queue: Queued[] = [];
  private height = 0;

  constructor(opts: EngineOptions = {}) {
    this.engine = new Engine(opts);
    this.log =
      opts.logger ?? makeLogger(this.engine.config.logLevel, this.engine.config.logPretty);
  }

  get pending(): number {
    return this.queue.length;
  }

  get blockHeight(): number {
    return this.height;
  }

  /** Queues `tx`; its receipt settles when the next block is sealed. */
  submit(tx: Transaction): { txId: TxId; receipt: Promise<Receipt> } {
    const id = txId();
    const receipt = new Promise<Receipt>((resolve, reject) => {
      this.queue.push({ id, tx, resolve, reject });
    });
    this.log.debug({ txId: id, kind: tx.kind, from: tx.from }, "tx queued");
    return { txId: id, receipt };
  }

  /** Runs `tx` now, outside any block, under the same lock as `tick`. */
  execute(tx: Transaction): Promise<Receipt> {
    return this.mutex.runExclusive(() => this.apply(txId(), tx));
  }

  /** Drains the queue in FIFO order and seals one block. */
  async tick(now: number): Promise<Block> {
    const batch = this.queue;
    this.queue = [];
    const height = this.height + 1;
    const timestamp = BigInt(now);
    this.log.debug({ height, txs: batch.length }, "tick start");

    const receipts: Receipt[] = [];
    const stateRoot = await this.mutex.runExclusive(() => {
      this.engine.setBlock({ timestamp, number: BigInt(height) });
      for (const q of batch) {
        try {
          const r = this.apply(q.id, q.tx);
          receipts.push(r);
          q.resolve(r);
        } catch (err) {
          this.log.warn({ txId: q.id, err }, "tx rejected");
          q.reject(err);
        }
      }
      return this.engine.stateRoot();
    });

    this.height = height;
    this.log.info({ height, stateRoot, receipts: receipts.length }, "block sealed");
    return { height, timestamp, stateRoot, receipts };
  }

  private apply(id: TxId, tx: Transaction): Receipt {
    if (tx.kind === "call") {
      const outcome = this.engine.call(tx.from, tx.to, tx.fn, tx.args, tx.value, tx.gas);
      return { txId: id, kind: "call", outcome };
    }
    try {
      const address = this.engine.deploy(tx.code, tx.args, {
        deployer: tx.from,
        value: tx.value,
        gas: tx.gas,
      });
      return { txId: id, kind: "deploy", outcome: { status: "deployed", address } };
    } catch (err) {
      if (!(err instanceof DeploymentError)) throw err;
      const failure: Failure = err.failure ?? { kind: "DeploymentError", reason: err.message };
      return { txId: id, kind: "deploy", outcome: { status: "failed", failure } };
    }
  }
}
