import { describe, it, expect } from "vitest";
import { EngineError, ExecutionFailure } from "../src/core/errors";
import { GasMeter } from "../src/core/gas";
import { StorageModel } from "../src/core/storage";
import { ALICE, BOB, mkAddr } from "./helpers/frame";

const C = mkAddr("1");

describe("StorageModel", () => {
  it("classifies the first write as new and later ones as update", () => {
    const s = new StorageModel();
    const m = new GasMeter(100_000n);
    s.snapshot();
    expect(s.write(C, "x", 1n, m)).toBe("new");
    expect(s.write(C, "x", 2n, m)).toBe("update");
    expect(m.used).toBe(25_000n);
  });

  it("counts a slot committed earlier as an update", () => {
    const s = new StorageModel();
    const m = new GasMeter(100_000n);
    s.snapshot();
    s.write(C, "x", 1n, m);
    s.commit();
    s.snapshot();
    expect(s.write(C, "x", 0n, m)).toBe("update");
  });

  it("does not write when the charge fails", () => {
    const s = new StorageModel();
    s.snapshot();
    expect(() => s.write(C, "x", 1n, new GasMeter(19_999n))).toThrow(ExecutionFailure);
    expect(s.has(C, "x")).toBe(false);
  });

  it("reads unset keys as zero", () => {
    const s = new StorageModel();
    expect(s.read(C, "missing")).toBe(0n);
    expect(s.readPersisted(C, "missing")).toBe(0n);
  });

  it("lets a nested layer see its ancestors' writes", () => {
    const s = new StorageModel();
    const m = new GasMeter(100_000n);
    s.snapshot();
    s.write(C, "x", 7n, m);
    s.snapshot();
    expect(s.read(C, "x")).toBe(7n);
    expect(s.readPersisted(C, "x")).toBe(0n);
  });

  it("discards a rolled-back layer only", () => {
    const s = new StorageModel();
    const m = new GasMeter(100_000n);
    s.snapshot();
    s.write(C, "x", 1n, m);
    s.snapshot();
    s.write(C, "x", 2n, m);
    s.write(C, "y", 3n, m);
    s.rollback();
    expect(s.read(C, "x")).toBe(1n);
    expect(s.has(C, "y")).toBe(false);
  });

  it("returns a delta only when the outermost layer commits", () => {
    const s = new StorageModel();
    const m = new GasMeter(100_000n);
    s.snapshot();
    s.snapshot();
    s.write(C, "x", 1n, m);
    expect(s.commit()).toBeUndefined();
    expect(s.commit()).toEqual({
      slots: [{ address: C, key: "x", value: 1n }],
      balances: [],
      destroyed: [],
    });
    expect(s.readPersisted(C, "x")).toBe(1n);
  });

  it("moves balances and refuses overdrafts", () => {
    const s = new StorageModel();
    s.snapshot();
    s.setBalance(ALICE, 10n);
    s.transfer(ALICE, BOB, 4n);
    expect(s.balanceOf(ALICE)).toBe(6n);
    expect(s.balanceOf(BOB)).toBe(4n);
    expect(() => s.transfer(BOB, ALICE, 5n)).toThrow(/holds 4, needs 5/);
  });

  it("refuses a negative transfer before touching either balance", () => {
    const s = new StorageModel();
    s.snapshot();
    s.setBalance(ALICE, 10n);
    let caught: unknown;
    try {
      s.transfer(ALICE, BOB, -5n);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ExecutionFailure);
    expect(caught instanceof ExecutionFailure && caught.kind).toBe("InvalidArguments");
    expect(s.balanceOf(ALICE)).toBe(10n);
    expect(s.balanceOf(BOB)).toBe(0n);
  });

  it("stages the outermost layer without merging it", () => {
    const s = new StorageModel();
    const m = new GasMeter(100_000n);
    s.snapshot();
    s.write(C, "x", 1n, m);
    s.setBalance(ALICE, 2n);
    expect(s.staged()).toEqual({
      slots: [{ address: C, key: "x", value: 1n }],
      balances: [{ address: ALICE, balance: 2n }],
      destroyed: [],
    });
    expect(s.readPersisted(C, "x")).toBe(0n);
    s.snapshot();
    expect(() => s.staged()).toThrow("staged delta needs one open layer, found 2");
  });

  it("rolls back several layers at once", () => {
    const s = new StorageModel();
    s.snapshot();
    s.snapshot();
    s.snapshot();
    s.rollbackTo(1);
    expect(s.depth).toBe(1);
    expect(() => s.rollbackTo(2)).toThrow("cannot roll back to depth 2");
  });

  it("refuses to mutate outside a snapshot", () => {
    const s = new StorageModel();
    expect(() => s.setBalance(ALICE, 1n)).toThrow(EngineError);
    expect(() => s.commit()).toThrow("commit without snapshot");
  });

  it("dumps accounts and slots in sorted order", () => {
    const s = new StorageModel();
    const m = new GasMeter(100_000n);
    s.snapshot();
    s.write(BOB, "b", 1n, m);
    s.write(BOB, "a", true, m);
    s.setBalance(ALICE, 3n);
    s.commit();
    expect(s.dump()).toEqual([
      { address: ALICE, balance: 3n, slots: [] },
      { address: BOB, balance: 0n, slots: [["a", true], ["b", 1n]] },
    ]);
  });
});
