import { encode as rlpEncode } from "@ethereumjs/rlp";
import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, concatBytes, utf8ToBytes } from "@noble/hashes/utils";
import { addrToBuf, bnToBuf, encValue } from "../codec/rlp";
import type { AccountDump } from "./storage";
import type { Address, Hex } from "./types";
import { asAddress } from "../types/brands";

export const toHex = (b: Uint8Array): Hex => `0x${bytesToHex(b)}`;

/* ── Merkle helper ───────────────────────────────────────── */
export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return keccak_256(new Uint8Array(0));
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak_256(concatBytes(left, right)));
  }
  return merkle(next);
};

/* ── account leaf: keccak(RLP([address, balance, [[key, value]…]])) ── */
export const hashAccount = (a: AccountDump): Uint8Array =>
  keccak_256(
    rlpEncode([
      addrToBuf(a.address),
      bnToBuf(a.balance),
      a.slots.map(([k, v]) => [utf8ToBytes(k), encValue(v)]),
    ]),
  );

/** Root over persisted state; `accounts` must already be in canonical order. */
export const computeStateRoot = (accounts: AccountDump[]): Hex =>
  toHex(merkle(accounts.map(hashAccount)));

/* ── CREATE-style address: keccak(RLP([deployer, nonce]))[12..] ── */
export const deriveAddress = (deployer: Address, nonce: bigint): Address =>
  asAddress(toHex(keccak_256(rlpEncode([addrToBuf(deployer), nonce])).slice(12)));
