// RLP encode/decode helpers for committed state deltas.

import { decode, encode, type Input, type NestedUint8Array } from "@ethereumjs/rlp";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import type { StateDelta } from "../core/storage";
import type { Address, LoggedEvent, Value } from "../core/types";
import { asAddress } from "../types/brands";

type Decoded = Uint8Array | NestedUint8Array;

/* — helpers — */
export const bnToBuf = (n: bigint): Uint8Array => {
  if (n === 0n) return new Uint8Array(0);
  const hex = n.toString(16);
  return hexToBytes(hex.length % 2 ? `0${hex}` : hex);
};
export const bufToBn = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt(`0x${bytesToHex(b)}`);

const utf8 = new TextDecoder();

const bytes = (d: Decoded | undefined): Uint8Array => {
  if (!(d instanceof Uint8Array)) throw new TypeError("rlp: expected a byte string");
  return d;
};
const list = (d: Decoded | undefined): NestedUint8Array => {
  if (d === undefined || d instanceof Uint8Array) throw new TypeError("rlp: expected a list");
  return d;
};

export const addrToBuf = (a: Address): Uint8Array => hexToBytes(a.slice(2));
export const bufToAddr = (b: Uint8Array): Address => asAddress(`0x${bytesToHex(b)}`);

/* — Value: [tag, payload] — */
export const encValue = (v: Value): Uint8Array[] => {
  if (typeof v === "bigint") return [utf8ToBytes("u"), bnToBuf(v)];
  if (typeof v === "boolean") return [utf8ToBytes("b"), bnToBuf(v ? 1n : 0n)];
  return [utf8ToBytes("s"), utf8ToBytes(v)];
};

export const decValue = (d: Decoded): Value => {
  const [tag, payload] = list(d);
  switch (utf8.decode(bytes(tag))) {
    case "u":
      return bufToBn(bytes(payload));
    case "b":
      return bufToBn(bytes(payload)) === 1n;
    case "s":
      return utf8.decode(bytes(payload));
    default:
      throw new TypeError("rlp: unknown value tag");
  }
};

/* — StateDelta — */
export const encDelta = (d: StateDelta): Uint8Array =>
  encode([
    d.slots.map((w) => [addrToBuf(w.address), utf8ToBytes(w.key), encValue(w.value)]),
    d.balances.map((b) => [addrToBuf(b.address), bnToBuf(b.balance)]),
    d.destroyed.map(addrToBuf),
  ]);

export const decDelta = (b: Uint8Array): StateDelta => {
  const [slots, balances, destroyed] = list(decode(b));
  return {
    slots: list(slots).map((entry) => {
      const [addr, key, value] = list(entry);
      return {
        address: bufToAddr(bytes(addr)),
        key: utf8.decode(bytes(key)),
        value: decValue(list(value)),
      };
    }),
    balances: list(balances).map((entry) => {
      const [addr, bal] = list(entry);
      return { address: bufToAddr(bytes(addr)), balance: bufToBn(bytes(bal)) };
    }),
    destroyed: list(destroyed).map((a) => bufToAddr(bytes(a))),
  };
};

/* — LoggedEvent: [address, name, logIndex, [[field, value, indexed]…]] — */
const encEvent = (e: LoggedEvent): Input => [
  addrToBuf(e.address),
  utf8ToBytes(e.name),
  bnToBuf(BigInt(e.logIndex)),
  e.fields.map((f) => [utf8ToBytes(f.name), encValue(f.value), bnToBuf(f.indexed ? 1n : 0n)]),
];

const decEvent = (d: Decoded): LoggedEvent => {
  const [addr, name, logIndex, fields] = list(d);
  return {
    address: bufToAddr(bytes(addr)),
    name: utf8.decode(bytes(name)),
    logIndex: Number(bufToBn(bytes(logIndex))),
    fields: list(fields).map((entry) => {
      const [fname, value, indexed] = list(entry);
      return {
        name: utf8.decode(bytes(fname)),
        value: decValue(list(value)),
        indexed: bufToBn(bytes(indexed)) === 1n,
      };
    }),
  };
};

/* — JournalEntry: [delta, events] — */
export interface JournalEntry {
  delta: StateDelta;
  events: LoggedEvent[];
}

export const encEntry = (e: JournalEntry): Uint8Array =>
  encode([encDelta(e.delta), e.events.map(encEvent)]);

export const decEntry = (b: Uint8Array): JournalEntry => {
  const [delta, events] = list(decode(b));
  return { delta: decDelta(bytes(delta)), events: list(events).map(decEvent) };
};
