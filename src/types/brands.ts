// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Hex = `0x${string}`;
export type Address = Brand<Hex, "Address">;

const ADDRESS_RE = /^0x[0-9a-f]{40}$/;

export const isAddress = (s: unknown): s is Address =>
  typeof s === "string" && ADDRESS_RE.test(s);

export const asAddress = (s: string): Address => {
  const lower = s.toLowerCase();
  if (!isAddress(lower)) throw new TypeError(`not an address: ${s}`);
  return lower;
};
