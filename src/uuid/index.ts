import { randomUUID } from "crypto";

export type TxId = string;
export const txId = (): TxId => randomUUID();
