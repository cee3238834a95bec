// Deterministic preimages for content hashing. Strings always go in as UTF-8
// bytes: rlp would otherwise read a "0x…" string as hex.

import * as rlp from "rlp";
import { utf8ToBytes } from "@noble/hashes/utils";
import type { TransactionData } from "../core/transaction";
import type { AccountId, Hash, Timestamp } from "../types";

const opt = <T>(v: T | undefined, enc: (x: T) => rlp.Input): rlp.Input[] =>
  v === undefined ? [] : [enc(v)];

/* — TransactionData — */
export const encTxData = (d: TransactionData): rlp.Input[] => {
  switch (d.kind) {
    case "CreateAccount":
      return [utf8ToBytes(d.kind), utf8ToBytes(d.id), d.publicKey];
    case "Transfer":
    case "MintInitialSupply":
      return [utf8ToBytes(d.kind), utf8ToBytes(d.to), d.amount];
  }
};

/* — Transaction, signature excluded — */
export const encTxForHashing = (t: {
  nonce: bigint;
  timestamp: Timestamp;
  data: TransactionData;
  from?: AccountId;
}): Uint8Array =>
  rlp.encode([t.nonce, t.timestamp, encTxData(t.data), opt(t.from, utf8ToBytes)]);

/* — Block header: (prevHash, nonce) — */
export const encBlockHeader = (prevHash?: Hash, nonce?: bigint): Uint8Array =>
  rlp.encode([opt(prevHash, utf8ToBytes), opt(nonce, (n) => n)]);
