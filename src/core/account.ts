import type { Balance, PublicKey } from "../types";

export type AccountType = "User" | "Contract";

export interface Account {
  readonly type: AccountType;
  balance: Balance;
  readonly publicKey: PublicKey;
}

export const newAccount = (type: AccountType, publicKey: PublicKey): Account => ({
  type,
  balance: 0n,
  publicKey: Uint8Array.from(publicKey),
});

export const cloneAccount = (a: Account): Account => ({
  type: a.type,
  balance: a.balance,
  publicKey: Uint8Array.from(a.publicKey),
});
