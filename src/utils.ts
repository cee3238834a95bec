import { randomBytes } from "@noble/hashes/utils";
import { Transaction, type TransactionOptions } from "./core/transaction";
import { digestHex, generateKeypair, type Keypair } from "./crypto";
import type { AccountId, Balance, PublicKey } from "./types";

export function createAccountTx(
  id: AccountId,
  publicKey: PublicKey,
): Transaction;
export function createAccountTx(id: AccountId): {
  tx: Transaction;
  keypair: Keypair;
};
export function createAccountTx(id: AccountId, publicKey?: PublicKey) {
  if (publicKey) return new Transaction({ kind: "CreateAccount", id, publicKey });
  const keypair = generateKeypair();
  return {
    tx: new Transaction({ kind: "CreateAccount", id, publicKey: keypair.publicKey }),
    keypair,
  };
}

export const createMintInitialSupplyTx = (
  to: AccountId,
  amount: Balance,
): Transaction => new Transaction({ kind: "MintInitialSupply", to, amount });

export const createTransferTx = (
  from: AccountId,
  to: AccountId,
  amount: Balance,
  opts: TransactionOptions = {},
): Transaction => new Transaction({ kind: "Transfer", to, amount }, from, opts);

/** hex BLAKE2s of a random 128-bit seed */
export const generateRandomAccount = (): AccountId => digestHex(randomBytes(16));
