import { bytesToHex } from "@noble/hashes/utils";
import { encTxForHashing } from "../codec/rlp";
import { digest, sign as edSign, verify as edVerify } from "../crypto";
import { ErrorCode, ledgerError, type LedgerError } from "../errors";
import {
  Err,
  Ok,
  isErr,
  type AccountId,
  type Balance,
  type Hash,
  type PublicKey,
  type Result,
  type SecretKey,
  type Signature,
  type Timestamp,
} from "../types";
import { assertU128, checkedAdd, checkedSub } from "./balance";
import type { WorldState } from "./worldState";

/* ─── payloads ─── */
export type TransactionData =
  | { readonly kind: "CreateAccount"; readonly id: AccountId; readonly publicKey: PublicKey }
  | { readonly kind: "Transfer"; readonly to: AccountId; readonly amount: Balance }
  | {
      readonly kind: "MintInitialSupply";
      readonly to: AccountId;
      readonly amount: Balance;
    };

export interface TransactionOptions {
  nonce?: bigint;
  timestamp?: Timestamp;
}

type Outcome = Result<void, LedgerError>;

/* ─── state transition functions ─── */

const createAccount = (
  st: WorldState,
  id: AccountId,
  publicKey: PublicKey,
): Outcome => st.createAccount(id, "User", publicKey);

const mintInitialSupply = (
  st: WorldState,
  to: AccountId,
  amount: Balance,
  isGenesis: boolean,
): Outcome => {
  if (!isGenesis)
    return Err(
      ledgerError(
        ErrorCode.NotGenesis,
        "Initial Supply can be minted only in genesis block",
      ),
    );
  const acc = st.getAccountMut(to);
  if (!acc) return Err(ledgerError(ErrorCode.InvalidAccount, "Invalid account."));
  const next = checkedAdd(acc.balance, amount);
  if (next === undefined)
    return Err(ledgerError(ErrorCode.Overflow, "Balance overflow."));
  acc.balance = next;
  return Ok(undefined);
};

// Debit then credit. Not atomic on its own: a failed credit leaves the debit
// applied until the enclosing block rolls back.
const transfer = (
  st: WorldState,
  from: AccountId | undefined,
  to: AccountId,
  amount: Balance,
): Outcome => {
  if (from === undefined)
    return Err(ledgerError(ErrorCode.FromUnset, "Sender is not set."));
  const sender = st.getAccountMut(from);
  if (!sender)
    return Err(
      ledgerError(ErrorCode.InvalidSenderAddress, "Invalid sender address."),
    );
  const debited = checkedSub(sender.balance, amount);
  if (debited === undefined)
    return Err(ledgerError(ErrorCode.InsufficientBalance, "Insufficient balance"));
  sender.balance = debited;

  const receiver = st.getAccountMut(to);
  if (!receiver)
    return Err(
      ledgerError(ErrorCode.InvalidReceiverAddress, "Invalid receiver address."),
    );
  const credited = checkedAdd(receiver.balance, amount);
  if (credited === undefined)
    return Err(ledgerError(ErrorCode.BalanceOverflow, "Balance overflow."));
  receiver.balance = credited;
  return Ok(undefined);
};

/* ─── transaction ─── */

export class Transaction {
  readonly nonce: bigint;
  readonly timestamp: Timestamp;
  readonly data: TransactionData;
  readonly from?: AccountId;
  private sig?: Signature;

  constructor(
    data: TransactionData,
    from?: AccountId,
    opts: TransactionOptions = {},
  ) {
    this.nonce = opts.nonce ?? 0n;
    this.timestamp = opts.timestamp ?? 0n;
    assertU128(this.nonce, "nonce");
    assertU128(this.timestamp, "timestamp");
    if (data.kind !== "CreateAccount") assertU128(data.amount, "amount");
    // own copy of the key bytes: the hash must not move under the caller
    this.data =
      data.kind === "CreateAccount"
        ? { ...data, publicKey: Uint8Array.from(data.publicKey) }
        : data;
    this.from = from;
  }

  get signature(): Signature | undefined {
    return this.sig;
  }

  /** BLAKE2s over (nonce, timestamp, data, from); the signature is not part of it. */
  hashBytes(): Uint8Array {
    return digest(
      encTxForHashing({
        nonce: this.nonce,
        timestamp: this.timestamp,
        data: this.data,
        from: this.from,
      }),
    );
  }

  hash(): Hash {
    return bytesToHex(this.hashBytes());
  }

  addSignature(sig: Signature): void {
    this.sig = Uint8Array.from(sig);
  }

  sign(secretKey: SecretKey): this {
    this.addSignature(edSign(this.hashBytes(), secretKey));
    return this;
  }

  checkSignature(st: WorldState): Outcome {
    if (!this.sig)
      return Err(ledgerError(ErrorCode.SignatureMissing, "Signature is missing."));
    if (this.from === undefined)
      return Err(ledgerError(ErrorCode.FromUnset, "Sender is not set."));
    const sender = st.getAccount(this.from);
    if (!sender)
      return Err(
        ledgerError(ErrorCode.InvalidSenderAddress, "Account `from` not exist."),
      );
    if (!edVerify(this.hashBytes(), this.sig, sender.publicKey))
      return Err(ledgerError(ErrorCode.SignatureInvalid, "Invalid signature."));
    return Ok(undefined);
  }

  execute(st: WorldState, isGenesis: boolean): Outcome {
    const d = this.data;
    switch (d.kind) {
      // no key exists yet that could authorize the first registration
      case "CreateAccount":
        return createAccount(st, d.id, d.publicKey);
      case "MintInitialSupply":
        return mintInitialSupply(st, d.to, d.amount, isGenesis);
      case "Transfer": {
        if (!isGenesis) {
          const checked = this.checkSignature(st);
          if (isErr(checked)) return checked;
        }
        return transfer(st, this.from, d.to, d.amount);
      }
    }
  }
}
