import type { LedgerError } from "../errors";
import type { AccountId, PublicKey, Result } from "../types";
import type { Account, AccountType } from "./account";

/**
 * The only surface transactions see of the ledger table. Anything that
 * implements it can back transaction execution.
 */
export interface WorldState {
  accountIds(): AccountId[];
  getAccount(id: AccountId): Readonly<Account> | undefined;
  /** Live handle; the sanctioned path for balance mutation. */
  getAccountMut(id: AccountId): Account | undefined;
  /** Fails with AccountAlreadyExists when `id` is taken. */
  createAccount(
    id: AccountId,
    type: AccountType,
    publicKey: PublicKey,
  ): Result<void, LedgerError>;
}
