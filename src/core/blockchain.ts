import { loadLogConfig, loadPoolLimit } from "../config";
import {
  ErrorCode,
  blockExecutionError,
  ledgerError,
  type LedgerError,
} from "../errors";
import { makeLogger, type ILogger } from "../logging";
import {
  Err,
  Ok,
  isErr,
  type AccountId,
  type Hash,
  type PublicKey,
  type Result,
} from "../types";
import { cloneAccount, newAccount, type Account, type AccountType } from "./account";
import type { Block } from "./block";
import { Chain } from "./chain";
import type { Transaction } from "./transaction";
import type { WorldState } from "./worldState";

export interface BlockchainOptions {
  logger?: ILogger;
  poolLimit?: number;
}

type Ledger = Map<AccountId, Account>;

const snapshot = (ledger: Ledger): Ledger =>
  new Map(
    [...ledger].map(([id, acc]): [AccountId, Account] => [id, cloneAccount(acc)]),
  );

/* ──────────── orchestrator ──────────── */
export class Blockchain implements WorldState {
  readonly chain = new Chain<Block>();
  private accounts: Ledger = new Map();
  private readonly pool: Transaction[] = [];
  private readonly poolLimit: number;
  private readonly log: ILogger;

  constructor(opts: BlockchainOptions = {}) {
    // the environment is consulted only for what the caller left out
    if (opts.logger) {
      this.log = opts.logger;
    } else {
      const { logLevel, prettyLogs } = loadLogConfig();
      this.log = makeLogger(logLevel, prettyLogs);
    }
    this.poolLimit = opts.poolLimit ?? loadPoolLimit();
  }

  get length(): number {
    return this.chain.length;
  }

  blocks(): IterableIterator<Block> {
    return this.chain.iter();
  }

  lastBlockHash(): Hash | undefined {
    return this.chain.head()?.computeHash();
  }

  /* ---------- WorldState ---------------------------------------- */

  accountIds(): AccountId[] {
    return [...this.accounts.keys()];
  }

  getAccount(id: AccountId): Readonly<Account> | undefined {
    return this.accounts.get(id);
  }

  getAccountMut(id: AccountId): Account | undefined {
    return this.accounts.get(id);
  }

  createAccount(
    id: AccountId,
    type: AccountType,
    publicKey: PublicKey,
  ): Result<void, LedgerError> {
    if (this.accounts.has(id))
      return Err(
        ledgerError(
          ErrorCode.AccountAlreadyExists,
          `AccountId already exist: ${id}`,
        ),
      );
    this.accounts.set(id, newAccount(type, publicKey));
    return Ok(undefined);
  }

  /* ---------- transaction pool (storage only) -------------------- */

  get pendingTransactions(): readonly Transaction[] {
    return this.pool;
  }

  submitTransaction(tx: Transaction): Result<void, LedgerError> {
    if (this.pool.length >= this.poolLimit)
      return Err(
        ledgerError(
          ErrorCode.PoolFull,
          `Transaction pool is full (${this.poolLimit})`,
        ),
      );
    this.pool.push(tx);
    return Ok(undefined);
  }

  /* ---------- append ---------------------------------------------- */

  /**
   * Executes every transaction of `block` against the ledger and commits the
   * block, or restores the ledger exactly as it was and reports the first
   * failing transaction. Callers must serialize appends.
   */
  appendBlock(block: Block): Result<void, LedgerError> {
    if (!block.verify())
      return Err(ledgerError(ErrorCode.InvalidBlockHash, "Block has invalid hash"));

    const isGenesis = this.chain.length === 0;
    if (!isGenesis && block.transactionCount === 0)
      return Err(ledgerError(ErrorCode.EmptyBlock, "Block has 0 transaction."));

    const backup = snapshot(this.accounts);
    const height = this.chain.length + 1;
    this.log.debug({ height, txs: block.transactionCount }, "executing block");

    for (const [i, tx] of block.transactions.entries()) {
      const res = tx.execute(this, isGenesis);
      if (isErr(res)) {
        this.accounts = backup;
        this.log.warn(
          { height, txIndex: i, code: res.error.code },
          "block rejected, ledger rolled back",
        );
        return Err(blockExecutionError(res.error, i));
      }
    }

    this.chain.append(block);
    this.log.info({ height, hash: block.hash }, "block committed");
    return Ok(undefined);
  }

  /* ---------- validation ------------------------------------------ */

  /** Walks newest → genesis and reports the first broken block, numbered from 1. */
  validate(): Result<void, LedgerError> {
    const total = this.chain.length;
    let blockNum = total;
    let expected: Hash | undefined; // prevHash of the block one step newer

    for (const block of this.chain) {
      const isGenesis = blockNum === 1;

      if (!block.verify())
        return Err(
          ledgerError(
            ErrorCode.InvalidBlockHash,
            `Block ${blockNum} has invalid hash`,
          ),
        );
      if (block.prevHash === undefined && !isGenesis)
        return Err(
          ledgerError(
            ErrorCode.ChainLinkageBroken,
            `Block ${blockNum} doesn't have prev_hash`,
          ),
        );
      if (block.prevHash !== undefined && isGenesis)
        return Err(
          ledgerError(
            ErrorCode.ChainLinkageBroken,
            "Genesis block shouldn't have prev_hash",
          ),
        );
      if (blockNum !== total && expected !== block.hash)
        return Err(
          ledgerError(
            ErrorCode.ChainLinkageBroken,
            `Block ${blockNum + 1} prev_hash doesn't match Block ${blockNum} hash`,
          ),
        );

      expected = block.prevHash;
      blockNum -= 1;
    }
    return Ok(undefined);
  }
}
