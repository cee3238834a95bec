export * from "./types";
export * from "./errors";
export {
  loadConfig,
  loadLogConfig,
  loadPoolLimit,
  type LedgerConfig,
} from "./config";
export { makeLogger, type ILogger } from "./logging";
export * from "./crypto";
export { Chain, type ChainSlot } from "./core/chain";
export type { Account, AccountType } from "./core/account";
export type { WorldState } from "./core/worldState";
export {
  Transaction,
  type TransactionData,
  type TransactionOptions,
} from "./core/transaction";
export { Block, type BlockParts } from "./core/block";
export { Blockchain, type BlockchainOptions } from "./core/blockchain";
export { checkedAdd, checkedSub } from "./core/balance";
export * from "./utils";
