export const ErrorCode = {
  AccountAlreadyExists: "AccountAlreadyExists",
  InvalidAccount: "InvalidAccount",
  NotGenesis: "NotGenesis",
  InsufficientBalance: "InsufficientBalance",
  InvalidSenderAddress: "InvalidSenderAddress",
  InvalidReceiverAddress: "InvalidReceiverAddress",
  Overflow: "Overflow",
  BalanceOverflow: "BalanceOverflow",
  SignatureMissing: "SignatureMissing",
  SignatureInvalid: "SignatureInvalid",
  FromUnset: "FromUnset",
  InvalidBlockHash: "InvalidBlockHash",
  EmptyBlock: "EmptyBlock",
  ChainLinkageBroken: "ChainLinkageBroken",
  PoolFull: "PoolFull",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface LedgerError {
  readonly code: ErrorCode;
  readonly message: string;
  /** position of the failing transaction inside a rejected block */
  readonly txIndex?: number;
  readonly cause?: LedgerError;
}

export const ledgerError = (code: ErrorCode, message: string): LedgerError => ({
  code,
  message,
});

/** Wraps a transaction failure into the error reported for its block. */
export const blockExecutionError = (
  inner: LedgerError,
  txIndex: number,
): LedgerError => ({
  code: inner.code,
  message: `Error during executing transactions: ${inner.message}`,
  txIndex,
  cause: inner,
});
