import { encBlockHeader } from "../codec/rlp";
import { digestPartsHex } from "../crypto";
import type { Hash } from "../types";
import { assertU128 } from "./balance";
import type { Transaction } from "./transaction";

export interface BlockParts {
  nonce?: bigint;
  hash?: Hash;
  prevHash?: Hash;
  transactions: readonly Transaction[];
}

/**
 * Ordered batch of transactions. The hash is cached write-through: every
 * mutator recomputes it before returning.
 */
export class Block {
  private _nonce?: bigint;
  private _hash?: Hash;
  private readonly _prevHash?: Hash;
  private readonly txs: Transaction[] = [];

  constructor(prevHash?: Hash) {
    this._prevHash = prevHash;
  }

  /**
   * Rehydrates a block with whatever hash it was stored with. Nothing is
   * recomputed, so `verify()` reports whether the stored hash still holds.
   */
  static restore(parts: BlockParts): Block {
    const b = new Block(parts.prevHash);
    b._nonce = parts.nonce;
    b._hash = parts.hash;
    b.txs.push(...parts.transactions);
    return b;
  }

  get nonce(): bigint | undefined {
    return this._nonce;
  }

  get hash(): Hash | undefined {
    return this._hash;
  }

  get prevHash(): Hash | undefined {
    return this._prevHash;
  }

  get transactions(): readonly Transaction[] {
    return this.txs;
  }

  get transactionCount(): number {
    return this.txs.length;
  }

  setNonce(nonce: bigint): void {
    assertU128(nonce, "nonce");
    this._nonce = nonce;
    this.updateHash();
  }

  addTransaction(tx: Transaction): void {
    this.txs.push(tx);
    this.updateHash();
  }

  /** header (prevHash, nonce), then every transaction hash in list order */
  computeHash(): Hash {
    return digestPartsHex([
      encBlockHeader(this._prevHash, this._nonce),
      ...this.txs.map((tx) => tx.hashBytes()),
    ]);
  }

  verify(): boolean {
    return this._hash !== undefined && this._hash === this.computeHash();
  }

  private updateHash(): void {
    this._hash = this.computeHash();
  }
}
