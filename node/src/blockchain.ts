import debug from 'debug';
import { GENESIS_NONCE, GENESIS_PREVIOUS_HASH, MINING_DIFFICULTY, MINING_SENDER } from './config';
import { findNonce, validProof } from './pow';
import { Block, Chain, Transaction } from './types';
import { sha256Hex, verifyTransactionSignature } from './utils/crypto';
import { canonicalJson, orderTransaction } from './utils/serialize';

const log = debug('ledger:chain');

export type BlockchainOptions = {
  difficulty?: number;
  now?: () => number; // seconds since epoch
};

// appended blocks are never edited in place, by us or by callers
function freezeBlock(block: Block): Block {
  block.transactions.forEach(tx => Object.freeze(tx));
  Object.freeze(block.transactions);
  return Object.freeze(block);
}

export class Blockchain {
  readonly difficulty: number;
  private _chain: Chain = [];
  private _transactions: Transaction[] = [];
  private readonly now: () => number;

  constructor(opts: BlockchainOptions = {}) {
    this.difficulty = opts.difficulty ?? MINING_DIFFICULTY;
    this.now = opts.now ?? (() => Date.now() / 1000);
    this.createBlock(GENESIS_NONCE, GENESIS_PREVIOUS_HASH);
  }

  get chain(): Chain {
    return [...this._chain];
  }

  /** Pending transactions, oldest first. */
  get transactions(): Transaction[] {
    return [...this._transactions];
  }

  get length(): number {
    return this._chain.length;
  }

  get lastBlock(): Block {
    return this._chain[this._chain.length - 1];
  }

  /**
   * Appends a block holding the whole pending pool and clears the pool.
   * The nonce is trusted; callers run the proof-of-work first.
   */
  createBlock(nonce: number, previousHash: string): Block {
    const block = freezeBlock({
      block_number: this._chain.length + 1,
      timestamp: this.now(),
      transactions: this._transactions,
      nonce,
      previous_hash: previousHash,
    });
    this._transactions = [];
    this._chain.push(block);
    log('appended block %d with %d transactions', block.block_number, block.transactions.length);
    return block;
  }

  hash(block: Block): string {
    return sha256Hex(canonicalJson(block));
  }

  /**
   * Queues a transaction for the next block. Reward transactions skip the
   * signature check. Returns the block number it should land in, or false.
   */
  submitTransaction(sender: string, recipient: string, signature: string, amount: number): number | false {
    const tx: Transaction = Object.freeze({
      sender_public_key: sender,
      recipient_public_key: recipient,
      amount,
    });
    if (sender !== MINING_SENDER && !verifyTransactionSignature(sender, signature, tx)) {
      log('rejected transaction from %s', sender.slice(0, 16));
      return false;
    }
    this._transactions.push(tx);
    return this._chain.length + 1;
  }

  /** Nonce for the current pending pool on top of the last block. */
  proofOfWork(): number {
    return findNonce(this._transactions, this.hash(this.lastBlock), this.difficulty);
  }

  validChain(candidate: readonly Block[]): boolean {
    if (candidate.length === 0) return false;
    let lastBlock = candidate[0];
    for (let i = 1; i < candidate.length; i++) {
      const block = candidate[i];
      if (block.previous_hash !== this.hash(lastBlock)) {
        log('block %d: previous_hash mismatch', block.block_number);
        return false;
      }
      // the trailing reward is minted after the proof is found
      const transactions = block.transactions.slice(0, -1).map(orderTransaction);
      if (!validProof(transactions, block.previous_hash, block.nonce, this.difficulty)) {
        log('block %d: invalid proof of work', block.block_number);
        return false;
      }
      lastBlock = block;
    }
    return true;
  }

  /** Swaps in a copy of a whole chain. Validation is the caller's job. */
  replaceChain(chain: readonly Block[]): void {
    this._chain = structuredClone([...chain]).map(freezeBlock);
    log('chain replaced, new length %d', this._chain.length);
  }
}
