import debug from 'debug';
import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import { Blockchain } from './blockchain';
import { MINING_DIFFICULTY, MINING_REWARD, MINING_SENDER } from './config';
import { FetchChain, httpFetchChain, resolveConflicts, ResolveResult } from './consensus';
import { PeerSet } from './peers';
import { findNonceAsync } from './pow';
import { Block, Chain, Transaction } from './types';
import { Lock } from './utils/lock';

const log = debug('ledger:node');

export interface NodeEvents {
  transaction: (tx: Transaction, blockNumber: number) => void;
  block: (block: Block) => void;
  chainReplaced: (chain: Chain) => void;
}

export type BlockchainNodeOptions = {
  nodeId?: string;
  difficulty?: number;
  miningReward?: number;
  miningBatchSize?: number;
  peerTimeoutMs?: number;
  fetchChain?: FetchChain;
  now?: () => number;
};

export type MineOptions = {
  signal?: AbortSignal;
};

/**
 * One ledger node: chain, pending pool and peer set behind a single lock.
 * Every mutation goes through `runWithLock`.
 */
export class BlockchainNode extends EventEmitter<NodeEvents> {
  readonly nodeId: string;
  readonly blockchain: Blockchain;
  readonly peers = new PeerSet();

  private readonly miningReward: number;
  private readonly miningBatchSize: number;
  private readonly fetchChain: FetchChain;
  private readonly lock = new Lock();
  private miningController: AbortController | null = null;

  constructor(opts: BlockchainNodeOptions = {}) {
    super();
    this.nodeId = opts.nodeId ?? uuidv4().replace(/-/g, '');
    this.blockchain = new Blockchain({ difficulty: opts.difficulty ?? MINING_DIFFICULTY, now: opts.now });
    this.miningReward = opts.miningReward ?? MINING_REWARD;
    this.miningBatchSize = opts.miningBatchSize ?? 1000;
    this.fetchChain = opts.fetchChain ?? httpFetchChain({ timeoutMs: opts.peerTimeoutMs });
  }

  private async runWithLock<T>(action: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(action);
  }

  get isMining(): boolean {
    return this.miningController !== null;
  }

  async submitTransaction(sender: string, recipient: string, signature: string, amount: number): Promise<number | false> {
    return this.runWithLock(async () => {
      const blockNumber = this.blockchain.submitTransaction(sender, recipient, signature, amount);
      if (blockNumber !== false) {
        const transactions = this.blockchain.transactions;
        this.emit('transaction', transactions[transactions.length - 1], blockNumber);
      }
      return blockNumber;
    });
  }

  /**
   * Finds a proof for the pending pool, credits the reward to this node and
   * appends the block. Rejects with MiningAbortedError if `signal` fires or
   * a peer chain is adopted mid-search; the pending pool is then untouched.
   */
  async mine(opts: MineOptions = {}): Promise<Block> {
    return this.runWithLock(async () => {
      const controller = new AbortController();
      const onAbort = () => controller.abort();
      if (opts.signal?.aborted) controller.abort();
      opts.signal?.addEventListener('abort', onAbort, { once: true });
      this.miningController = controller;
      try {
        const lastHash = this.blockchain.hash(this.blockchain.lastBlock);
        const nonce = await findNonceAsync(this.blockchain.transactions, lastHash, this.blockchain.difficulty, {
          signal: controller.signal,
          batchSize: this.miningBatchSize,
        });
        this.blockchain.submitTransaction(MINING_SENDER, this.nodeId, '', this.miningReward);
        const block = this.blockchain.createBlock(nonce, lastHash);
        log('mined block %d (nonce %d)', block.block_number, nonce);
        this.emit('block', block);
        return block;
      } finally {
        this.miningController = null;
        opts.signal?.removeEventListener('abort', onAbort);
      }
    });
  }

  getChain(): Chain {
    return this.blockchain.chain;
  }

  getPendingTransactions(): Transaction[] {
    return this.blockchain.transactions;
  }

  getPeers(): string[] {
    return this.peers.list();
  }

  registerPeer(address: string): string {
    return this.peers.register(address);
  }

  registerPeers(addresses: readonly string[]): string[] {
    return this.peers.registerAll(addresses);
  }

  /**
   * Asks every known peer for its chain and adopts the longest valid one that
   * beats ours. Peer requests run outside the lock; the swap runs inside it.
   */
  async resolveConsensus(): Promise<ResolveResult> {
    const result = await resolveConflicts(this.blockchain.chain, this.peers.list(), {
      fetchChain: this.fetchChain,
      isValid: chain => this.blockchain.validChain(chain),
    });
    if (!result.replaced) return result;

    if (this.miningController) {
      log('aborting in-flight mining, adopting peer chain');
      this.miningController.abort();
    }
    return this.runWithLock(async () => {
      // a block may have been mined while peers were being asked
      if (result.chain.length <= this.blockchain.length) {
        return { replaced: false, chain: this.blockchain.chain };
      }
      this.blockchain.replaceChain(result.chain);
      const chain = this.blockchain.chain;
      this.emit('chainReplaced', chain);
      return { replaced: true, chain };
    });
  }
}
