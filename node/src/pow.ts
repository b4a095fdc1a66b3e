import debug from 'debug';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { MINING_DIFFICULTY } from './config';
import { MiningAbortedError } from './errors';
import { Transaction } from './types';
import { sha256Hex } from './utils/crypto';
import { serializeTransactions } from './utils/serialize';

const log = debug('ledger:pow');

export type FindNonceOptions = {
  signal?: AbortSignal;
  batchSize?: number; // nonces tried between yields
};

function proofInput(transactions: readonly Transaction[], lastHash: string): string {
  return serializeTransactions(transactions) + lastHash;
}

function meetsDifficulty(input: string, nonce: number, target: string): boolean {
  return sha256Hex(input + String(nonce)).startsWith(target);
}

export function validProof(
  transactions: readonly Transaction[],
  lastHash: string,
  nonce: number,
  difficulty: number = MINING_DIFFICULTY,
): boolean {
  return meetsDifficulty(proofInput(transactions, lastHash), nonce, '0'.repeat(difficulty));
}

/**
 * Smallest nonce satisfying `validProof`. Blocks the caller until found.
 */
export function findNonce(
  transactions: readonly Transaction[],
  lastHash: string,
  difficulty: number = MINING_DIFFICULTY,
): number {
  const input = proofInput(transactions, lastHash);
  const target = '0'.repeat(difficulty);
  let nonce = 0;
  while (!meetsDifficulty(input, nonce, target)) {
    nonce += 1;
  }
  return nonce;
}

/**
 * Same search as `findNonce`, run in batches with a yield to the event loop
 * in between so other work (and cancellation) can get through.
 * Rejects with MiningAbortedError once `signal` fires.
 */
export async function findNonceAsync(
  transactions: readonly Transaction[],
  lastHash: string,
  difficulty: number = MINING_DIFFICULTY,
  opts: FindNonceOptions = {},
): Promise<number> {
  const { signal, batchSize = 1000 } = opts;
  const input = proofInput(transactions, lastHash);
  const target = '0'.repeat(difficulty);
  const started = Date.now();
  let nonce = 0;
  for (;;) {
    if (signal?.aborted) {
      log('search aborted at nonce %d', nonce);
      throw new MiningAbortedError();
    }
    const batchEnd = nonce + batchSize;
    for (; nonce < batchEnd; nonce++) {
      if (meetsDifficulty(input, nonce, target)) {
        log('found nonce %d at difficulty %d in %dms', nonce, difficulty, Date.now() - started);
        return nonce;
      }
    }
    await yieldToEventLoop();
  }
}
