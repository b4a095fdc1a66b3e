import { Blockchain } from '../blockchain';
import { MINING_REWARD, MINING_SENDER } from '../config';
import { Block, Transaction } from '../types';
import { KeyPair, signTransaction } from '../utils/crypto';

export function fixedClock(start = 1700000000): () => number {
  let t = start;
  return () => t++;
}

/** Same steps the node runs: proof over pending, reward, append. */
export function mineBlock(bc: Blockchain, minerId = 'miner'): Block {
  const nonce = bc.proofOfWork();
  const previousHash = bc.hash(bc.lastBlock);
  bc.submitTransaction(MINING_SENDER, minerId, '', MINING_REWARD);
  return bc.createBlock(nonce, previousHash);
}

export function buildChain(length: number, start = 1700000000): Block[] {
  const bc = new Blockchain({ now: fixedClock(start) });
  while (bc.length < length) mineBlock(bc);
  return bc.chain;
}

export async function signedTransfer(
  from: KeyPair,
  recipient: string,
  amount: number,
): Promise<{ tx: Transaction; signature: string }> {
  const tx: Transaction = { sender_public_key: from.publicKey, recipient_public_key: recipient, amount };
  return { tx, signature: await signTransaction(from.privateKey, tx) };
}
