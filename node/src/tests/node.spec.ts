import { setImmediate as tick } from 'timers/promises';
import { describe, expect, it, vi } from 'vitest';
import { MINING_REWARD, MINING_SENDER } from '../config';
import { FetchChain } from '../consensus';
import { MiningAbortedError } from '../errors';
import { BlockchainNode } from '../node';
import { findNonce } from '../pow';
import { Block } from '../types';
import { generateKeyPair } from '../utils/crypto';
import { fixedClock, signedTransfer } from './helpers';

const alice = generateKeyPair();
const bob = generateKeyPair();

function servingChain(chain: Block[]): FetchChain {
  return async () => ({ status: 200, body: { length: chain.length, chain } });
}

describe('BlockchainNode', () => {
  it('has a 32 character hex identity', () => {
    expect(new BlockchainNode().nodeId).toMatch(/^[0-9a-f]{32}$/);
  });

  it('mines a block that credits the reward to itself', async () => {
    const node = new BlockchainNode({ nodeId: 'node-a' });
    const onBlock = vi.fn();
    node.on('block', onBlock);

    const { tx, signature } = await signedTransfer(alice, bob.publicKey, 7);
    await expect(node.submitTransaction(tx.sender_public_key, tx.recipient_public_key, signature, tx.amount)).resolves.toBe(2);
    const block = await node.mine();

    expect(block.block_number).toBe(2);
    expect(block.transactions).toEqual([
      tx,
      { sender_public_key: MINING_SENDER, recipient_public_key: 'node-a', amount: MINING_REWARD },
    ]);
    expect(node.getPendingTransactions()).toEqual([]);
    expect(onBlock).toHaveBeenCalledWith(block);
    expect(node.blockchain.validChain(node.getChain())).toBe(true);
  });

  it('keeps its chain intact when a mined block is tampered with by a listener or caller', async () => {
    const node = new BlockchainNode();
    node.on('block', block => {
      Reflect.set(block, 'nonce', 123456);
    });
    const block = await node.mine();

    expect(() => block.transactions.push({ sender_public_key: 'x', recipient_public_key: 'y', amount: 1 })).toThrow(
      TypeError,
    );
    expect(Reflect.set(node.getChain()[1], 'nonce', 123456)).toBe(false);
    expect(node.getChain()[1].nonce).not.toBe(123456);
    expect(node.getChain()[1].transactions).toHaveLength(1);
    expect(node.blockchain.validChain(node.getChain())).toBe(true);
  });

  it('emits accepted transactions and drops rejected ones', async () => {
    const node = new BlockchainNode();
    const onTx = vi.fn();
    node.on('transaction', onTx);
    const { tx, signature } = await signedTransfer(alice, bob.publicKey, 1);

    await expect(node.submitTransaction(bob.publicKey, tx.recipient_public_key, signature, 1)).resolves.toBe(false);
    await expect(node.submitTransaction(tx.sender_public_key, tx.recipient_public_key, signature, 1)).resolves.toBe(2);

    expect(onTx).toHaveBeenCalledTimes(1);
    expect(onTx).toHaveBeenCalledWith(tx, 2);
    expect(node.getPendingTransactions()).toEqual([tx]);
  });

  it('serializes concurrent mining', async () => {
    const node = new BlockchainNode();
    const blocks = await Promise.all([node.mine(), node.mine(), node.mine()]);
    expect(blocks.map(b => b.block_number)).toEqual([2, 3, 4]);
    expect(node.blockchain.validChain(node.getChain())).toBe(true);
  });

  it('stops mining when the caller aborts, leaving the pool as it was', async () => {
    const node = new BlockchainNode({ difficulty: 64, miningBatchSize: 50 });
    await node.submitTransaction(MINING_SENDER, 'someone', '', 3);
    const controller = new AbortController();
    const mining = expect(node.mine({ signal: controller.signal })).rejects.toBeInstanceOf(MiningAbortedError);
    setTimeout(() => controller.abort(), 20);
    await mining;

    expect(node.isMining).toBe(false);
    expect(node.getChain()).toHaveLength(1);
    expect(node.getPendingTransactions()).toEqual([
      { sender_public_key: MINING_SENDER, recipient_public_key: 'someone', amount: 3 },
    ]);
  });

  it('registers peers once per host:port', () => {
    const node = new BlockchainNode();
    node.registerPeer('http://127.0.0.1:5001');
    node.registerPeers(['127.0.0.1:5001', '127.0.0.1:5002']);
    expect(node.getPeers()).toEqual(['127.0.0.1:5001', '127.0.0.1:5002']);
  });

  describe('resolveConsensus', () => {
    it('adopts a longer peer chain', async () => {
      const peer = new BlockchainNode({ nodeId: 'peer' });
      await peer.mine();
      await peer.mine();

      const node = new BlockchainNode({ fetchChain: servingChain(peer.getChain()) });
      node.registerPeer('127.0.0.1:5002');
      const onReplaced = vi.fn();
      node.on('chainReplaced', onReplaced);

      const result = await node.resolveConsensus();
      expect(result.replaced).toBe(true);
      expect(node.getChain()).toEqual(peer.getChain());
      expect(onReplaced).toHaveBeenCalledTimes(1);
    });

    it('stays authoritative without peers', async () => {
      const node = new BlockchainNode();
      await node.mine();
      const result = await node.resolveConsensus();
      expect(result).toEqual({ replaced: false, chain: node.getChain() });
    });

    it('aborts an in-flight search when it adopts a peer chain', async () => {
      const peer = new BlockchainNode({ difficulty: 3 });
      await peer.mine();
      await peer.mine();

      // pick a genesis whose first proof needs a long search
      const makeNode = (start: number) =>
        new BlockchainNode({
          difficulty: 3,
          miningBatchSize: 1,
          now: fixedClock(start),
          fetchChain: servingChain(peer.getChain()),
        });
      let start = 1700000000;
      let node = makeNode(start);
      while (findNonce([], node.blockchain.hash(node.blockchain.lastBlock), 3) < 100) {
        start++;
        node = makeNode(start);
      }
      node.registerPeer('127.0.0.1:5002');

      const mining = expect(node.mine()).rejects.toBeInstanceOf(MiningAbortedError);
      await tick();
      expect(node.isMining).toBe(true);

      const result = await node.resolveConsensus();
      await mining;
      expect(result.replaced).toBe(true);
      expect(node.getChain()).toEqual(peer.getChain());
    });
  });
});
