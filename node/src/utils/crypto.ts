import { createHash } from 'crypto';
import debug from 'debug';
import * as secp from 'noble-secp256k1';
import { Transaction } from '../types';
import { serializeTransaction } from './serialize';

const log = debug('ledger:crypto');

export type KeyPair = {
  privateKey: string;
  publicKey: string;
};

export function sha256Hex(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

function toHex(value: string | Uint8Array): string {
  return typeof value === 'string' ? value : Buffer.from(value).toString('hex');
}

/** SHA-256 of the transaction in its fixed field order. This is what gets signed. */
export function transactionDigest(tx: Transaction): string {
  return sha256Hex(serializeTransaction(tx));
}

/**
 * Checks that `signature` (DER hex) over the transaction digest was produced
 * by the holder of `senderPublicKey`. Malformed keys or signatures yield false.
 */
export function verifyTransactionSignature(senderPublicKey: string, signature: string, tx: Transaction): boolean {
  try {
    return secp.verify(signature, transactionDigest(tx), senderPublicKey);
  } catch (e) {
    log('signature check failed for %s: %s', senderPublicKey.slice(0, 16), e instanceof Error ? e.message : String(e));
    return false;
  }
}

export function generateKeyPair(): KeyPair {
  const privateKey = Buffer.from(secp.utils.randomPrivateKey()).toString('hex');
  return { privateKey, publicKey: publicKeyFromPrivate(privateKey) };
}

export function publicKeyFromPrivate(privateKey: string): string {
  return toHex(secp.getPublicKey(privateKey));
}

export async function signTransaction(privateKey: string, tx: Transaction): Promise<string> {
  return toHex(await secp.sign(transactionDigest(tx), privateKey));
}
