import { Transaction } from '../types';

/**
 * JSON with object keys sorted at every depth and no whitespace.
 * Numbers use the ECMAScript Number#toString form, so a block that
 * survives a JSON round trip serializes to the same string.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return '[' + value.map(item => canonicalJson(item === undefined ? null : item)).join(',') + ']';
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + canonicalJson(v)).join(',') + '}';
  }
  return JSON.stringify(value);
}

// Rebuilds the record with the fixed (sender, recipient, amount) field order,
// dropping anything else a peer may have attached.
export function orderTransaction(tx: Transaction): Transaction {
  return {
    sender_public_key: tx.sender_public_key,
    recipient_public_key: tx.recipient_public_key,
    amount: tx.amount,
  };
}

export function serializeTransaction(tx: Transaction): string {
  return JSON.stringify(orderTransaction(tx));
}

export function serializeTransactions(txs: readonly Transaction[]): string {
  return JSON.stringify(txs.map(orderTransaction));
}
