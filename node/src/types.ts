export type Transaction = {
  sender_public_key: string; // hex public key, or MINING_SENDER for rewards
  recipient_public_key: string;
  amount: number;
};

export type Block = {
  block_number: number; // 1-based
  timestamp: number; // seconds since epoch
  transactions: Transaction[]; // last entry is the mining reward
  nonce: number;
  previous_hash: string;
};

export type Chain = Block[];

export type ChainResponse = {
  chain: Chain;
  length: number;
};
