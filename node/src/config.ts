import z from 'zod';

// Sender of system-minted reward transactions. Contains a space, so it can
// never be mistaken for a hex-encoded public key.
export const MINING_SENDER = 'The Blockchain';
export const MINING_REWARD = 1;
export const MINING_DIFFICULTY = 2;

export const GENESIS_NONCE = 0;
export const GENESIS_PREVIOUS_HASH = '00';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5001),
  HOST: z.string().min(1).default('127.0.0.1'),
  PEER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  MINING_BATCH_SIZE: z.coerce.number().int().positive().default(1000),
});

export type NodeConfig = {
  port: number;
  host: string;
  peerTimeoutMs: number; // per peer request during consensus
  miningBatchSize: number; // nonces tried between event-loop yields
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): NodeConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    peerTimeoutMs: parsed.PEER_TIMEOUT_MS,
    miningBatchSize: parsed.MINING_BATCH_SIZE,
  };
}
