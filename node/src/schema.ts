import z from 'zod';
import { MINING_SENDER } from './config';

export const transactionSchema = z.object({
  sender_public_key: z.string(),
  recipient_public_key: z.string(),
  amount: z.number().finite(),
});

export const blockSchema = z.object({
  block_number: z.number().int().positive(),
  timestamp: z.number().finite(),
  transactions: z.array(transactionSchema),
  nonce: z.number().int().nonnegative(),
  previous_hash: z.string(),
});

// GET /chain as served by peers
export const chainResponseSchema = z
  .object({
    length: z.number().int().nonnegative(),
    chain: z.array(blockSchema),
  })
  .refine(res => res.length === res.chain.length, { message: 'length does not match chain' });

export const transactionFormSchema = z.object({
  confirmation_sender_public_key: z
    .string()
    .trim()
    .min(1)
    .refine(sender => sender !== MINING_SENDER, { message: 'reward transactions are minted by the node' }),
  confirmation_recipient_public_key: z.string().trim().min(1),
  transaction_signature: z.string().trim().min(1),
  confirmation_amount: z.coerce.number().finite().positive(),
});

export const nodesFormSchema = z.object({
  nodes: z
    .union([z.string(), z.array(z.string())])
    .transform(nodes => (Array.isArray(nodes) ? nodes : nodes.split(',')))
    .transform(nodes => nodes.map(n => n.trim()).filter(n => n.length > 0))
    .refine(nodes => nodes.length > 0, { message: 'Please supply a valid nodes list' }),
});
