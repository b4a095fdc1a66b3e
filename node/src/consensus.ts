import debug from 'debug';
import { chainResponseSchema } from './schema';
import { Block, Chain } from './types';

const log = debug('ledger:consensus');

export type PeerChainResponse = {
  status: number;
  body: unknown;
};

export type FetchChain = (peer: string) => Promise<PeerChainResponse>;

export type ResolveOptions = {
  fetchChain: FetchChain;
  isValid: (chain: readonly Block[]) => boolean;
};

export type ResolveResult = {
  replaced: boolean;
  chain: Chain;
};

export type HttpFetchOptions = {
  timeoutMs?: number;
};

/** GET http://<peer>/chain, bounded by a timeout. */
export function httpFetchChain(opts: HttpFetchOptions = {}): FetchChain {
  const timeoutMs = opts.timeoutMs ?? 5000;
  return async (peer: string) => {
    const res = await fetch(`http://${peer}/chain`, { signal: AbortSignal.timeout(timeoutMs) });
    if (!res.ok) return { status: res.status, body: null };
    const body: unknown = await res.json();
    return { status: res.status, body };
  };
}

/**
 * Longest-valid-chain rule. Every peer is asked for its chain concurrently;
 * peers that fail, time out, answer non-2xx or send a malformed payload are
 * skipped. A candidate must be strictly longer than both the local chain and
 * any candidate accepted before it, and pass `isValid`.
 */
export async function resolveConflicts(
  localChain: readonly Block[],
  peers: readonly string[],
  opts: ResolveOptions,
): Promise<ResolveResult> {
  const responses = await Promise.allSettled(peers.map(peer => opts.fetchChain(peer)));

  let maxLength = localChain.length;
  let newChain: Chain | null = null;

  for (const [i, response] of responses.entries()) {
    const peer = peers[i];
    if (response.status === 'rejected') {
      log('peer %s unreachable: %s', peer, response.reason instanceof Error ? response.reason.message : String(response.reason));
      continue;
    }
    const { status, body } = response.value;
    if (status < 200 || status >= 300) {
      log('peer %s answered %d', peer, status);
      continue;
    }
    const parsed = chainResponseSchema.safeParse(body);
    if (!parsed.success) {
      log('peer %s sent a malformed chain: %s', peer, parsed.error.message);
      continue;
    }
    const { chain } = parsed.data;
    if (chain.length <= maxLength) continue;
    if (!opts.isValid(chain)) {
      log('peer %s chain of length %d is invalid', peer, chain.length);
      continue;
    }
    maxLength = chain.length;
    newChain = chain;
  }

  if (newChain) {
    return { replaced: true, chain: newChain };
  }
  return { replaced: false, chain: [...localChain] };
}
