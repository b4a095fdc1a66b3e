import { InvalidPeerAddressError } from './errors';

/**
 * Reduces a peer address to its `host:port` form, so `http://Host:5001/`
 * and `host:5001` name the same peer.
 */
export function normalizePeerAddress(address: string): string {
  const trimmed = address.trim();
  if (trimmed.length === 0) throw new InvalidPeerAddressError(address);
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new InvalidPeerAddressError(address);
  }
  // peers are always fetched over plain http, so no other scheme is accepted
  if (url.protocol !== 'http:' || url.host.length === 0) {
    throw new InvalidPeerAddressError(address);
  }
  return url.host;
}

export class PeerSet {
  private peers = new Set<string>();

  register(address: string): string {
    const peer = normalizePeerAddress(address);
    this.peers.add(peer);
    return peer;
  }

  // all or nothing: one bad address leaves the set untouched
  registerAll(addresses: readonly string[]): string[] {
    const normalized = addresses.map(normalizePeerAddress);
    for (const peer of normalized) this.peers.add(peer);
    return normalized;
  }

  has(address: string): boolean {
    return this.peers.has(normalizePeerAddress(address));
  }

  list(): string[] {
    return [...this.peers];
  }

  get size(): number {
    return this.peers.size;
  }
}
