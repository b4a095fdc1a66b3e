export class LedgerError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidPeerAddressError extends LedgerError {
  readonly address: string;

  constructor(address: string) {
    super('INVALID_PEER_ADDRESS', `Invalid URL: ${JSON.stringify(address)}`);
    this.address = address;
  }
}

/** Raised when a nonce search is cancelled before a solution is found. */
export class MiningAbortedError extends LedgerError {
  constructor(message = 'Mining was aborted') {
    super('MINING_ABORTED', message);
  }
}
