/**
 * Single-permit async lock. Waiters are released in FIFO order.
 */
export class Lock {
  private permits = 1;
  private promiseResolverQueue: Array<(v: boolean) => void> = [];

  async acquire(): Promise<boolean> {
    if (this.permits > 0) {
      this.permits -= 1;
      return true;
    }
    return new Promise<boolean>(resolve => this.promiseResolverQueue.push(resolve));
  }

  release(): void {
    const nextResolver = this.promiseResolverQueue.shift();
    if (nextResolver) {
      // hand the permit straight to the next waiter
      nextResolver(true);
      return;
    }
    this.permits = Math.min(this.permits + 1, 1);
  }

  async runExclusive<T>(action: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await action();
    } finally {
      this.release();
    }
  }

  get isLocked(): boolean {
    return this.permits === 0;
  }
}
