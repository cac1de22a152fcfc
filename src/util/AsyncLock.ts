/**
 * Runs async work one piece at a time, in the order it was queued.
 */
export class AsyncLock {
  private locked = false;
  private waiting: Array<() => void> = [];

  async inLock<T>(func: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await func();
    } finally {
      this.release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  private async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    if (!this.locked) {
      throw new Error('Lock released without acquisition.');
    }
    const next = this.waiting.shift();
    if (next) {
      // Ownership passes straight to the next waiter.
      next();
      return;
    }
    this.locked = false;
  }
}
