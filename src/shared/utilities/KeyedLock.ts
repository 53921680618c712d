/**
 * Per-key serialization of async operations.
 *
 * Operations sharing a key run one after another in call order; operations on
 * different keys run concurrently. A failed operation releases the key for
 * the next one and rejects only its own caller.
 */
export class KeyedLock {
  private locks: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const currentLock = this.locks.get(key) || Promise.resolve();
    let releaseLock: () => void = () => {};
    const newLock = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });
    const chained = currentLock.then(() => newLock);
    this.locks.set(key, chained);

    // Wait for the previous holder to finish
    await currentLock;

    try {
      return await operation();
    } finally {
      releaseLock();
      if (this.locks.get(key) === chained) {
        this.locks.delete(key);
      }
    }
  }

  /** Whether an operation currently holds or waits on the key. */
  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  clear(): void {
    this.locks.clear();
  }
}
