/**
 * Keyed async lock: one writer at a time per call id.
 *
 * Work for the same key runs in submission order; different keys never
 * wait on each other. The chain for a key is dropped once it drains.
 */
export class CallLock {
  private readonly tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, work: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    const result = previous.then(work);
    // The chain must survive a failing task so later tasks still run
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return result;
  }

  /** Number of keys with queued or running work */
  get pendingKeys(): number {
    return this.tails.size;
  }
}
