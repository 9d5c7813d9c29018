export type Release = () => void;

/**
 * One FIFO lock per key. Holders of different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let unlock: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    await previous;

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      unlock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  /** Acquires every key (deduplicated) and returns a single release for all of them. */
  async acquireAll(keys: Iterable<string>): Promise<Release> {
    const unique = [...new Set(keys)].sort();
    const releases = await Promise.all(unique.map(key => this.acquire(key)));
    return () => {
      for (const release of releases) {
        release();
      }
    };
  }
}
