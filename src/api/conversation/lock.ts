/**
 * Process-local keyed mutex.
 * Every read-then-write of a contact runs inside `run(contactId, ...)` so that a
 * guard check and the transition that follows it are one unit per contact.
 */

export class ContactLocks {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `work` once every earlier holder of `key` has finished.
   * Holders of different keys never wait on each other.
   */
  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys currently held or waited on. */
  get size(): number {
    return this.tails.size;
  }
}
