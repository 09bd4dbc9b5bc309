/**
 * Group Lock
 *
 * Keyed in-process mutex. All writes touching one grouping key (case
 * identifier) run one at a time; different keys proceed independently.
 * Several keys are acquired in sorted order so two holders can never wait
 * on each other.
 *
 * @module reconciler/group-lock
 */

type Release = () => void;

export class GroupLock {
  private readonly tails = new Map<string, Promise<void>>();

  /** Keys currently held or waited on. */
  get pendingKeys(): string[] {
    return [...this.tails.keys()];
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  private async acquire(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: Release = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }

  /**
   * Run `fn` while holding every key in `keys`.
   * Locks are released when `fn` settles, whether it resolves or throws.
   */
  async runExclusive<T>(keys: Iterable<string>, fn: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: Release[] = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) release();
    }
  }
}
