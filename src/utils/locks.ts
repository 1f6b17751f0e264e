import crypto from 'crypto';

import type { PoolClient } from 'pg';

export function hashKey(str: string): number {
  // signed 32-bit int for pg advisory lock
  return crypto.createHash('md5').update(str).digest().readInt32BE(0);
}

export async function pgAdvisoryXactLock(client: PoolClient, key: string): Promise<void> {
  await client.query('SELECT pg_advisory_xact_lock($1)', [hashKey(key)]);
}

/** Deduplicated and sorted so concurrent holders of overlapping key sets cannot deadlock. */
export function lockOrder(keys: string[]): string[] {
  return [...new Set(keys)].sort();
}

/**
 * In-process counterpart of the advisory lock: callers holding the same key run one
 * after another, callers on disjoint keys run concurrently.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const ordered = lockOrder(keys);
    const releases: Array<() => void> = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
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
}
