import { AsyncLocalStorage } from 'node:async_hooks';

export interface KeyedLock {
  withLock<T>(key: string, work: () => Promise<T>): Promise<T>;
}

/**
 * Per-key async mutex. Work for the same key runs one at a time in arrival order;
 * different keys never wait on each other.
 */
export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  // Keys held by the current async call chain; nested `withLock` on a held key runs inline.
  const held = new AsyncLocalStorage<ReadonlySet<string>>();

  async function withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const heldKeys = held.getStore();
    if (heldKeys?.has(key)) {
      return work();
    }

    const previous = tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    tails.set(key, tail);

    await previous;

    const nextHeld = new Set(heldKeys ?? []);
    nextHeld.add(key);

    try {
      return await held.run(nextHeld, work);
    } finally {
      release();
      if (tails.get(key) === tail) {
        tails.delete(key);
      }
    }
  }

  return { withLock };
}
