// ── KeyedMutex ───────────────────────────────────────────────────
//
// Serializes async critical sections per key. Tasks for the same key run
// one after another in submission order; tasks for different keys never
// wait on each other. A rejected task does not poison the queue.

export class KeyedMutex {
  readonly #tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.#tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.#tails.set(key, tail);
    void tail.then(() => {
      if (this.#tails.get(key) === tail) this.#tails.delete(key);
    });

    return result;
  }

  /** Whether a task is queued or running for the key. */
  isLocked(key: string): boolean {
    return this.#tails.has(key);
  }

  /** Number of keys with queued or running tasks. */
  get size(): number {
    return this.#tails.size;
  }
}
