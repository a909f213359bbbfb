// Runs async work one at a time per key. A task holding several keys waits for
// every earlier task on any of them, so read-then-write sequences never interleave.

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  run<T>(keys: readonly string[], fn: () => Promise<T>): Promise<T> {
    const unique = [...new Set(keys)];
    const prior = unique.flatMap((key) => this.tails.get(key) ?? []);
    const task = Promise.all(prior).then(fn);
    const done = task.then(
      () => undefined,
      () => undefined,
    );
    for (const key of unique) this.tails.set(key, done);

    return task.finally(() => {
      for (const key of unique) {
        if (this.tails.get(key) === done) this.tails.delete(key);
      }
    });
  }

  get pending(): number {
    return this.tails.size;
  }
}
