const settled = () => undefined;

/**
 * Serialises async work per key with promise chains. `runExclusive` waits for
 * earlier work on the same key; `runGlobal` waits for all outstanding work and
 * holds back anything queued after it until it finishes.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  private globalTail: Promise<void> = Promise.resolve();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const gate = this.globalTail;
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = Promise.all([gate, previous]).then(() => task());
    const tail = run.then(settled, settled);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return run;
  }

  runGlobal<T>(task: () => Promise<T>): Promise<T> {
    const pending = [this.globalTail, ...this.tails.values()];
    const run = Promise.all(pending).then(() => task());
    this.globalTail = run.then(settled, settled);
    return run;
  }
}
