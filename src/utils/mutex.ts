// Promise-chain mutex. Each runExclusive() call waits for the previous holder
// to release before its callback runs, so async read-modify-write sections on
// shared state never interleave.

import { createDeferred } from "./deferred.js";

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /** True while a callback is running or queued. */
  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    const release = createDeferred<void>();
    this.tail = release.promise;
    this.holders++;

    await previous;
    try {
      return await fn();
    } finally {
      this.holders--;
      release.resolve();
    }
  }
}
