/**
 * Per-key async mutex. Operations sharing a key run one after another in
 * submission order; operations on different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, operation: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(operation);

    const tail: Promise<void> = run
      .then(noop, noop)
      .then(() => {
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      });
    this.tails.set(key, tail);

    return run;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

function noop(): void {
  // settled either way
}
