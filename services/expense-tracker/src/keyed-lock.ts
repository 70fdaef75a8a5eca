/**
 * Serialises async work per key. Work for different keys runs concurrently;
 * work for one key runs in admission order, each task starting only after the
 * previous one settled. A failing task does not block the ones behind it.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(work);
    const settled: Promise<void> = result.then(
      () => this.release(key, settled),
      () => this.release(key, settled),
    );
    this.tails.set(key, settled);
    return result;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
