/**
 * Runs tasks that share a key one after another, in arrival order. Tasks with
 * different keys do not wait on each other. A rejected task does not block the
 * tasks queued behind it.
 */
export class KeyedQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail)
    );
    this.tails.set(key, tail);

    return result;
  }

  get pending(): number {
    return this.tails.size;
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
