// src/ingest/userLanes.ts

/**
 * One sequential lane per user: tasks for the same user run strictly in the
 * order they were queued, tasks for different users run independently.
 */
export class UserLanes {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(userId) ?? Promise.resolve();
    const result = prev.then(task);

    // the tail only tracks completion; the caller still sees the rejection
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(userId, tail);
    void tail.then(() => {
      if (this.tails.get(userId) === tail) this.tails.delete(userId);
    });

    return result;
  }

  isBusy(userId: string): boolean {
    return this.tails.has(userId);
  }

  activeLanes(): number {
    return this.tails.size;
  }

  /** Resolves once every lane queued so far has finished. */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(Array.from(this.tails.values()));
    }
  }
}
