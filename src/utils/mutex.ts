// Single-writer lock. Own module to keep runtime code out of the type barrel (src/types.ts)

/**
 * Runs tasks one at a time in submission order. A failing task rejects its
 * own caller only; the next task still runs.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
