/**
 * Promise-chained lock: callers run one at a time, in the order they asked.
 * A failing section does not poison the chain for the next caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
