/**
 * Promise-chained mutual exclusion. Callers queue in arrival order and each
 * section starts only after the previous one settles.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    let unlock: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => released);

    await previous;
    try {
      return await section();
    } finally {
      unlock();
    }
  }
}
