/**
 * Runs tasks one at a time in submission order. Each task runs to completion
 * before the next starts, so a task never sees another's partial writes.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private depth = 0;

  get size(): number {
    return this.depth;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.depth += 1;
    const result = this.tail.then(task).finally(() => {
      this.depth -= 1;
    });
    // The caller observes failures through `result`; the chain itself keeps going.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  idle(): Promise<void> {
    return this.tail.then(() => undefined);
  }
}
