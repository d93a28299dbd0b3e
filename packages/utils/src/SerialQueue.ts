/**
 * Runs async tasks one at a time, in submission order.
 *
 * A task's failure is reported to that task's caller only; the tasks queued
 * behind it still run.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Tasks submitted and not yet settled, including the running one
   */
  get size(): number {
    return this.pending;
  }
}
