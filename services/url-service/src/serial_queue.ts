/**
 * Runs tasks one at a time, in submission order.
 * A failing task rejects its own promise and does not stall the ones behind it.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // the caller observes the failure through `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
