/**
 * A single reusable worker: tasks run one at a time in submission order.
 * A failing task does not stop the ones queued behind it.
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();

  submit<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.catch(() => undefined);
    return result;
  }
}
