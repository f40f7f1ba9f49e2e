// Runs queued tasks one at a time, in submission order. A failed task does not
// stop the ones queued behind it; its rejection reaches only its own caller.
export class Sequencer {
  private current: Promise<unknown> = Promise.resolve();

  queue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.current.then(task);
    this.current = next.catch(() => undefined);
    return next;
  }
}
