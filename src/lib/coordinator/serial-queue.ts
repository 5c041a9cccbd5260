/**
 * Runs async jobs one at a time in submission order. A failing job does not
 * stop the jobs queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  enqueue<T>(job: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(job);
    this.tail = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return run;
  }

  /** Resolves once every job queued so far has settled. */
  async onIdle(): Promise<void> {
    while (this.pending > 0) {
      await this.tail;
    }
  }
}
