/**
 * Runs submitted tasks one at a time in submission order. Everything the
 * command queue mutates goes through a single lane, which makes each task a
 * critical section over the whole queue.
 */
export class SerialLane {
  private running = false;
  private readonly pending: Array<() => Promise<void>> = [];

  run<T>(task: () => T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push(() => Promise.resolve().then(task).then(resolve, reject));
      this.drain();
    });
  }

  get depth(): number {
    return this.pending.length + (this.running ? 1 : 0);
  }

  private drain(): void {
    if (this.running) {
      return;
    }
    const next = this.pending.shift();
    if (!next) {
      return;
    }
    this.running = true;
    void next().finally(() => {
      this.running = false;
      this.drain();
    });
  }
}
