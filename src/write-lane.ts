/**
 * FlatDoc Write Lane — one writer at a time per session
 *
 * Mapping inserts, schema evolution and row writes all run through the lane,
 * in submission order. A failed task rejects its own caller only; the lane
 * keeps going.
 */

export class WriteLane {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Tasks queued or running. */
  get depth(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending--;
  }
}
