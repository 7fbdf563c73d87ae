/**
 * Compute-once cell. The first caller's pending promise is shared, so concurrent first
 * callers trigger a single computation. A rejected computation is forgotten and the
 * next caller starts over.
 */
export class OnceCell<T> {
  private pending: Promise<T> | null = null;

  private settled: { value: T } | null = null;

  get(init: () => Promise<T>): Promise<T> {
    if (this.settled) {
      return Promise.resolve(this.settled.value);
    }

    if (!this.pending) {
      this.pending = init().then(
        (value) => {
          this.settled = { value };
          return value;
        },
        (error: unknown) => {
          this.pending = null;
          throw error;
        }
      );
    }

    return this.pending;
  }

  /** The computed value, or undefined while nothing has completed. */
  peek(): T | undefined {
    return this.settled?.value;
  }

  isSet(): boolean {
    return this.settled !== null;
  }
}
