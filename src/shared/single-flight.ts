/**
 * Coalesces concurrent calls into one in-flight operation.
 *
 * While an operation started by `run()` is pending, further `run()` calls
 * return the same promise instead of starting a new one.  Once it settles
 * the next call starts fresh.
 */
export class SingleFlight<T> {
  private inflight: Promise<T> | null = null;

  get pending(): boolean {
    return this.inflight !== null;
  }

  run(operation: () => Promise<T>): Promise<T> {
    if (this.inflight) return this.inflight;

    const current = (async () => operation())().finally(() => {
      if (this.inflight === current) this.inflight = null;
    });
    this.inflight = current;
    return current;
  }
}
