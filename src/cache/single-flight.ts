/**
 * Keyed single-flight with double-checked lookup.
 *
 * At most one load runs per key. Callers that arrive while a load is in
 * flight await the same promise, so they observe the same value or the same
 * rejection. The slot is released once the load settles, so a failure is
 * never cached and the next caller starts a fresh load.
 *
 * The check/insert on the in-flight map happens synchronously between
 * awaits, which makes the event loop the lock: no two loads for one key can
 * start concurrently.
 */
export class SingleFlight<K, V> {
  private readonly inFlight = new Map<K, Promise<V>>();

  /**
   * Returns the cached value when `lookup` finds one, otherwise runs `load`
   * once for all concurrent callers.
   *
   * `lookup` is consulted twice: before joining a flight, and again when a
   * new flight starts, in case a value landed while the caller was
   * suspended.
   */
  async run(key: K, lookup: () => V | undefined, load: () => Promise<V> | V): Promise<V> {
    const cached = lookup();
    if (cached !== undefined) {
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    // The slot is registered before `load` runs, even when it throws
    // synchronously, and only the flight that owns the slot releases it.
    const flight: Promise<V> = Promise.resolve()
      .then(() => {
        const rechecked = lookup();
        return rechecked !== undefined ? rechecked : load();
      })
      .finally(() => {
        if (this.inFlight.get(key) === flight) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, flight);
    return flight;
  }

  /** Whether a load for `key` is currently running. */
  isInFlight(key: K): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }
}
