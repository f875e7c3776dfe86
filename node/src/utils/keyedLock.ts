import pLimit, { type LimitFunction } from 'p-limit';

/**
 * Mutual exclusion per key (host, origin). Work for different keys runs
 * concurrently; work for the same key runs one at a time in arrival order.
 */
export class KeyedLock {
  private readonly gates = new Map<string, LimitFunction>();

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let gate = this.gates.get(key);
    if (!gate) {
      gate = pLimit(1);
      this.gates.set(key, gate);
    }
    const active = gate;
    return active(fn).finally(() => {
      if (active.activeCount === 0 && active.pendingCount === 0) {
        this.gates.delete(key);
      }
    });
  }

  get size(): number {
    return this.gates.size;
  }
}
