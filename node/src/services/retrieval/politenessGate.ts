import { KeyedLock } from '@/utils/keyedLock';
import { sleep as defaultSleep, type Sleep } from '@/utils/sleep';

export interface PolitenessGateOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: Sleep;
}

/**
 * Enforces a minimum interval between request starts to the same host.
 * Callers for one host are released one at a time, spaced by the interval;
 * different hosts never wait on each other.
 */
export class PolitenessGate {
  private readonly lastRequestAt = new Map<string, number>();
  private readonly lock = new KeyedLock();
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(private readonly options: PolitenessGateOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async wait(host: string, signal?: AbortSignal): Promise<void> {
    const key = host.toLowerCase();
    await this.lock.run(key, async () => {
      const last = this.lastRequestAt.get(key);
      if (last !== undefined) {
        const remaining = last + this.options.minIntervalMs - this.now();
        if (remaining > 0) await this.sleep(remaining, signal);
      }
      this.lastRequestAt.set(key, this.now());
    });
  }
}
