import { LRUCache } from 'lru-cache';
import type { HttpClient } from '@/services/http/httpClient';
import { componentLogger } from '@/services/logger';
import { KeyedLock } from '@/utils/keyedLock';
import { errorMessage } from '@/utils/errors';
import { ALLOW_ALL, isPathAllowed, parseRobots, type RobotsPolicy } from './robotsPolicy';
import type { UrlValidator } from './urlValidator';

const log = componentLogger('robots');

/** RFC 9309 asks crawlers to follow at least five consecutive redirects. */
export const MAX_ROBOTS_REDIRECTS = 5;

export interface RobotsCheckerOptions {
  http: HttpClient;
  timeoutMs: number;
  /** How long a failed robots.txt fetch is remembered as "allow". */
  negativeTtlMs: number;
  /** Checks every redirect hop; without one, redirects are not followed. */
  validator?: UrlValidator;
  fetchUserAgent?: string;
  signal?: AbortSignal;
  now?: () => number;
}

/**
 * Session-scoped robots.txt gate. Policies are fetched at most once per origin;
 * concurrent checks for the same origin wait on the same fetch.
 */
export class RobotsChecker {
  private readonly policies = new Map<string, RobotsPolicy>();
  /** origin → when its robots.txt last failed */
  private readonly failures = new LRUCache<string, number>({ max: 1000 });
  private readonly lock = new KeyedLock();
  private readonly now: () => number;

  constructor(private readonly options: RobotsCheckerOptions) {
    this.now = options.now ?? Date.now;
  }

  async isAllowed(url: string, userAgent: string): Promise<boolean> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    const policy = await this.policyFor(parsed.origin);
    return isPathAllowed(policy, userAgent, `${parsed.pathname}${parsed.search}`);
  }

  private recentlyFailed(origin: string): boolean {
    const failedAt = this.failures.get(origin);
    if (failedAt === undefined) return false;
    if (this.now() - failedAt < this.options.negativeTtlMs) return true;
    this.failures.delete(origin);
    return false;
  }

  private async policyFor(origin: string): Promise<RobotsPolicy> {
    const cached = this.policies.get(origin);
    if (cached) return cached;
    if (this.recentlyFailed(origin)) return ALLOW_ALL;

    return this.lock.run(origin, async () => {
      const settled = this.policies.get(origin);
      if (settled) return settled;
      if (this.recentlyFailed(origin)) return ALLOW_ALL;

      const policy = await this.fetchPolicy(origin);
      if (policy) {
        this.policies.set(origin, policy);
        return policy;
      }
      this.failures.set(origin, this.now());
      return ALLOW_ALL;
    });
  }

  private async fetchPolicy(origin: string): Promise<RobotsPolicy | null> {
    let current = `${origin}/robots.txt`;
    try {
      for (let hop = 0; hop <= MAX_ROBOTS_REDIRECTS; hop++) {
        const res = await this.options.http.get(current, {
          headers: { 'User-Agent': this.options.fetchUserAgent ?? 'Mozilla/5.0', Accept: 'text/plain' },
          timeoutMs: this.options.timeoutMs,
          signal: this.options.signal,
        });
        if (res.status >= 200 && res.status < 300) {
          log.debug('robots:fetched', { origin, from: current, bytes: res.body.length });
          return parseRobots(res.body);
        }

        const next = res.status >= 300 && res.status < 400 ? await this.nextHop(current, res.location) : null;
        if (!next) {
          // 4xx (including 404) means no restrictions; 5xx and unusable redirects are treated the same way.
          log.debug('robots:unavailable', { origin, status: res.status });
          return null;
        }
        current = next;
      }
      log.debug('robots:too_many_redirects', { origin });
      return null;
    } catch (err) {
      if (this.options.signal?.aborted) throw err;
      log.warn('robots:fetch_failed', { origin, error: errorMessage(err) });
      return null;
    }
  }

  private async nextHop(from: string, location: string | undefined): Promise<string | null> {
    if (!location || !this.options.validator) return null;
    let target: string;
    try {
      target = new URL(location, from).toString();
    } catch {
      return null;
    }
    const check = await this.options.validator.validate(target);
    if (!check.success) {
      log.info('robots:redirect_rejected', { from, to: target, reason: check.reason });
      return null;
    }
    return check.url.toString();
  }
}
