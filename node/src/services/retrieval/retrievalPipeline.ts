import pLimit, { type LimitFunction } from 'p-limit';
import type { FetchConfig, SafetyConfig } from '@/config/types';
import type { FetchStatus, Source, SubQuery } from '@/types/core';
import { RobotsChecker } from '@/safety/robotsChecker';
import { UrlValidator, type HostResolver } from '@/safety/urlValidator';
import {
  extractContent,
  isHtmlContentType,
  truncateText,
} from '@/services/extraction/contentExtractor';
import type { HttpClient, HttpResponse } from '@/services/http/httpClient';
import { componentLogger } from '@/services/logger';
import type { SearchProvider, SearchResult } from '@/services/search/types';
import { CancelledError, FetchFailedError, errorMessage, throwIfAborted } from '@/utils/errors';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import { PolitenessGate } from './politenessGate';

const log = componentLogger('retrieval');

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_5) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:127.0) Gecko/20100101 Firefox/127.0',
  'Mozilla/5.0 (iPhone; CPU iPhone OS 17_5 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Mobile/15E148 Safari/604.1',
];

/** Runs one sub-query end to end. */
export interface Retriever {
  run(subquery: SubQuery): Promise<Source[]>;
}

/** Per-run state handed to the pipeline by the orchestration loop. */
export interface RetrievalScope {
  signal?: AbortSignal;
  /** Returns false when the URL was already taken by this run. */
  claim?: (url: string) => boolean;
  onSource?: (source: Source) => void;
}

export type RetrieverFactory = (scope: RetrievalScope) => Retriever;

export interface RetrievalPipelineOptions {
  search: SearchProvider;
  http: HttpClient;
  topK: number;
  fetch: FetchConfig;
  safety: SafetyConfig;
  resolve?: HostResolver;
  userAgents?: string[];
  now?: () => Date;
  /** Injected for tests; defaults to a PolitenessGate with fetch.politenessDelayMs. */
  politeness?: PolitenessGate;
}

type PageOutcome =
  | { kind: 'page'; response: HttpResponse; finalUrl: string }
  | { kind: 'blocked'; status: FetchStatus; detail: string };

/**
 * search → validate → robots → polite, capped fetch → extract.
 * One pipeline instance is one research run: the robots cache, politeness
 * state and concurrency cap are shared by every sub-query of that run.
 */
export class RetrievalPipeline implements Retriever {
  private readonly validator: UrlValidator;
  private readonly robots: RobotsChecker;
  private readonly politeness: PolitenessGate;
  private readonly limit: LimitFunction;
  private readonly userAgents: string[];
  private readonly claimed = new Set<string>();
  private readonly now: () => Date;
  private uaCursor = 0;

  constructor(
    private readonly options: RetrievalPipelineOptions,
    private readonly scope: RetrievalScope = {},
  ) {
    this.validator = new UrlValidator({
      allowedPorts: options.safety.allowedPorts,
      maxUrlLength: options.safety.maxUrlLength,
      resolve: options.resolve,
    });
    this.userAgents = options.userAgents?.length ? options.userAgents : USER_AGENTS;
    this.robots = new RobotsChecker({
      http: options.http,
      timeoutMs: options.fetch.timeoutMs,
      negativeTtlMs: options.safety.robotsNegativeTtlMs,
      validator: this.validator,
      fetchUserAgent: this.userAgents[0],
      signal: scope.signal,
    });
    this.politeness = options.politeness ?? new PolitenessGate({ minIntervalMs: options.fetch.politenessDelayMs });
    this.limit = pLimit(options.fetch.maxConcurrency);
    this.now = options.now ?? (() => new Date());
  }

  async run(subquery: SubQuery): Promise<Source[]> {
    throwIfAborted(this.scope.signal);

    const results = await this.searchCandidates(subquery.text);
    const candidates = results.filter((r) => this.claim(r.url));
    log.info('retrieval:candidates', {
      subquery: subquery.text,
      found: results.length,
      fresh: candidates.length,
    });

    return Promise.all(
      candidates.map(async (candidate) => {
        const source = await this.processCandidate(candidate, subquery);
        this.scope.onSource?.(source);
        return source;
      }),
    );
  }

  private async searchCandidates(query: string): Promise<SearchResult[]> {
    const { signal } = this.scope;
    try {
      const results = await retryWithBackoff(() => this.options.search.search(query, this.options.topK, signal), {
        maxRetries: 1,
        initialDelay: 500,
        signal,
        label: `search:${this.options.search.name}`,
      });
      return results.filter((r) => r.url).slice(0, this.options.topK);
    } catch (err) {
      if (err instanceof CancelledError || signal?.aborted) throw new CancelledError();
      log.warn('retrieval:search_failed', { query, provider: this.options.search.name, error: errorMessage(err) });
      return [];
    }
  }

  private claim(url: string): boolean {
    if (this.scope.claim) return this.scope.claim(url);
    if (this.claimed.has(url)) return false;
    this.claimed.add(url);
    return true;
  }

  private nextUserAgent(): string {
    const ua = this.userAgents[this.uaCursor % this.userAgents.length];
    this.uaCursor++;
    return ua;
  }

  private async processCandidate(candidate: SearchResult, subquery: SubQuery): Promise<Source> {
    const make = (status: FetchStatus, extra: Partial<Source> = {}): Source => ({
      url: candidate.url,
      title: candidate.title || candidate.url,
      extractedText: '',
      fetchStatus: status,
      retrievedAt: this.now().toISOString(),
      originSubquery: subquery.text,
      ...extra,
    });

    try {
      const outcome = await this.fetchPage(candidate.url);
      if (outcome.kind === 'blocked') {
        log.info('retrieval:blocked', { url: candidate.url, status: outcome.status, detail: outcome.detail });
        return make(outcome.status, { detail: outcome.detail });
      }

      const { response } = outcome;
      if (response.status < 200 || response.status >= 300) {
        return make('FETCH_ERROR', { detail: `HTTP ${response.status}` });
      }
      if (!isHtmlContentType(response.contentType)) {
        return make('FETCH_ERROR', { detail: `Unsupported content type ${response.contentType || 'unknown'}` });
      }

      const extracted = extractContent(response.body);
      const title = extracted.title || candidate.title || candidate.url;
      if (extracted.text.length < this.options.fetch.minContentLength) {
        return make('EMPTY', { title, detail: `Extracted ${extracted.text.length} characters` });
      }

      log.debug('retrieval:extracted', { url: candidate.url, words: extracted.wordCount });
      return make('OK', {
        title,
        extractedText: truncateText(extracted.text, this.options.fetch.maxContentChars),
      });
    } catch (err) {
      if (err instanceof CancelledError || this.scope.signal?.aborted) throw new CancelledError();
      const detail = err instanceof FetchFailedError ? err.message : `Unexpected failure: ${errorMessage(err)}`;
      log.warn('retrieval:fetch_failed', { url: candidate.url, error: detail });
      return make('FETCH_ERROR', { detail });
    }
  }

  /** Follows redirects manually so every hop passes validation and robots. */
  private async fetchPage(startUrl: string): Promise<PageOutcome> {
    const { signal } = this.scope;
    const userAgent = this.nextUserAgent();
    let current = startUrl;

    for (let hop = 0; hop <= this.options.fetch.maxRedirects; hop++) {
      const check = await this.validator.validate(current);
      if (!check.success) {
        // DNS failure is a fetch failure, not a policy rejection.
        const status: FetchStatus = check.reason === 'unresolvable' ? 'FETCH_ERROR' : 'BLOCKED_URL';
        return { kind: 'blocked', status, detail: check.message };
      }

      const allowed = await this.limit(() => this.robots.isAllowed(current, this.options.safety.robotsUserAgent));
      if (!allowed) {
        return { kind: 'blocked', status: 'BLOCKED_ROBOTS', detail: 'Disallowed by robots.txt' };
      }

      const url = current;
      // the per-host interval is measured from when the request really starts,
      // so it is waited out inside the concurrency slot
      const response = await this.limit(async () => {
        await this.politeness.wait(check.url.host, signal);
        throwIfAborted(signal);
        return this.options.http.get(url, {
          headers: {
            'User-Agent': userAgent,
            Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.5',
            'Accept-Language': 'en-US,en;q=0.8',
          },
          timeoutMs: this.options.fetch.timeoutMs,
          signal,
        });
      });

      const isRedirect = response.status >= 300 && response.status < 400 && response.location;
      if (!isRedirect || !response.location) {
        return { kind: 'page', response, finalUrl: current };
      }
      current = new URL(response.location, current).toString();
    }

    throw new FetchFailedError(`More than ${this.options.fetch.maxRedirects} redirects`);
  }
}

export function createRetrieverFactory(options: RetrievalPipelineOptions): RetrieverFactory {
  return (scope) => new RetrievalPipeline(options, scope);
}
