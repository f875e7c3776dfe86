import type { FetchConfig, ResearchConfig, SafetyConfig } from '@/config/types';
import type { CompletionOptions, Oracle, OracleHandle } from '@/models/types';
import type { HostResolver } from '@/safety/urlValidator';
import type { HttpClient, HttpRequestOptions, HttpResponse } from '@/services/http/httpClient';
import type { SearchProvider, SearchResult } from '@/services/search/types';
import { FetchFailedError } from '@/utils/errors';

export const PUBLIC_IP = '93.184.215.14';

/** Resolves every name to a public address unless overridden. */
export function fakeResolver(overrides: Record<string, string[] | Error> = {}): HostResolver {
  return async (hostname) => {
    const entry = overrides[hostname];
    if (entry instanceof Error) throw entry;
    return entry ?? [PUBLIC_IP];
  };
}

type Route = HttpResponse | Error | ((options: HttpRequestOptions) => HttpResponse | Promise<HttpResponse>);

/** In-memory web: unknown URLs answer 404. */
export class FakeHttpClient implements HttpClient {
  readonly requests: Array<{ url: string; options: HttpRequestOptions }> = [];

  constructor(private readonly routes: Record<string, Route> = {}) {}

  set(url: string, route: Route): void {
    this.routes[url] = route;
  }

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, options });
    const route = this.routes[url];
    if (route === undefined) return { status: 404, contentType: 'text/plain', body: 'not found' };
    if (route instanceof Error) throw route;
    if (typeof route === 'function') return route(options);
    return route;
  }

  requested(url: string): number {
    return this.requests.filter((r) => r.url === url).length;
  }
}

export function htmlPage(title: string, paragraph: string): HttpResponse {
  return {
    status: 200,
    contentType: 'text/html; charset=utf-8',
    body: `<html><head><title>${title}</title></head><body><nav>Home | About</nav><article><h1>${title}</h1><p>${paragraph}</p></article><footer>Footer links</footer></body></html>`,
  };
}

export function robotsTxt(body: string): HttpResponse {
  return { status: 200, contentType: 'text/plain', body };
}

export class FakeSearchProvider implements SearchProvider {
  readonly name = 'fake';
  readonly queries: string[] = [];

  constructor(private readonly results: (query: string) => SearchResult[] | Error) {}

  async search(query: string, topK: number): Promise<SearchResult[]> {
    this.queries.push(query);
    const out = this.results(query);
    if (out instanceof Error) throw out;
    return out.slice(0, topK);
  }
}

type Reply = string | Error | ((prompt: string) => string);

/**
 * Scripted oracle: the first rule whose pattern matches the prompt answers.
 * Records every call and the peak number of concurrent calls.
 */
export class FakeOracle implements OracleHandle {
  readonly prompts: string[] = [];
  readonly options: CompletionOptions[] = [];
  inFlight = 0;
  maxInFlight = 0;
  initCalls = 0;
  closeCalls = 0;

  constructor(
    private readonly rules: Array<[RegExp, Reply]> = [],
    private readonly fallback: Reply = '[]',
    private readonly delayMs = 0,
    private readonly initError?: Error,
  ) {}

  async init(): Promise<void> {
    this.initCalls++;
    if (this.initError) throw this.initError;
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      const rule = this.rules.find(([pattern]) => pattern.test(prompt));
      const reply = rule ? rule[1] : this.fallback;
      if (reply instanceof Error) throw reply;
      const text = typeof reply === 'function' ? reply(prompt) : reply;
      // streamed word by word, trailing whitespace kept with each word
      if (options.onToken) for (const token of text.match(/\S+\s*|\s+/g) ?? []) options.onToken(token);
      return text;
    } finally {
      this.inFlight--;
    }
  }
}

/** Oracle source that hands out the given oracle, or fails to load. */
export function staticModels(oracle: Oracle, error?: Error) {
  return {
    acquireCalls: 0,
    async acquire(): Promise<Oracle> {
      this.acquireCalls++;
      if (error) throw error;
      return oracle;
    },
  };
}

export function fetchConfig(overrides: Partial<FetchConfig> = {}): FetchConfig {
  return {
    timeoutMs: 1000,
    maxConcurrency: 4,
    politenessDelayMs: 0,
    maxRedirects: 3,
    maxBytes: 1_000_000,
    minContentLength: 40,
    maxContentChars: 4000,
    ...overrides,
  };
}

export function safetyConfig(overrides: Partial<SafetyConfig> = {}): SafetyConfig {
  return {
    allowedPorts: [80, 443],
    maxUrlLength: 2048,
    robotsUserAgent: 'ResearchAgent',
    robotsNegativeTtlMs: 60_000,
    ...overrides,
  };
}

export function researchConfig(overrides: Partial<ResearchConfig> = {}): ResearchConfig {
  return {
    maxIterations: 3,
    temperature: 0.6,
    subQueriesPerIteration: 2,
    includeOriginalQuery: true,
    timeBudgetMs: 300_000,
    coverage: { minWords: 100_000, minHosts: 50 },
    dedupIncludeQuery: false,
    maxContextWords: 3000,
    summarizeAboveWords: 0,
    summaryMaxWords: 250,
    historyMaxEntries: 50,
    ...overrides,
  };
}

export const unreachable = (message = 'connect ECONNREFUSED') => new FetchFailedError(message);
