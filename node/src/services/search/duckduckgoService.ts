import { SafeSearchType, search as duckSearch } from 'duck-duck-scrape';
import { CancelledError } from '@/utils/errors';
import type { SearchProvider, SearchResult } from './types';

function stripTags(html: string): string {
  return html
    .replace(/<[^>]*>/g, '')
    .replace(/&amp;/g, '&')
    .replace(/&quot;/g, '"')
    .replace(/&#x27;|&#39;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .trim();
}

/** The scraper takes no signal, so an abort settles the wait instead of the request. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

export class DuckDuckGoSearchProvider implements SearchProvider {
  readonly name = 'duckduckgo';

  constructor(private readonly timeoutMs: number) {}

  async search(query: string, topK: number, signal?: AbortSignal): Promise<SearchResult[]> {
    if (signal?.aborted) throw new CancelledError();
    const request = duckSearch(
      query,
      { safeSearch: SafeSearchType.MODERATE },
      { open_timeout: this.timeoutMs, response_timeout: this.timeoutMs },
    );
    const response = await (signal ? raceAbort(request, signal) : request);
    if (response.noResults) return [];

    return response.results.slice(0, topK).map((r) => ({
      url: r.url,
      title: stripTags(r.title),
      snippet: stripTags(r.description),
    }));
  }
}
