export interface SearchResult {
  url: string;
  title: string;
  snippet: string;
}

/** Ranked web search. Implementations throw on network failure; callers decide how to degrade. */
export interface SearchProvider {
  readonly name: string;
  search(query: string, topK: number, signal?: AbortSignal): Promise<SearchResult[]>;
}
