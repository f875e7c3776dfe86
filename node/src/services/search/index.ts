import type { SearchConfig } from '@/config/types';
import { DuckDuckGoSearchProvider } from './duckduckgoService';
import { SearxngSearchProvider } from './searxngService';
import type { SearchProvider } from './types';

export type { SearchProvider, SearchResult } from './types';

export function createSearchProvider(config: SearchConfig, timeoutMs: number): SearchProvider {
  switch (config.provider) {
    case 'searxng':
      return new SearxngSearchProvider(config.searxngURL, timeoutMs);
    case 'duckduckgo':
      return new DuckDuckGoSearchProvider(timeoutMs);
  }
}
