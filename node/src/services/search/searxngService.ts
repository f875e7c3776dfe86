/**
 * SearXNG Search Service
 * JSON API of a self-hosted SearXNG instance.
 */

import axios from 'axios';
import { z } from 'zod';
import type { SearchProvider, SearchResult } from './types';

interface SearxngSearchOptions {
  categories?: string[];
  engines?: string[];
  language?: string;
  pageno?: number;
}

const searxngResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(''),
        url: z.string(),
        content: z.string().optional(),
      }),
    )
    .default([]),
  suggestions: z.array(z.string()).default([]),
});

export class SearxngSearchProvider implements SearchProvider {
  readonly name = 'searxng';

  constructor(
    private readonly baseURL: string,
    private readonly timeoutMs: number,
    private readonly opts: SearxngSearchOptions = { categories: ['general'] },
  ) {}

  async search(query: string, topK: number, signal?: AbortSignal): Promise<SearchResult[]> {
    if (!this.baseURL) {
      throw new Error('SearXNG URL not configured');
    }

    const url = new URL(`${this.baseURL.replace(/\/+$/, '')}/search`);
    url.searchParams.append('format', 'json');
    url.searchParams.append('q', query);

    for (const [key, value] of Object.entries(this.opts)) {
      if (Array.isArray(value)) {
        url.searchParams.append(key, value.join(','));
      } else if (value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    }

    const res = await axios.get<unknown>(url.toString(), { timeout: this.timeoutMs, signal });
    const data = searxngResponseSchema.parse(res.data);

    return data.results.slice(0, topK).map((r) => ({
      url: r.url,
      title: r.title,
      snippet: r.content ?? '',
    }));
  }
}
