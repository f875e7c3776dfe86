import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createSearchProvider } from '@/services/search';
import { DuckDuckGoSearchProvider } from '@/services/search/duckduckgoService';
import { SearxngSearchProvider } from '@/services/search/searxngService';
import { CancelledError } from '@/utils/errors';

const mocks = vi.hoisted(() => ({ get: vi.fn(), duck: vi.fn() }));

vi.mock('axios', () => ({ default: { get: mocks.get } }));
vi.mock('duck-duck-scrape', () => ({ SafeSearchType: { MODERATE: -1 }, search: mocks.duck }));

describe('SearxngSearchProvider', () => {
  beforeEach(() => {
    mocks.get.mockReset();
  });

  it('queries the JSON API and maps results', async () => {
    mocks.get.mockResolvedValue({
      data: {
        results: [
          { title: 'Gutenberg', url: 'https://a.example/g', content: 'Movable type' },
          { url: 'https://b.example/h' },
          { title: 'Third', url: 'https://c.example/i' },
        ],
      },
    });

    const provider = new SearxngSearchProvider('http://searx.test/', 1000);
    const results = await provider.search('printing press', 2);

    expect(results).toEqual([
      { url: 'https://a.example/g', title: 'Gutenberg', snippet: 'Movable type' },
      { url: 'https://b.example/h', title: '', snippet: '' },
    ]);
    expect(mocks.get).toHaveBeenCalledWith(
      'http://searx.test/search?format=json&q=printing+press&categories=general',
      { timeout: 1000, signal: undefined },
    );
  });

  it('refuses to run without a configured URL', async () => {
    await expect(new SearxngSearchProvider('', 1000).search('q', 5)).rejects.toThrow('SearXNG URL not configured');
  });

  it('rejects malformed responses', async () => {
    mocks.get.mockResolvedValue({ data: { results: [{ title: 'no url' }] } });
    await expect(new SearxngSearchProvider('http://searx.test', 1000).search('q', 5)).rejects.toThrow();
  });
});

describe('DuckDuckGoSearchProvider', () => {
  beforeEach(() => {
    mocks.duck.mockReset();
  });

  it('maps results and strips markup from titles and snippets', async () => {
    mocks.duck.mockResolvedValue({
      noResults: false,
      results: [
        { url: 'https://a.example/g', title: '<b>Gutenberg</b> &amp; press', description: 'It&#39;s old' },
        { url: 'https://b.example/h', title: 'Second', description: '' },
      ],
    });

    const results = await new DuckDuckGoSearchProvider(1000).search('gutenberg', 1);
    expect(results).toEqual([{ url: 'https://a.example/g', title: 'Gutenberg & press', snippet: "It's old" }]);
  });

  it('returns nothing when the engine has no results', async () => {
    mocks.duck.mockResolvedValue({ noResults: true, results: [] });
    await expect(new DuckDuckGoSearchProvider(1000).search('zzzz', 5)).resolves.toEqual([]);
  });

  it('does not search once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(new DuckDuckGoSearchProvider(1000).search('q', 5, controller.signal)).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(mocks.duck).not.toHaveBeenCalled();
  });

  it('gives the scraper request timeouts', async () => {
    mocks.duck.mockResolvedValue({ noResults: true, results: [] });
    await new DuckDuckGoSearchProvider(2500).search('gutenberg', 5);
    expect(mocks.duck).toHaveBeenCalledWith(
      'gutenberg',
      { safeSearch: -1 },
      { open_timeout: 2500, response_timeout: 2500 },
    );
  });

  it('stops waiting for a search that is cancelled mid-flight', async () => {
    mocks.duck.mockReturnValue(new Promise(() => {}));
    const controller = new AbortController();

    const pending = new DuckDuckGoSearchProvider(1000).search('q', 5, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('createSearchProvider', () => {
  it('picks the configured provider', () => {
    expect(createSearchProvider({ provider: 'duckduckgo', searxngURL: '', topK: 5 }, 1000).name).toBe('duckduckgo');
    expect(createSearchProvider({ provider: 'searxng', searxngURL: 'http://s.test', topK: 5 }, 1000).name).toBe(
      'searxng',
    );
  });
});
