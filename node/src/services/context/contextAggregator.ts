import type { CorpusEntry, CoverageSignal, Source } from '@/types/core';
import type { CoverageThreshold } from '@/config/types';
import { countWords } from '@/services/extraction/contentExtractor';

export interface NormalizeOptions {
  /** Keep the query string as part of the identity of a page. */
  includeQuery?: boolean;
}

const DEFAULT_PORTS: Record<string, string> = { 'http:': '80', 'https:': '443' };

/**
 * Identity key for a page: lower-cased scheme and host, default port dropped,
 * path without a trailing slash, fragment dropped and the query dropped unless
 * includeQuery is set. Unparseable input is keyed by its trimmed text.
 */
export function normalizeUrl(raw: string, options: NormalizeOptions = {}): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return raw.trim();
  }

  const protocol = url.protocol.toLowerCase();
  const port = url.port && url.port !== DEFAULT_PORTS[protocol] ? `:${url.port}` : '';
  const path = url.pathname.replace(/\/+$/, '');
  const query = options.includeQuery && url.search ? url.search : '';

  return `${protocol}//${url.hostname.toLowerCase()}${port}${path}${query}`;
}

/**
 * Appends incoming sources to the session's list. A source whose normalized
 * URL is already present is dropped (first seen wins). OK sources receive the
 * next citation index as they enter; existing entries are never touched.
 */
export function merge(existing: Source[], incoming: Source[], options: NormalizeOptions = {}): Source[] {
  const seen = new Set(existing.map((s) => normalizeUrl(s.url, options)));
  let nextIndex = existing.reduce((max, s) => Math.max(max, s.citationIndex ?? 0), 0) + 1;
  const merged = [...existing];

  for (const source of incoming) {
    const key = normalizeUrl(source.url, options);
    if (seen.has(key)) continue;
    seen.add(key);

    if (source.fetchStatus === 'OK' && source.extractedText) {
      merged.push({ ...source, citationIndex: nextIndex++ });
    } else {
      merged.push({ ...source, extractedText: '', citationIndex: undefined });
    }
  }

  return merged;
}

/** Usable sources in retrieval order, keyed by their citation index. */
export function corpus(sources: Source[]): CorpusEntry[] {
  const entries: CorpusEntry[] = [];
  for (const s of sources) {
    if (s.fetchStatus !== 'OK' || s.citationIndex === undefined || !s.extractedText) continue;
    entries.push({ index: s.citationIndex, url: s.url, title: s.title, text: s.extractedText });
  }
  return entries;
}

function hostOf(url: string): string | undefined {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return undefined;
  }
}

export function coverage(sources: Source[]): CoverageSignal {
  const entries = corpus(sources);
  const hosts = new Set<string>();
  let totalWords = 0;
  for (const entry of entries) {
    totalWords += countWords(entry.text);
    const host = hostOf(entry.url);
    if (host) hosts.add(host);
  }
  return { usableSources: entries.length, totalWords, distinctHosts: hosts.size };
}

export function meetsThreshold(signal: CoverageSignal, threshold: CoverageThreshold): boolean {
  return signal.totalWords >= threshold.minWords && signal.distinctHosts >= threshold.minHosts;
}

/** Short digest of the corpus used by the planner to propose follow-up queries. */
export function summarizeCorpus(entries: CorpusEntry[], maxCharsPerEntry = 300): string {
  if (entries.length === 0) return '(no sources retrieved yet)';
  return entries
    .map((e) => {
      const excerpt = e.text.length > maxCharsPerEntry ? `${e.text.slice(0, maxCharsPerEntry)}...` : e.text;
      return `[${e.index}] ${e.title}: ${excerpt}`;
    })
    .join('\n');
}
