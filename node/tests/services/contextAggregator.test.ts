import { describe, expect, it } from 'vitest';
import {
  corpus,
  coverage,
  meetsThreshold,
  merge,
  normalizeUrl,
  summarizeCorpus,
} from '@/services/context/contextAggregator';
import { source } from '../helpers/sources';

describe('normalizeUrl', () => {
  it('drops fragment, query, default port and trailing slash', () => {
    expect(normalizeUrl('HTTPS://WWW.Example.com:443/a/b/?x=1#frag')).toBe('https://www.example.com/a/b');
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
  });

  it('keeps the query when asked to and non-default ports always', () => {
    expect(normalizeUrl('https://example.com/a?x=1#f', { includeQuery: true })).toBe('https://example.com/a?x=1');
    expect(normalizeUrl('http://example.com:8080/a')).toBe('http://example.com:8080/a');
  });

  it('keys unparseable input by its trimmed text', () => {
    expect(normalizeUrl('  not a url ')).toBe('not a url');
  });
});

describe('merge', () => {
  it('keeps the first copy of a page and numbers usable sources in order', () => {
    const first = merge([], [source('https://a.example/x'), source('https://b.example/y', 'BLOCKED_ROBOTS')]);
    expect(first.map((s) => s.citationIndex)).toEqual([1, undefined]);

    const second = merge(first, [
      source('https://a.example/x/#again', 'OK', 'duplicate text'),
      source('https://c.example/z'),
      source('https://d.example/w', 'EMPTY'),
      source('https://e.example/v'),
    ]);

    expect(second.map((s) => [s.url, s.citationIndex])).toEqual([
      ['https://a.example/x', 1],
      ['https://b.example/y', undefined],
      ['https://c.example/z', 2],
      ['https://d.example/w', undefined],
      ['https://e.example/v', 3],
    ]);
    expect(second[0].extractedText).toBe('Text about https://a.example/x');
    expect(first).toHaveLength(2);
  });

  it('clears text on sources that are not usable', () => {
    const merged = merge([], [{ ...source('https://a.example/x', 'FETCH_ERROR'), extractedText: 'leftover' }]);
    expect(merged[0].extractedText).toBe('');
    expect(merged[0].citationIndex).toBeUndefined();
  });

  it('treats query strings as distinct pages only when configured', () => {
    const incoming = [source('https://a.example/p?id=1'), source('https://a.example/p?id=2')];
    expect(merge([], incoming)).toHaveLength(1);
    expect(merge([], incoming, { includeQuery: true })).toHaveLength(2);
  });
});

describe('corpus and coverage', () => {
  const sources = merge(
    [],
    [
      source('https://www.a.example/1', 'OK', 'one two three'),
      source('https://a.example/2', 'OK', 'four five'),
      source('https://b.example/3', 'OK', 'six'),
      source('https://c.example/4', 'BLOCKED_URL'),
    ],
  );

  it('lists only usable sources with their citation index', () => {
    expect(corpus(sources)).toEqual([
      { index: 1, url: 'https://www.a.example/1', title: 'Title https://www.a.example/1', text: 'one two three' },
      { index: 2, url: 'https://a.example/2', title: 'Title https://a.example/2', text: 'four five' },
      { index: 3, url: 'https://b.example/3', title: 'Title https://b.example/3', text: 'six' },
    ]);
  });

  it('counts words and distinct hosts, ignoring www', () => {
    const signal = coverage(sources);
    expect(signal).toEqual({ usableSources: 3, totalWords: 6, distinctHosts: 2 });
    expect(meetsThreshold(signal, { minWords: 6, minHosts: 2 })).toBe(true);
    expect(meetsThreshold(signal, { minWords: 7, minHosts: 2 })).toBe(false);
    expect(meetsThreshold(signal, { minWords: 6, minHosts: 3 })).toBe(false);
  });

  it('summarizes the corpus for the planner', () => {
    expect(summarizeCorpus([])).toBe('(no sources retrieved yet)');
    expect(summarizeCorpus(corpus(sources), 4)).toBe(
      [
        '[1] Title https://www.a.example/1: one ...',
        '[2] Title https://a.example/2: four...',
        '[3] Title https://b.example/3: six',
      ].join('\n'),
    );
  });
});
