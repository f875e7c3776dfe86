import { describe, expect, it } from 'vitest';
import { SessionHistory } from '@/memory/sessionHistory';
import type { Report } from '@/types/core';

function report(query: string, summary = `Summary of ${query}`): Report {
  return {
    query,
    summary,
    findings: [],
    conclusion: '',
    body: `## Executive Summary\n\n${summary}`,
    citations: [],
    offline: false,
    iterations: 1,
    generatedAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('SessionHistory', () => {
  it('stores reports under the given id and lists newest first', () => {
    const history = new SessionHistory(10, () => new Date('2026-02-03T04:05:06.000Z'));
    history.add(report('first'), 'id-1');
    history.add(report('second'), 'id-2');

    expect(history.get('id-1')).toEqual({
      id: 'id-1',
      query: 'first',
      report: report('first'),
      createdAt: '2026-02-03T04:05:06.000Z',
    });
    expect(history.list().map((e) => e.id)).toEqual(['id-2', 'id-1']);
    expect(history.get('missing')).toBeUndefined();
  });

  it('generates ids when none are given', () => {
    const history = new SessionHistory();
    const entry = history.add(report('q'));
    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('evicts the oldest entries beyond its capacity', () => {
    const history = new SessionHistory(2);
    history.add(report('a'), 'a');
    history.add(report('b'), 'b');
    history.add(report('c'), 'c');
    expect(history.size).toBe(2);
    expect(history.get('a')).toBeUndefined();
  });

  it('returns recent turns oldest first, falling back to the body', () => {
    const history = new SessionHistory();
    history.add(report('a'), 'a');
    history.add(report('b', ''), 'b');
    history.add(report('c'), 'c');

    expect(history.recentTurns(2)).toEqual([
      { query: 'b', answer: '## Executive Summary\n\n' },
      { query: 'c', answer: 'Summary of c' },
    ]);
    history.clear();
    expect(history.recentTurns(3)).toEqual([]);
  });

  it('drops citation markers from earlier answers', () => {
    const history = new SessionHistory();
    history.add(report('press', 'Gutenberg printed in Mainz [Source 2] around 1440 [1, 3].'), 'press');
    expect(history.recentTurns(1)).toEqual([{ query: 'press', answer: 'Gutenberg printed in Mainz around 1440.' }]);
  });
});
