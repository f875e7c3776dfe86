import { describe, expect, it } from 'vitest';
import { MAX_QUERY_LENGTH, cleanQuery, extractQueries, parseQueries } from '@/services/planner/parseQueries';

describe('extractQueries', () => {
  it('reads a JSON array or a queries object', () => {
    expect(extractQueries('["a query", "b query"]')).toEqual(['a query', 'b query']);
    expect(extractQueries('{"queries": ["x y", "z w"]}')).toEqual(['x y', 'z w']);
  });

  it('reads JSON wrapped in reasoning tags and code fences', () => {
    expect(extractQueries('<think>let me see</think>\n```json\n["alpha beta"]\n```')).toEqual(['alpha beta']);
  });

  it('accepts single-quoted arrays', () => {
    expect(extractQueries("['one two', 'three four']")).toEqual(['one two', 'three four']);
  });

  it('falls back to quoted strings', () => {
    expect(extractQueries('Try these: "first one", "second one" and more')).toEqual(['first one', 'second one']);
  });

  it('falls back to one query per line, skipping preamble', () => {
    const raw = 'Here are the queries:\n1. gutenberg press\n2) movable type\n- printing in china';
    expect(parseQueries(raw, [], 5)).toEqual(['gutenberg press', 'movable type', 'printing in china']);
  });

  it('returns nothing for empty output', () => {
    expect(extractQueries('<think>only thoughts</think>')).toEqual([]);
  });
});

describe('parseQueries', () => {
  it('drops duplicates of issued queries and of each other', () => {
    const raw = '["Printing Press", "printing  press", "new one", "NEW ONE"]';
    expect(parseQueries(raw, ['printing press'], 5)).toEqual(['new one']);
  });

  it('caps the number of queries and skips trivial ones', () => {
    expect(parseQueries('["x", "a1", "b1", "c1"]', [], 2)).toEqual(['a1', 'b1']);
  });

  it('ignores non-string JSON items', () => {
    expect(parseQueries('["ok query", 42, null]', [], 5)).toEqual(['ok query']);
  });
});

describe('cleanQuery', () => {
  it('strips list markers, quotes and trailing commas', () => {
    expect(cleanQuery('  - "quoted query",')).toBe('quoted query');
    expect(cleanQuery('(3) third   item')).toBe('third item');
  });

  it('shortens long queries at a word boundary', () => {
    const q = cleanQuery('word '.repeat(60));
    expect(q.length).toBeLessThanOrEqual(MAX_QUERY_LENGTH);
    expect(q).toBe(Array(40).fill('word').join(' '));
  });
});
