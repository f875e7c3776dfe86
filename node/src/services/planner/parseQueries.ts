import { z } from 'zod';
import { safeParseJson } from '@/services/safe-parse-json';
import { cleanModelOutput } from '@/utils/cleanModelOutput';

export const MAX_QUERY_LENGTH = 200;

const queryListSchema = z.union([
  z.array(z.unknown()),
  z.object({ queries: z.array(z.unknown()) }).transform((o) => o.queries),
]);

/** Case- and whitespace-insensitive identity used for deduplication. */
export function queryKey(query: string): string {
  return query.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function cleanQuery(raw: string): string {
  let q = raw
    .replace(/^\s*(?:[-*•]|\d+[.)]|\(\d+\))\s*/, '')
    .replace(/\s+/g, ' ')
    .trim();
  q = q.replace(/,$/, '').trim();
  q = q.replace(/^["'`]+|["'`]+$/g, '').trim();
  if (q.length > MAX_QUERY_LENGTH) {
    const cut = q.slice(0, MAX_QUERY_LENGTH);
    const lastSpace = cut.lastIndexOf(' ');
    q = lastSpace > 0 ? cut.slice(0, lastSpace) : cut;
  }
  return q;
}

function fromJson(text: string): string[] {
  const parsed = queryListSchema.safeParse(safeParseJson(text, 'planner'));
  if (!parsed.success) return [];
  return parsed.data.filter((v): v is string => typeof v === 'string');
}

function fromQuotes(text: string): string[] {
  return Array.from(text.matchAll(/"([^"\n]+)"/g), (m) => m[1]);
}

function isPreamble(line: string): boolean {
  return /:\s*$/.test(line) || /^(here (are|is)|sure\b|json output)/i.test(line);
}

function fromLines(text: string): string[] {
  return text
    .split(/[\n;]/)
    .map((line) => line.trim())
    .filter((line) => line && !isPreamble(line) && !/^[[\]{}]+$/.test(line));
}

/**
 * Raw query candidates from model output, tried in order: a JSON array (or
 * {"queries": [...]}), double-quoted strings, then one query per line.
 */
export function extractQueries(raw: string): string[] {
  const text = cleanModelOutput(raw);
  if (!text) return [];

  const json = fromJson(text);
  if (json.length > 0) return json;

  const quoted = fromQuotes(text);
  if (quoted.length > 0) return quoted;

  return fromLines(text);
}

/**
 * Usable queries from model output: cleaned, deduplicated against each other
 * and against everything already issued, at most `max` of them.
 */
export function parseQueries(raw: string, issued: Iterable<string>, max: number): string[] {
  const seen = new Set(Array.from(issued, queryKey));
  const out: string[] = [];

  for (const candidate of extractQueries(raw)) {
    if (out.length >= max) break;
    const q = cleanQuery(candidate);
    const key = queryKey(q);
    if (q.length < 2 || seen.has(key)) continue;
    seen.add(key);
    out.push(q);
  }

  return out;
}
