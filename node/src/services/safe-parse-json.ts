/**
 * Shared JSON parse for model output: strips reasoning tags and markdown fences,
 * then tries the text as-is, with single quotes normalized, and finally the
 * first bracketed span embedded in surrounding prose.
 * Used by the query planner.
 */
import { componentLogger } from '@/services/logger';
import { cleanModelOutput } from '@/utils/cleanModelOutput';

const log = componentLogger('json');

function tryParse(txt: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(txt) };
  } catch {
    return { ok: false };
  }
}

function embeddedSpan(txt: string): string | undefined {
  const start = txt.search(/[[{]/);
  if (start === -1) return undefined;
  const close = txt[start] === '[' ? ']' : '}';
  const end = txt.lastIndexOf(close);
  return end > start ? txt.slice(start, end + 1) : undefined;
}

export function safeParseJson(raw: string, context: string): unknown {
  const txt = cleanModelOutput(raw);
  const candidates = [txt, txt.replace(/'/g, '"')];
  const span = embeddedSpan(txt);
  if (span && span !== txt) candidates.push(span, span.replace(/'/g, '"'));

  for (const candidate of candidates) {
    const parsed = tryParse(candidate);
    if (parsed.ok) return parsed.value;
  }

  log.debug('safeParseJson:parse_error', { context, raw: txt.slice(0, 300) });
  return undefined;
}
