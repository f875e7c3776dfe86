import type { Oracle } from '@/models/types';
import { countWords } from '@/services/extraction/contentExtractor';
import { componentLogger } from '@/services/logger';
import {
  buildOfflineReportPrompt,
  buildReportPrompt,
  buildSummaryPrompt,
  type HistoryTurn,
} from '@/services/prompt-templates';
import type { Citation, CorpusEntry, DetailLevel, Report } from '@/types/core';
import { cleanModelOutput } from '@/utils/cleanModelOutput';
import { CancelledError, OracleUnavailableError, errorMessage } from '@/utils/errors';
import { verifyCitations } from './citations';
import { parseSections, type ReportSections } from './sections';

const log = componentLogger('synthesizer');

export const OFFLINE_NOTICE = 'No external sources consulted (offline mode).';
export const NO_SOURCES_NOTICE = 'No sources could be retrieved for this query.';

const HISTORY_TURNS = 3;
const HISTORY_ANSWER_WORDS = 150;
const MIN_WORDS_PER_SOURCE = 50;
const SUMMARY_TEMPERATURE = 0.3;

export interface SynthesisInput {
  userQuery: string;
  entries: CorpusEntry[];
  detailLevel: DetailLevel;
  offline: boolean;
  iterations: number;
  history?: HistoryTurn[];
}

export interface SynthesizerOptions {
  temperature: number;
  maxTokens: number;
  /** Word budget shared by source text and conversation history. */
  maxContextWords: number;
  /** Sources above this many words are summarized first; 0 or unset leaves them as they are. */
  summarizeAboveWords?: number;
  summaryMaxWords?: number;
  /** Receives the report text as the model streams it. */
  onToken?: (text: string) => void;
  signal?: AbortSignal;
  now?: () => Date;
}

function firstWords(text: string, n: number): string {
  const words = text.trim().split(/\s+/);
  return words.length <= n ? text.trim() : `${words.slice(0, n).join(' ')}...`;
}

/**
 * Fits history and sources into the word budget. Recent history comes first;
 * the rest is split evenly between sources and entries that no longer fit are
 * left out (and so cannot be cited).
 */
export function fitContext(
  entries: CorpusEntry[],
  history: HistoryTurn[],
  maxWords: number,
): { entries: CorpusEntry[]; history: HistoryTurn[] } {
  const turns = history.slice(-HISTORY_TURNS).map((h) => ({
    query: h.query,
    answer: firstWords(h.answer, HISTORY_ANSWER_WORDS),
  }));
  let budget = maxWords - turns.reduce((sum, t) => sum + countWords(t.query) + countWords(t.answer), 0);

  const perEntry = Math.max(MIN_WORDS_PER_SOURCE, Math.floor(budget / Math.max(entries.length, 1)));
  const fitted: CorpusEntry[] = [];
  for (const entry of entries) {
    if (budget < MIN_WORDS_PER_SOURCE) break;
    const text = firstWords(entry.text, Math.min(perEntry, budget));
    budget -= countWords(text);
    fitted.push({ ...entry, text });
  }
  return { entries: fitted, history: turns };
}

export function renderBody(sections: ReportSections): string {
  return [
    '## Executive Summary',
    '',
    sections.summary,
    '',
    '## Detailed Findings',
    '',
    ...sections.findings.map((f) => `- ${f}`),
    '',
    '## Conclusion',
    '',
    sections.conclusion,
  ].join('\n');
}

export interface Synthesizer {
  synthesize(input: SynthesisInput): Promise<Report>;
}

export class OracleSynthesizer implements Synthesizer {
  private readonly now: () => Date;

  constructor(
    private readonly oracle: Oracle,
    private readonly options: SynthesizerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async synthesize(input: SynthesisInput): Promise<Report> {
    const base = {
      query: input.userQuery,
      offline: input.offline,
      iterations: input.iterations,
      generatedAt: this.now().toISOString(),
    };

    const noSources = (): Report => {
      const sections: ReportSections = {
        summary: `No sources could be retrieved for "${input.userQuery}", so no grounded report was produced.`,
        findings: [],
        conclusion: 'Try rephrasing the query, or run it again later when the sources are reachable.',
      };
      return { ...base, ...sections, body: renderBody(sections), citations: [], notice: NO_SOURCES_NOTICE };
    };

    if (!input.offline && input.entries.length === 0) {
      log.warn('synthesizer:empty_corpus', { query: input.userQuery });
      return noSources();
    }

    const condensed = await this.condense(input.entries);
    const { entries, history } = fitContext(condensed, input.history ?? [], this.options.maxContextWords);
    if (!input.offline && entries.length === 0) {
      log.warn('synthesizer:context_exhausted', {
        sources: input.entries.length,
        maxContextWords: this.options.maxContextWords,
      });
      return noSources();
    }
    const prompt = input.offline
      ? buildOfflineReportPrompt({ userQuery: input.userQuery, detailLevel: input.detailLevel, history })
      : buildReportPrompt({ userQuery: input.userQuery, entries, detailLevel: input.detailLevel, history });

    log.info('synthesizer:start', {
      sources: entries.length,
      omitted: input.entries.length - entries.length,
      promptWords: countWords(prompt),
      offline: input.offline,
    });

    const raw = await this.oracle.complete(prompt, {
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
      signal: this.options.signal,
      onToken: this.options.onToken,
    });
    const cleaned = cleanModelOutput(raw);
    if (!cleaned) throw new OracleUnavailableError('Model returned an empty report');

    const valid = new Set(entries.map((e) => e.index));
    const { text: body, cited } = verifyCitations(cleaned, valid);
    const byIndex = new Map<number, CorpusEntry>(entries.map((e) => [e.index, e]));
    const citations: Citation[] = [...cited]
      .sort((a, b) => a - b)
      .flatMap((i) => {
        const e = byIndex.get(i);
        return e ? [{ index: e.index, url: e.url, title: e.title }] : [];
      });

    log.info('synthesizer:done', { citations: citations.length, chars: body.length });
    return {
      ...base,
      ...parseSections(body),
      body,
      citations,
      notice: input.offline ? OFFLINE_NOTICE : undefined,
    };
  }

  private async condense(entries: CorpusEntry[]): Promise<CorpusEntry[]> {
    const threshold = this.options.summarizeAboveWords ?? 0;
    if (threshold <= 0) return entries;

    const condensed: CorpusEntry[] = [];
    for (const entry of entries) {
      condensed.push(countWords(entry.text) > threshold ? { ...entry, text: await this.summarize(entry) } : entry);
    }
    return condensed;
  }

  /** A failed or empty summary falls back to the leading words of the source. */
  private async summarize(entry: CorpusEntry): Promise<string> {
    const maxWords = this.options.summaryMaxWords ?? 250;
    try {
      const raw = await this.oracle.complete(buildSummaryPrompt(entry.text, maxWords), {
        temperature: SUMMARY_TEMPERATURE,
        maxTokens: maxWords * 2,
        signal: this.options.signal,
      });
      const summary = cleanModelOutput(raw);
      if (summary) {
        log.debug('synthesizer:summarized', { index: entry.index, from: countWords(entry.text), to: countWords(summary) });
        return summary;
      }
      log.warn('synthesizer:summary_empty', { index: entry.index });
    } catch (err) {
      if (err instanceof CancelledError || this.options.signal?.aborted) throw err;
      log.warn('synthesizer:summary_failed', { index: entry.index, error: errorMessage(err) });
    }
    return firstWords(entry.text, maxWords);
  }
}
