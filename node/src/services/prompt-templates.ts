// node/src/services/prompt-templates.ts — planner and report prompts

import type { CorpusEntry, DetailLevel } from '@/types/core';

export type HistoryTurn = { query: string; answer: string };

export function buildInitialPlanPrompt(userQuery: string, n: number): string {
  return `
Based on the user's query, generate ${n} diverse and effective search engine queries.
The queries should be concise and cover different aspects of the original query.
Return the queries as a JSON array of strings and nothing else.

User Query: "${userQuery}"

JSON Output:
`.trim();
}

export function buildRefinementPrompt(params: {
  userQuery: string;
  corpusSummary: string;
  issued: string[];
  n: number;
  remainingBudget: number;
}): string {
  const { userQuery, corpusSummary, issued, n, remainingBudget } = params;
  return `
You are planning the next round of web searches for a research question.
${remainingBudget} search round(s) remain after this one.

Research question: "${userQuery}"

Queries already searched (do not repeat them):
${issued.map((q) => `- ${q}`).join('\n') || '- (none)'}

What the sources found so far cover:
${corpusSummary}

Propose up to ${n} new search queries that fill the gaps in the material above.
If the material already answers the question, return an empty array.
Return a JSON array of strings and nothing else.

JSON Output:
`.trim();
}

/** Retry wording used when the first planning answer had no usable queries. */
export function buildStrictPlanPrompt(userQuery: string, n: number, issued: string[]): string {
  const avoid = issued.length ? `\nDo not repeat any of: ${JSON.stringify(issued)}` : '';
  return `
Output ONLY a JSON array of ${n} short web search queries for: "${userQuery}".
No explanation, no markdown, no numbering. Example: ["query one", "query two"]${avoid}
`.trim();
}

const DETAIL_INSTRUCTIONS: Record<DetailLevel, string> = {
  concise: 'FORMAT: Maximum 3 bullet points in Detailed Findings. Be extremely concise.',
  standard: 'FORMAT: A few focused paragraphs or bullet points per theme.',
  detailed: 'FORMAT: Include specific statistics, dates and direct quotes where available.',
};

const REPORT_RULES = `
Structure the report under exactly these markdown headings:
## Executive Summary
A brief, high-level summary of the main findings.
## Detailed Findings
A thorough breakdown of the information as bullet points, organized by key themes.
## Conclusion
A summary of the most important points.`;

function historyBlock(history: HistoryTurn[]): string {
  if (history.length === 0) return '';
  const turns = history.map((h) => `User asked: ${h.query}\nYou answered: ${h.answer}\n---`).join('\n');
  return `PREVIOUS CONVERSATION (context only, not a source):\n${turns}\nCURRENT QUERY:\n`;
}

export function buildReportPrompt(params: {
  userQuery: string;
  entries: CorpusEntry[];
  detailLevel: DetailLevel;
  history: HistoryTurn[];
}): string {
  const { userQuery, entries, detailLevel, history } = params;
  const sources = entries
    .map((e) => `Source ${e.index}: ${e.url}\nTitle: ${e.title}\nContent: ${e.text}\n---`)
    .join('\n');

  return `
You are a research assistant. Write a comprehensive report based *only* on the provided search results.

Instructions:
- Base the entire report on the 'Source X' entries below. Do not add external knowledge.
- Cite every piece of information with the format [Source X]. Several sources are cited as [Source 1, 3]. Only cite numbers that appear below.
- Weave the information into a coherent narrative instead of listing sources. If sources conflict, note the discrepancy.
${REPORT_RULES}

${DETAIL_INSTRUCTIONS[detailLevel]}

${historyBlock(history)}Research query: "${userQuery}"

Search results:
---
${sources}
`.trim();
}

export function buildOfflineReportPrompt(params: {
  userQuery: string;
  detailLevel: DetailLevel;
  history: HistoryTurn[];
}): string {
  const { userQuery, detailLevel, history } = params;
  return `
You are a research assistant working without internet access. Answer from your own knowledge and say plainly where you are unsure.
Do not cite sources and do not invent URLs.
${REPORT_RULES}

${DETAIL_INSTRUCTIONS[detailLevel]}

${historyBlock(history)}Research query: "${userQuery}"
`.trim();
}

/** Condenses one long source before it goes into the report prompt. */
export function buildSummaryPrompt(text: string, maxWords: number): string {
  return `
Summarize the following text in under ${maxWords} words, focusing on the key facts and figures.
Return only the summary.

${text}
`.trim();
}
