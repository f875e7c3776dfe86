/**
 * Config Types
 * Environment schema for the research service. Every value has a default so the
 * service starts against a local OpenAI-compatible model server with no .env.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const portList = z
  .string()
  .transform((raw, ctx) => {
    const ports = raw
      .split(',')
      .map((p) => p.trim())
      .filter(Boolean)
      .map((p) => Number(p));
    if (ports.some((p) => !Number.isInteger(p) || p < 1 || p > 65535)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid port list: ${raw}` });
      return z.NEVER;
    }
    return ports;
  });

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.string().default('development'),
  CORS_ORIGIN: z.string().optional(),

  MODEL_BASE_URL: z.string().url().default('http://127.0.0.1:8080/v1'),
  MODEL_NAME: z.string().min(1).default('local-model'),
  MODEL_API_KEY: z.string().default('not-needed'),
  MODEL_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  PLANNER_MAX_TOKENS: z.coerce.number().int().positive().default(200),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  SEARCH_PROVIDER: z.enum(['duckduckgo', 'searxng']).default('duckduckgo'),
  SEARXNG_URL: z.string().default(''),
  SEARCH_TOP_K: z.coerce.number().int().min(1).max(20).default(5),

  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  FETCH_MAX_CONCURRENCY: z.coerce.number().int().min(1).default(6),
  POLITENESS_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  FETCH_MAX_REDIRECTS: z.coerce.number().int().min(0).default(3),
  FETCH_MAX_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  MIN_CONTENT_LENGTH: z.coerce.number().int().min(0).default(200),
  MAX_CONTENT_CHARS: z.coerce.number().int().positive().default(4000),

  ALLOWED_PORTS: portList.default('80,443'),
  MAX_URL_LENGTH: z.coerce.number().int().positive().default(2048),
  ROBOTS_USER_AGENT: z.string().min(1).default('ResearchAgent'),
  ROBOTS_NEGATIVE_TTL_MS: z.coerce.number().int().positive().default(60_000),

  MAX_ITERATIONS: z.coerce.number().int().min(1).max(10).default(3),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.6),
  SUBQUERIES_PER_ITERATION: z.coerce.number().int().min(1).max(10).default(3),
  INCLUDE_ORIGINAL_QUERY: booleanFlag.default('true'),
  TIME_BUDGET_MS: z.coerce.number().int().positive().default(300_000),
  COVERAGE_MIN_WORDS: z.coerce.number().int().min(0).default(3000),
  COVERAGE_MIN_HOSTS: z.coerce.number().int().min(0).default(3),
  DEDUP_INCLUDE_QUERY: booleanFlag.default('false'),
  MAX_CONTEXT_WORDS: z.coerce.number().int().positive().default(3000),
  // 0 turns model summaries of long sources off
  SUMMARIZE_ABOVE_WORDS: z.coerce.number().int().min(0).default(400),
  SUMMARY_MAX_WORDS: z.coerce.number().int().positive().default(250),
  HISTORY_MAX_ENTRIES: z.coerce.number().int().positive().default(50),
});

export type RawEnv = z.infer<typeof envSchema>;

export type ModelConfig = {
  baseURL: string;
  model: string;
  apiKey: string;
  maxTokens: number;
  plannerMaxTokens: number;
  timeoutMs: number;
};

export type SearchConfig = {
  provider: 'duckduckgo' | 'searxng';
  searxngURL: string;
  topK: number;
};

export type FetchConfig = {
  timeoutMs: number;
  maxConcurrency: number;
  politenessDelayMs: number;
  maxRedirects: number;
  maxBytes: number;
  minContentLength: number;
  maxContentChars: number;
};

export type SafetyConfig = {
  allowedPorts: number[];
  maxUrlLength: number;
  robotsUserAgent: string;
  robotsNegativeTtlMs: number;
};

export type CoverageThreshold = {
  minWords: number;
  minHosts: number;
};

export type ResearchConfig = {
  maxIterations: number;
  temperature: number;
  subQueriesPerIteration: number;
  includeOriginalQuery: boolean;
  timeBudgetMs: number;
  coverage: CoverageThreshold;
  dedupIncludeQuery: boolean;
  maxContextWords: number;
  /** Sources longer than this are summarized by the model before synthesis; 0 disables. */
  summarizeAboveWords: number;
  summaryMaxWords: number;
  historyMaxEntries: number;
};

export type AppConfig = {
  port: number;
  nodeEnv: string;
  corsOrigins: string[];
  model: ModelConfig;
  search: SearchConfig;
  fetch: FetchConfig;
  safety: SafetyConfig;
  research: ResearchConfig;
};
