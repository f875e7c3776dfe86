/**
 * Config Accessors
 * Loads .env, validates it once and hands out typed sections.
 */

import dotenv from 'dotenv';
import path from 'path';
import { ConfigError } from '@/utils/errors';
import { envSchema, type AppConfig } from './types';

let cached: AppConfig | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => ({
      path: e.path.join('.') || 'root',
      message: e.message,
    }));
    throw new ConfigError('Invalid configuration', issues);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    corsOrigins: e.CORS_ORIGIN?.split(',').map((o) => o.trim()).filter(Boolean) ?? ['http://localhost:3000'],
    model: {
      baseURL: e.MODEL_BASE_URL,
      model: e.MODEL_NAME,
      apiKey: e.MODEL_API_KEY,
      maxTokens: e.MODEL_MAX_TOKENS,
      plannerMaxTokens: e.PLANNER_MAX_TOKENS,
      timeoutMs: e.MODEL_TIMEOUT_MS,
    },
    search: {
      provider: e.SEARCH_PROVIDER,
      searxngURL: e.SEARXNG_URL,
      topK: e.SEARCH_TOP_K,
    },
    fetch: {
      timeoutMs: e.FETCH_TIMEOUT_MS,
      maxConcurrency: e.FETCH_MAX_CONCURRENCY,
      politenessDelayMs: e.POLITENESS_DELAY_MS,
      maxRedirects: e.FETCH_MAX_REDIRECTS,
      maxBytes: e.FETCH_MAX_BYTES,
      minContentLength: e.MIN_CONTENT_LENGTH,
      maxContentChars: e.MAX_CONTENT_CHARS,
    },
    safety: {
      allowedPorts: e.ALLOWED_PORTS,
      maxUrlLength: e.MAX_URL_LENGTH,
      robotsUserAgent: e.ROBOTS_USER_AGENT,
      robotsNegativeTtlMs: e.ROBOTS_NEGATIVE_TTL_MS,
    },
    research: {
      maxIterations: e.MAX_ITERATIONS,
      temperature: e.TEMPERATURE,
      subQueriesPerIteration: e.SUBQUERIES_PER_ITERATION,
      includeOriginalQuery: e.INCLUDE_ORIGINAL_QUERY,
      timeBudgetMs: e.TIME_BUDGET_MS,
      coverage: {
        minWords: e.COVERAGE_MIN_WORDS,
        minHosts: e.COVERAGE_MIN_HOSTS,
      },
      dedupIncludeQuery: e.DEDUP_INCLUDE_QUERY,
      maxContextWords: e.MAX_CONTEXT_WORDS,
      summarizeAboveWords: e.SUMMARIZE_ABOVE_WORDS,
      summaryMaxWords: e.SUMMARY_MAX_WORDS,
      historyMaxEntries: e.HISTORY_MAX_ENTRIES,
    },
  };
}

export function getConfig(): AppConfig {
  if (!cached) {
    dotenv.config({ path: path.resolve(process.cwd(), '.env') });
    cached = loadConfig();
  }
  return cached;
}
