import type { Oracle } from '@/models/types';
import { componentLogger } from '@/services/logger';
import {
  buildInitialPlanPrompt,
  buildRefinementPrompt,
  buildStrictPlanPrompt,
} from '@/services/prompt-templates';
import { CancelledError, errorMessage } from '@/utils/errors';
import { parseQueries, queryKey } from './parseQueries';

const log = componentLogger('planner');

export interface PlannerOptions {
  temperature: number;
  maxTokens: number;
  /** Put the user's own query first in the initial plan. */
  includeOriginalQuery: boolean;
  signal?: AbortSignal;
}

export interface QueryPlanner {
  planInitial(userQuery: string, n: number): Promise<string[]>;
  planRefinement(
    userQuery: string,
    corpusSummary: string,
    remainingBudget: number,
    issued: string[],
    n: number,
  ): Promise<string[]>;
}

/**
 * Turns the user query (and later the corpus so far) into search queries.
 * Each plan is one oracle call; an unusable answer or an oracle failure gets
 * one retry with a stricter prompt before the fallback applies.
 */
export class OracleQueryPlanner implements QueryPlanner {
  constructor(
    private readonly oracle: Oracle,
    private readonly options: PlannerOptions,
  ) {}

  async planInitial(userQuery: string, n: number): Promise<string[]> {
    const planned = this.options.includeOriginalQuery ? [userQuery.trim()] : [];
    const generated = await this.generate(
      buildInitialPlanPrompt(userQuery, n),
      buildStrictPlanPrompt(userQuery, n, planned),
      planned,
      n,
      'initial',
    );

    const queries = [...planned, ...generated];
    if (queries.length === 0) {
      log.warn('planner:fallback_user_query', { phase: 'initial' });
      return [userQuery.trim()];
    }
    log.info('planner:plan', { phase: 'initial', queries });
    return queries;
  }

  async planRefinement(
    userQuery: string,
    corpusSummary: string,
    remainingBudget: number,
    issued: string[],
    n: number,
  ): Promise<string[]> {
    const generated = await this.generate(
      buildRefinementPrompt({ userQuery, corpusSummary, issued, n, remainingBudget }),
      buildStrictPlanPrompt(userQuery, n, issued),
      issued,
      n,
      'refinement',
    );
    if (generated.length > 0) {
      log.info('planner:plan', { phase: 'refinement', queries: generated });
      return generated;
    }

    const issuedKeys = new Set(issued.map(queryKey));
    if (!issuedKeys.has(queryKey(userQuery))) {
      log.warn('planner:fallback_user_query', { phase: 'refinement' });
      return [userQuery.trim()];
    }
    log.info('planner:no_new_queries');
    return [];
  }

  private async generate(
    prompt: string,
    strictPrompt: string,
    issued: string[],
    n: number,
    phase: 'initial' | 'refinement',
  ): Promise<string[]> {
    const attempts = [
      { prompt, temperature: this.options.temperature },
      { prompt: strictPrompt, temperature: Math.min(this.options.temperature, 0.2) },
    ];

    for (const [attempt, { prompt: p, temperature }] of attempts.entries()) {
      try {
        const raw = await this.oracle.complete(p, {
          temperature,
          maxTokens: this.options.maxTokens,
          signal: this.options.signal,
        });
        const queries = parseQueries(raw, issued, n);
        if (queries.length > 0) return queries;
        log.warn('planner:no_usable_queries', { phase, attempt, raw: raw.slice(0, 200) });
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        log.warn('planner:oracle_failed', { phase, attempt, error: errorMessage(err) });
      }
    }
    return [];
  }
}
