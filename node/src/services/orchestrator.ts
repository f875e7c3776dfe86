// src/services/orchestrator.ts — iterative research loop: plan → retrieve → aggregate → decide → synthesize
import { v4 as uuidv4 } from 'uuid';
import type { ModelConfig, ResearchConfig } from '@/config/types';
import type { SessionHistory } from '@/memory/sessionHistory';
import type { Oracle, OracleSource } from '@/models/types';
import { evaluate, formatResult, looksLikeExpression } from '@/safety/sandboxedEvaluator';
import {
  corpus,
  coverage,
  meetsThreshold,
  merge,
  normalizeUrl,
  summarizeCorpus,
} from '@/services/context/contextAggregator';
import { componentLogger } from '@/services/logger';
import { OracleQueryPlanner, type PlannerOptions, type QueryPlanner } from '@/services/planner/queryPlanner';
import { queryKey } from '@/services/planner/parseQueries';
import type { RetrieverFactory } from '@/services/retrieval/retrievalPipeline';
import type { ReportSections } from '@/services/synthesis/sections';
import {
  OracleSynthesizer,
  renderBody,
  type Synthesizer,
  type SynthesizerOptions,
} from '@/services/synthesis/synthesizer';
import type {
  CoverageSignal,
  FailurePhase,
  ProgressEvent,
  ProgressListener,
  Report,
  ResearchOutcome,
  ResearchRequest,
  ResearchSession,
  ResearchState,
  Source,
  StopReason,
  SubQuery,
} from '@/types/core';
import { CancelledError, errorMessage, isAbortError } from '@/utils/errors';

const log = componentLogger('orchestrator');

export const CALCULATOR_NOTICE = 'Answered by the built-in calculator; no external sources consulted.';
const HISTORY_TURNS = 3;

export interface OrchestratorDeps {
  models: OracleSource;
  createRetriever: RetrieverFactory;
  history: SessionHistory;
  research: ResearchConfig;
  model: Pick<ModelConfig, 'maxTokens' | 'plannerMaxTokens'>;
  /** Defaults to the oracle-backed planner. */
  createPlanner?: (oracle: Oracle, options: PlannerOptions) => QueryPlanner;
  /** Defaults to the oracle-backed synthesizer. */
  createSynthesizer?: (oracle: Oracle, options: SynthesizerOptions) => Synthesizer;
  /** Monotonic milliseconds for the time budget. */
  clock?: () => number;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

/** Mutable state of one run, kept next to the session it drives. */
interface RunContext {
  session: ResearchSession;
  signal?: AbortSignal;
  emit: (event: ProgressEvent) => void;
  planner: QueryPlanner;
  synthesizer: Synthesizer;
  startedAt: number;
  stopReason: StopReason;
  /** Refinement queries chosen in DECIDING, consumed by the next PLANNING. */
  pending: string[] | null;
  batch: SubQuery[];
  fetched: Source[];
  faultedAll: boolean;
  coverage: CoverageSignal;
}

/**
 * Drives one user query through the research state machine.
 *
 * PLANNING → RETRIEVING → AGGREGATING → DECIDING → (PLANNING | SYNTHESIZING) → DONE
 *
 * Every transition reports progress, checks cancellation and checks the
 * wall-clock budget. run() never throws: failures come back as a `failed`
 * outcome naming the phase, with the session attached.
 */
export class ResearchOrchestrator {
  private readonly clock: () => number;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? (() => performance.now());
    this.now = deps.now ?? (() => new Date());
  }

  async run(request: ResearchRequest, options: RunOptions = {}): Promise<ResearchOutcome> {
    const session = this.createSession(request);
    const emit = (event: ProgressEvent) => {
      try {
        options.onProgress?.(event);
      } catch (err) {
        log.warn('orchestrator:listener_failed', { error: errorMessage(err) });
      }
    };

    log.info('orchestrator:start', {
      id: session.id,
      query: session.userQuery,
      maxIterations: session.maxIterations,
      offline: session.offline,
    });

    if (looksLikeExpression(session.userQuery)) {
      return this.answerWithCalculator(session, emit);
    }

    let oracle: Oracle;
    try {
      oracle = await this.deps.models.acquire(options.signal);
    } catch (err) {
      return this.fail(session, 'INITIALIZING', err, options.signal);
    }

    const ctx: RunContext = {
      session,
      signal: options.signal,
      emit,
      planner: this.buildPlanner(oracle, session, options.signal),
      synthesizer: this.buildSynthesizer(oracle, session, options.signal, options.onProgress ? emit : undefined),
      startedAt: this.clock(),
      stopReason: session.offline ? 'offline' : 'max_iterations',
      pending: null,
      batch: [],
      fetched: [],
      faultedAll: false,
      coverage: { usableSources: 0, totalWords: 0, distinctHosts: 0 },
    };

    const claimed = new Set<string>();
    const retriever = this.deps.createRetriever({
      signal: options.signal,
      claim: (url) => {
        const key = normalizeUrl(url, { includeQuery: this.deps.research.dedupIncludeQuery });
        if (claimed.has(key)) return false;
        claimed.add(key);
        return true;
      },
      onSource: (source) => emit({ type: 'source', source }),
    });

    let state: ResearchState = session.offline ? 'SYNTHESIZING' : 'PLANNING';

    while (state !== 'DONE') {
      if (options.signal?.aborted) return this.fail(session, state, new CancelledError(), options.signal);

      // sources already fetched are merged before the budget can end the run
      const budgeted = state !== 'SYNTHESIZING' && state !== 'AGGREGATING';
      if (budgeted && this.clock() - ctx.startedAt >= this.deps.research.timeBudgetMs) {
        log.warn('orchestrator:time_budget', { id: session.id, iteration: session.iterationCount });
        ctx.stopReason = 'time_budget';
        state = 'SYNTHESIZING';
      }

      session.state = state;
      emit({ type: 'phase', state, iteration: session.iterationCount });

      try {
        switch (state) {
          case 'PLANNING':
            state = await this.plan(ctx);
            break;
          case 'RETRIEVING':
            state = await this.retrieve(ctx, (sq) => retriever.run(sq));
            break;
          case 'AGGREGATING':
            state = this.aggregate(ctx);
            break;
          case 'DECIDING':
            state = await this.decide(ctx);
            break;
          case 'SYNTHESIZING':
            state = await this.synthesize(ctx);
            break;
        }
      } catch (err) {
        return this.fail(session, state, err, options.signal);
      }
    }

    session.state = 'DONE';
    emit({ type: 'phase', state: 'DONE', iteration: session.iterationCount });

    const report = session.report;
    if (!report) return this.fail(session, 'SYNTHESIZING', new Error('No report was produced'), options.signal);

    this.deps.history.add(report, session.id);
    log.info('orchestrator:done', {
      id: session.id,
      iterations: session.iterationCount,
      sources: session.sources.length,
      citations: report.citations.length,
      stopReason: ctx.stopReason,
    });
    return { status: 'completed', report, session, stopReason: ctx.stopReason };
  }

  private createSession(request: ResearchRequest): ResearchSession {
    const research = this.deps.research;
    return {
      id: uuidv4(),
      userQuery: request.query.trim(),
      iterationCount: 0,
      // the first round always runs, so a smaller budget could not be honoured
      maxIterations: Math.max(1, Math.floor(request.maxIterations ?? research.maxIterations)),
      temperature: request.temperature ?? research.temperature,
      detailLevel: request.detailLevel ?? 'standard',
      offline: request.offline ?? false,
      state: 'PLANNING',
      issuedQueries: [],
      sources: [],
      startedAt: this.now().toISOString(),
    };
  }

  private buildPlanner(oracle: Oracle, session: ResearchSession, signal?: AbortSignal): QueryPlanner {
    const options: PlannerOptions = {
      temperature: session.temperature,
      maxTokens: this.deps.model.plannerMaxTokens,
      includeOriginalQuery: this.deps.research.includeOriginalQuery,
      signal,
    };
    return this.deps.createPlanner?.(oracle, options) ?? new OracleQueryPlanner(oracle, options);
  }

  private buildSynthesizer(
    oracle: Oracle,
    session: ResearchSession,
    signal?: AbortSignal,
    emit?: (event: ProgressEvent) => void,
  ): Synthesizer {
    const options: SynthesizerOptions = {
      temperature: session.temperature,
      maxTokens: this.deps.model.maxTokens,
      maxContextWords: this.deps.research.maxContextWords,
      summarizeAboveWords: this.deps.research.summarizeAboveWords,
      summaryMaxWords: this.deps.research.summaryMaxWords,
      // tokens are only streamed when someone is listening
      onToken: emit ? (text) => emit({ type: 'token', text }) : undefined,
      signal,
      now: this.now,
    };
    return this.deps.createSynthesizer?.(oracle, options) ?? new OracleSynthesizer(oracle, options);
  }

  private freshQueries(session: ResearchSession, texts: string[]): string[] {
    const seen = new Set(session.issuedQueries.map((q) => queryKey(q.text)));
    const out: string[] = [];
    for (const text of texts) {
      const key = queryKey(text);
      if (!key || seen.has(key)) continue;
      seen.add(key);
      out.push(text.trim());
    }
    return out;
  }

  private async plan(ctx: RunContext): Promise<ResearchState> {
    const { session } = ctx;
    if (session.iterationCount === 0) session.iterationCount = 1;

    const proposed =
      ctx.pending ?? (await ctx.planner.planInitial(session.userQuery, this.deps.research.subQueriesPerIteration));
    ctx.pending = null;

    const fresh = this.freshQueries(session, proposed);
    if (fresh.length === 0) {
      ctx.stopReason = 'no_new_queries';
      return 'SYNTHESIZING';
    }

    ctx.batch = fresh.map((text) => ({ text, originIteration: session.iterationCount }));
    session.issuedQueries.push(...ctx.batch);
    ctx.emit({ type: 'subqueries', iteration: session.iterationCount, queries: fresh });
    return 'RETRIEVING';
  }

  private async retrieve(
    ctx: RunContext,
    run: (subquery: SubQuery) => Promise<Source[]>,
  ): Promise<ResearchState> {
    const settled = await Promise.allSettled(ctx.batch.map((sq) => run(sq)));
    if (ctx.signal?.aborted) throw new CancelledError();

    const fetched: Source[] = [];
    let faults = 0;
    settled.forEach((result, i) => {
      const subquery = ctx.batch[i];
      if (result.status === 'fulfilled') {
        fetched.push(...result.value);
        return;
      }
      if (isAbortError(result.reason)) throw new CancelledError();
      faults++;
      log.warn('orchestrator:subquery_failed', { subquery: subquery.text, error: errorMessage(result.reason) });
      fetched.push({
        url: `search:${encodeURIComponent(subquery.text)}`,
        title: `Retrieval failed for "${subquery.text}"`,
        extractedText: '',
        fetchStatus: 'FETCH_ERROR',
        retrievedAt: this.now().toISOString(),
        originSubquery: subquery.text,
        detail: errorMessage(result.reason),
      });
    });

    ctx.fetched = fetched;
    ctx.faultedAll = ctx.batch.length > 0 && faults === ctx.batch.length;
    return 'AGGREGATING';
  }

  private aggregate(ctx: RunContext): ResearchState {
    const { session } = ctx;
    session.sources = merge(session.sources, ctx.fetched, { includeQuery: this.deps.research.dedupIncludeQuery });
    ctx.fetched = [];
    ctx.coverage = coverage(session.sources);
    ctx.emit({ type: 'coverage', iteration: session.iterationCount, coverage: ctx.coverage });

    if (ctx.faultedAll && ctx.coverage.usableSources === 0) {
      ctx.stopReason = 'all_subqueries_failed';
      return 'SYNTHESIZING';
    }
    return 'DECIDING';
  }

  private async decide(ctx: RunContext): Promise<ResearchState> {
    const { session } = ctx;

    if (session.iterationCount >= session.maxIterations) {
      ctx.stopReason = 'max_iterations';
      return 'SYNTHESIZING';
    }
    if (meetsThreshold(ctx.coverage, this.deps.research.coverage)) {
      ctx.stopReason = 'coverage_reached';
      return 'SYNTHESIZING';
    }

    const proposed = await ctx.planner.planRefinement(
      session.userQuery,
      summarizeCorpus(corpus(session.sources)),
      session.maxIterations - session.iterationCount,
      session.issuedQueries.map((q) => q.text),
      this.deps.research.subQueriesPerIteration,
    );
    const fresh = this.freshQueries(session, proposed);
    if (fresh.length === 0) {
      ctx.stopReason = 'no_new_queries';
      return 'SYNTHESIZING';
    }

    ctx.pending = fresh;
    session.iterationCount++;
    return 'PLANNING';
  }

  private async synthesize(ctx: RunContext): Promise<ResearchState> {
    const { session } = ctx;
    ctx.emit({ type: 'stop', reason: ctx.stopReason, iteration: session.iterationCount });

    session.report = await ctx.synthesizer.synthesize({
      userQuery: session.userQuery,
      entries: session.offline ? [] : corpus(session.sources),
      detailLevel: session.detailLevel,
      offline: session.offline,
      iterations: session.iterationCount,
      history: this.deps.history.recentTurns(HISTORY_TURNS),
    });
    return 'DONE';
  }

  private answerWithCalculator(
    session: ResearchSession,
    emit: (event: ProgressEvent) => void,
  ): ResearchOutcome {
    const expression = session.userQuery;
    const result = evaluate(expression);
    const summary = result.success
      ? `${expression} = ${formatResult(result.value)}`
      : `Could not evaluate "${expression}": ${result.error.message}`;
    const sections: ReportSections = { summary, findings: [], conclusion: '' };

    const report: Report = {
      query: expression,
      ...sections,
      body: renderBody(sections),
      citations: [],
      notice: CALCULATOR_NOTICE,
      offline: session.offline,
      iterations: 0,
      generatedAt: this.now().toISOString(),
    };

    session.report = report;
    session.state = 'DONE';
    emit({ type: 'stop', reason: 'calculation', iteration: 0 });
    emit({ type: 'phase', state: 'DONE', iteration: 0 });
    this.deps.history.add(report, session.id);
    log.info('orchestrator:calculated', { id: session.id, success: result.success });
    return { status: 'completed', report, session, stopReason: 'calculation' };
  }

  private fail(
    session: ResearchSession,
    phase: FailurePhase,
    err: unknown,
    signal?: AbortSignal,
  ): ResearchOutcome {
    const cancelled = isAbortError(err) || signal?.aborted === true;
    const reason = cancelled ? 'cancelled' : errorMessage(err);
    if (cancelled) {
      log.info('orchestrator:cancelled', { id: session.id, phase });
    } else {
      log.error('orchestrator:failed', { id: session.id, phase, reason });
    }
    return { status: 'failed', phase, reason, session };
  }
}
