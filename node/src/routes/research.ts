// src/routes/research.ts — research runs (JSON or SSE progress stream) and report history
import express, { type NextFunction, type Request, type Response } from 'express';
import { renderReportMarkdown, renderSessionMarkdown } from '@/format/reportMarkdown';
import { researchRateLimiter } from '@/middleware/rate-limit-query';
import { componentLogger } from '@/services/logger';
import { getOrchestrator, getPipelineDeps } from '@/services/pipeline-deps';
import type { ResearchOutcome, ResearchSession } from '@/types/core';
import { createErrorResponse, createSuccessResponse, statusForFailure } from '@/utils/errorResponse';
import { SSE } from '@/utils/sse';
import { validateResearchRequest } from './research.validation';

const log = componentLogger('http');
const router = express.Router();

/** Session view for clients: sources without their extracted text. */
function sessionView(session: ResearchSession) {
  return {
    id: session.id,
    query: session.userQuery,
    iterations: session.iterationCount,
    maxIterations: session.maxIterations,
    detailLevel: session.detailLevel,
    offline: session.offline,
    state: session.state,
    subQueries: session.issuedQueries,
    sources: session.sources.map((s) => ({
      url: s.url,
      title: s.title,
      fetchStatus: s.fetchStatus,
      citationIndex: s.citationIndex,
      originSubquery: s.originSubquery,
      retrievedAt: s.retrievedAt,
      detail: s.detail,
    })),
  };
}

function outcomeView(outcome: Extract<ResearchOutcome, { status: 'completed' }>) {
  return {
    id: outcome.session.id,
    stopReason: outcome.stopReason,
    report: outcome.report,
    markdown: renderReportMarkdown(outcome.report),
    session: sessionView(outcome.session),
  };
}

function clientGone(res: Response): boolean {
  return res.destroyed || res.writableEnded;
}

router.post('/', researchRateLimiter, async (req: Request, res: Response, next: NextFunction) => {
  const validation = validateResearchRequest(req.body);
  if (!validation.success) {
    res.status(400).json(createErrorResponse('Invalid research request', validation.error, 'VALIDATION_ERROR'));
    return;
  }

  const { stream, ...request } = validation.data;
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      log.info('research:client_disconnected', { query: request.query });
      controller.abort();
    }
  });

  try {
    if (stream) {
      const sse = new SSE(res);
      sse.init();
      const outcome = await getOrchestrator().run(request, {
        signal: controller.signal,
        onProgress: (event) => sse.send(event.type, event),
      });
      if (outcome.status === 'completed') {
        sse.send('report', outcomeView(outcome));
      } else {
        sse.send('error', { phase: outcome.phase, message: outcome.reason, session: sessionView(outcome.session) });
      }
      sse.close();
      return;
    }

    const outcome = await getOrchestrator().run(request, { signal: controller.signal });
    if (clientGone(res)) return;
    if (outcome.status === 'completed') {
      res.json(createSuccessResponse(outcomeView(outcome)));
      return;
    }
    res.status(statusForFailure(outcome.phase, outcome.reason)).json({
      ...createErrorResponse(`Research failed during ${outcome.phase}: ${outcome.reason}`, undefined, 'RESEARCH_FAILED'),
      phase: outcome.phase,
      session: sessionView(outcome.session),
    });
  } catch (err) {
    next(err);
  }
});

router.get('/history', (_req: Request, res: Response) => {
  const entries = getPipelineDeps().history.list();
  res.json(
    createSuccessResponse(
      entries.map((e) => ({
        id: e.id,
        query: e.query,
        createdAt: e.createdAt,
        summary: e.report.summary,
        citations: e.report.citations.length,
      })),
    ),
  );
});

// Registered before /history/:id so "export" is not taken for an id.
router.get('/history/export', (_req: Request, res: Response) => {
  const entries = getPipelineDeps().history.list();
  res.attachment('research-session.md').type('text/markdown').send(renderSessionMarkdown(entries));
});

router.get('/history/:id', (req: Request, res: Response) => {
  const entry = getPipelineDeps().history.get(req.params.id);
  if (!entry) {
    res.status(404).json(createErrorResponse('Report not found', undefined, 'NOT_FOUND'));
    return;
  }
  if (req.query.format === 'markdown') {
    res.type('text/markdown').send(renderReportMarkdown(entry.report));
    return;
  }
  res.json(createSuccessResponse(entry));
});

export default router;
