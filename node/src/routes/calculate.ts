// src/routes/calculate.ts — sandboxed arithmetic
import express, { type Request, type Response } from 'express';
import { calculateRateLimiter } from '@/middleware/rate-limit-query';
import { evaluate, formatResult } from '@/safety/sandboxedEvaluator';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { validateCalculateRequest } from './research.validation';

const router = express.Router();

const ERROR_CODES = {
  rejected: 'EVAL_REJECTED',
  division_by_zero: 'EVAL_DOMAIN_ERROR',
  domain: 'EVAL_DOMAIN_ERROR',
  overflow: 'EVAL_DOMAIN_ERROR',
} as const;

router.post('/', calculateRateLimiter, (req: Request, res: Response) => {
  const validation = validateCalculateRequest(req.body);
  if (!validation.success) {
    res.status(400).json(createErrorResponse('Invalid calculation request', validation.error, 'VALIDATION_ERROR'));
    return;
  }

  const { expression } = validation.data;
  const result = evaluate(expression);
  if (!result.success) {
    res.status(422).json({
      ...createErrorResponse(result.error.message, undefined, ERROR_CODES[result.error.kind]),
      kind: result.error.kind,
    });
    return;
  }

  res.json(createSuccessResponse({ expression, value: result.value, formatted: formatResult(result.value) }));
});

export default router;
