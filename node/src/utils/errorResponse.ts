/**
 * Standard response envelopes shared by every route:
 * `{ success: true, data }` or `{ success: false, message, errors?, code? }`.
 */

import type { FailurePhase } from '@/types/core';
import { ResearchError } from './errors';

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: Array<{ path: string; message: string }>;
  code?: string;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(
  message: string,
  errors?: Array<{ path: string; message: string }>,
  code?: string,
): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}

/** HTTP status for an error that escaped a route handler. */
export function statusForError(err: unknown): number {
  if (!(err instanceof ResearchError)) return 500;
  switch (err.code) {
    case 'EVAL_REJECTED':
    case 'EVAL_DOMAIN_ERROR':
      return 400;
    case 'ORACLE_UNAVAILABLE':
      return 503;
    case 'FETCH_FAILED':
      return 502;
    case 'CANCELLED':
      return 499;
    default:
      return 500;
  }
}

/** HTTP status for a failed research outcome. */
export function statusForFailure(phase: FailurePhase, reason: string): number {
  if (reason === 'cancelled') return 499;
  return phase === 'INITIALIZING' ? 503 : 502;
}
