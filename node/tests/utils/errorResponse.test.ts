import { describe, expect, it } from 'vitest';
import { createErrorResponse, statusForError, statusForFailure } from '@/utils/errorResponse';
import { CancelledError, FetchFailedError, OracleUnavailableError, ResearchError } from '@/utils/errors';

describe('error responses', () => {
  it('omits empty details', () => {
    expect(createErrorResponse('Bad', [], 'X')).toEqual({ success: false, message: 'Bad', code: 'X' });
    expect(createErrorResponse('Bad', [{ path: 'q', message: 'm' }])).toEqual({
      success: false,
      message: 'Bad',
      errors: [{ path: 'q', message: 'm' }],
    });
  });

  it('maps error codes to statuses', () => {
    expect(statusForError(new ResearchError('EVAL_REJECTED', 'x'))).toBe(400);
    expect(statusForError(new OracleUnavailableError('x'))).toBe(503);
    expect(statusForError(new FetchFailedError('x'))).toBe(502);
    expect(statusForError(new CancelledError())).toBe(499);
    expect(statusForError(new Error('x'))).toBe(500);
  });

  it('maps failed runs to statuses', () => {
    expect(statusForFailure('INITIALIZING', 'unreachable')).toBe(503);
    expect(statusForFailure('SYNTHESIZING', 'crashed')).toBe(502);
    expect(statusForFailure('RETRIEVING', 'cancelled')).toBe(499);
  });
});
