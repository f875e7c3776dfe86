/**
 * Error taxonomy for the research service.
 *
 * Per-source failures (validation, fetch, extraction) are recorded on the
 * Source and never thrown past the retrieval pipeline. OracleUnavailable is
 * the only error that can end a run. An exhausted budget is a stop reason
 * reported through progress events, not thrown.
 */

export type ResearchErrorCode =
  | 'FETCH_FAILED'
  | 'ORACLE_UNAVAILABLE'
  | 'EVAL_REJECTED'
  | 'EVAL_DOMAIN_ERROR'
  | 'CONFIG_INVALID'
  | 'CANCELLED';

export class ResearchError extends Error {
  readonly code: ResearchErrorCode;

  constructor(code: ResearchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FetchFailedError extends ResearchError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super('FETCH_FAILED', message, options);
  }
}

export class OracleUnavailableError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ORACLE_UNAVAILABLE', message, options);
  }
}

export class CancelledError extends ResearchError {
  constructor(message = 'Research run cancelled') {
    super('CANCELLED', message);
  }
}

export class ConfigError extends ResearchError {
  constructor(
    message: string,
    readonly issues: Array<{ path: string; message: string }>,
  ) {
    super('CONFIG_INVALID', `${message}: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isAbortError(err: unknown): boolean {
  if (err instanceof CancelledError) return true;
  if (!(err instanceof Error)) return false;
  return err.name === 'AbortError' || err.name === 'CanceledError';
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError();
}
