// Global error handlers and graceful shutdown

import type { Server } from 'http';
import type { NextFunction, Request, Response } from 'express';
import { releaseModelCache } from '@/models/modelCache';
import { componentLogger } from '@/services/logger';
import { createErrorResponse, statusForError } from '@/utils/errorResponse';
import { ResearchError, errorMessage } from '@/utils/errors';

const log = componentLogger('stability');

let serverInstance: Server | null = null;
let shuttingDown = false;

/**
 * Set server instance for graceful shutdown
 */
export function setServerInstance(server: Server): void {
  serverInstance = server;
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    log.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // In production, log and continue; in development, exit for faster debugging
    if (process.env.NODE_ENV !== 'production') {
      void gracefulShutdown('unhandledRejection', 1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    log.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      log.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  });
}

function closeServer(): Promise<void> {
  return new Promise((resolve) => {
    if (!serverInstance) return resolve();
    serverInstance.close((err) => {
      if (err) log.warn('shutdown:server_close_failed', { error: err.message });
      else log.info('shutdown:server_closed');
      resolve();
    });
  });
}

/**
 * Stop accepting requests, release the model handle, then exit. A hung
 * cleanup is cut off after 15 seconds.
 */
export async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info('shutdown:start', { reason });

  const shutdownTimeout = setTimeout(() => {
    log.error('shutdown:forced', { reason });
    process.exit(1);
  }, 15_000);
  shutdownTimeout.unref();

  try {
    await closeServer();
    await releaseModelCache();
    log.info('shutdown:complete');
    process.exit(exitCode);
  } catch (error) {
    log.error('shutdown:failed', { error: errorMessage(error) });
    process.exit(1);
  }
}

/** Last-resort Express error middleware: standard error body, no stack traces. */
export function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status =
    typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed'
      ? 400
      : statusForError(err);
  log.error('http:unhandled_error', { method: req.method, path: req.path, status, error: errorMessage(err) });

  if (res.headersSent) {
    res.end();
    return;
  }
  const code = err instanceof ResearchError ? err.code : status === 400 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';
  const message = status === 500 ? 'Internal server error' : errorMessage(err);
  res.status(status).json(createErrorResponse(message, undefined, code));
}
