// src/utils/sse.ts
import type { Response } from 'express';
import { componentLogger } from '@/services/logger';
import { errorMessage } from './errors';

const log = componentLogger('http');

export class SSE {
  private res: Response;
  private initialized = false;
  private closed = false;

  constructor(res: Response) {
    this.res = res;
  }

  /**
   * Initialize the SSE stream with headers.
   */
  init(): void {
    if (this.initialized) return;

    this.res.setHeader('Content-Type', 'text/event-stream');
    this.res.setHeader('Cache-Control', 'no-cache, no-transform');
    this.res.setHeader('Connection', 'keep-alive');
    this.res.setHeader('X-Accel-Buffering', 'no');
    this.res.flushHeaders();

    this.initialized = true;
  }

  /**
   * Send one event as `data: {"type": ..., ...}`. Objects are spread into the
   * payload; primitives go under "data".
   */
  send(type: string, data: unknown): void {
    if (this.closed || this.res.destroyed) return;
    if (!this.initialized) this.init();

    const payload =
      data !== null && typeof data === 'object' && !Array.isArray(data) ? { type, ...data } : { type, data: data ?? null };

    this.res.write(`data: ${JSON.stringify(payload)}\n\n`);
  }

  /**
   * Close the SSE stream connection.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.res.write('data: [DONE]\n\n');
      this.res.end();
    } catch (err) {
      log.error('sse:close_failed', { error: errorMessage(err) });
    }
  }
}
