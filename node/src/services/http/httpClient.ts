import http from 'node:http';
import https from 'node:https';
import axios, { AxiosError } from 'axios';
import { guardedLookup, type HostResolver } from '@/safety/urlValidator';
import { FetchFailedError, CancelledError } from '@/utils/errors';

export interface HttpRequestOptions {
  headers: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  contentType: string;
  body: string;
  /** Redirect target as sent by the server, unresolved. */
  location?: string;
}

/**
 * Single-hop GET. Redirects are returned, not followed, so callers can
 * validate each hop before requesting it.
 */
export interface HttpClient {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

function headerValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

export interface AxiosHttpClientOptions {
  maxBytes: number;
  /** Used again at connect time; defaults to the system resolver. */
  resolve?: HostResolver;
}

export class AxiosHttpClient implements HttpClient {
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(private readonly options: AxiosHttpClientOptions) {
    const lookup = guardedLookup(options.resolve);
    this.httpAgent = new http.Agent({ lookup });
    this.httpsAgent = new https.Agent({ lookup });
  }

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    try {
      const res = await axios.get<string>(url, {
        headers: options.headers,
        timeout: options.timeoutMs,
        signal,
        maxRedirects: 0,
        maxContentLength: this.options.maxBytes,
        httpAgent: this.httpAgent,
        httpsAgent: this.httpsAgent,
        responseType: 'text',
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      });

      return {
        status: res.status,
        contentType: headerValue(res.headers['content-type']) ?? '',
        body: typeof res.data === 'string' ? res.data : '',
        location: headerValue(res.headers['location']),
      };
    } catch (err) {
      if (options.signal?.aborted) throw new CancelledError();
      if (timeout.aborted) {
        throw new FetchFailedError(`Timed out after ${options.timeoutMs}ms`, undefined, { cause: err });
      }
      if (err instanceof AxiosError) {
        throw new FetchFailedError(err.code ? `${err.code}: ${err.message}` : err.message, undefined, {
          cause: err,
        });
      }
      throw new FetchFailedError(err instanceof Error ? err.message : String(err), undefined, { cause: err });
    }
  }
}
