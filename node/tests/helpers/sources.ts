import type { FetchStatus, Source } from '@/types/core';

export function source(url: string, status: FetchStatus = 'OK', text = `Text about ${url}`): Source {
  return {
    url,
    title: `Title ${url}`,
    extractedText: status === 'OK' ? text : '',
    fetchStatus: status,
    retrievedAt: '2026-01-01T00:00:00.000Z',
    originSubquery: 'q',
  };
}
