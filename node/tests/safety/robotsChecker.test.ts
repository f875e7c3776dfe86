import { describe, expect, it } from 'vitest';
import { MAX_ROBOTS_REDIRECTS, RobotsChecker } from '@/safety/robotsChecker';
import { UrlValidator } from '@/safety/urlValidator';
import type { HttpResponse } from '@/services/http/httpClient';
import { FakeHttpClient, fakeResolver, robotsTxt, unreachable } from '../helpers/fakes';

function checker(http: FakeHttpClient, now?: () => number) {
  const validator = new UrlValidator({ allowedPorts: [80, 443], maxUrlLength: 2048, resolve: fakeResolver() });
  return new RobotsChecker({ http, timeoutMs: 1000, negativeTtlMs: 60_000, validator, now });
}

function redirect(location: string): HttpResponse {
  return { status: 301, contentType: 'text/html', body: '', location };
}

describe('RobotsChecker', () => {
  it('fetches robots.txt once per origin, even under concurrent checks', async () => {
    const http = new FakeHttpClient({
      'https://site.example/robots.txt': robotsTxt('User-agent: *\nDisallow: /private\n'),
    });
    const robots = checker(http);

    const results = await Promise.all([
      robots.isAllowed('https://site.example/a', 'ResearchAgent'),
      robots.isAllowed('https://site.example/private/b', 'ResearchAgent'),
      robots.isAllowed('https://site.example/c?q=1', 'ResearchAgent'),
    ]);

    expect(results).toEqual([true, false, true]);
    expect(http.requested('https://site.example/robots.txt')).toBe(1);
  });

  it('allows everything when robots.txt is missing', async () => {
    const http = new FakeHttpClient();
    const robots = checker(http);
    expect(await robots.isAllowed('https://none.example/x', 'ResearchAgent')).toBe(true);
    expect(await robots.isAllowed('https://none.example/y', 'ResearchAgent')).toBe(true);
    expect(http.requested('https://none.example/robots.txt')).toBe(1);
  });

  it('allows everything when robots.txt cannot be fetched', async () => {
    const http = new FakeHttpClient({ 'https://down.example/robots.txt': unreachable() });
    expect(await checker(http).isAllowed('https://down.example/page', 'ResearchAgent')).toBe(true);
  });

  it('keeps separate policies per origin', async () => {
    const http = new FakeHttpClient({
      'https://a.example/robots.txt': robotsTxt('User-agent: *\nDisallow: /\n'),
    });
    const robots = checker(http);
    expect(await robots.isAllowed('https://a.example/page', 'ResearchAgent')).toBe(false);
    expect(await robots.isAllowed('https://b.example/page', 'ResearchAgent')).toBe(true);
  });
  it('retries a failed robots.txt once the negative cache entry expires', async () => {
    let clock = 0;
    const http = new FakeHttpClient({ 'https://flaky.example/robots.txt': unreachable() });
    const robots = checker(http, () => clock);

    expect(await robots.isAllowed('https://flaky.example/private/a', 'ResearchAgent')).toBe(true);
    clock = 59_999;
    expect(await robots.isAllowed('https://flaky.example/private/b', 'ResearchAgent')).toBe(true);
    expect(http.requested('https://flaky.example/robots.txt')).toBe(1);

    http.set('https://flaky.example/robots.txt', robotsTxt('User-agent: *\nDisallow: /private\n'));
    clock = 60_000;
    expect(await robots.isAllowed('https://flaky.example/private/c', 'ResearchAgent')).toBe(false);
    expect(http.requested('https://flaky.example/robots.txt')).toBe(2);
  });

  it('follows robots.txt redirects and applies the rules found there', async () => {
    const http = new FakeHttpClient({
      'https://site.example/robots.txt': redirect('https://www.site.example/robots.txt'),
      'https://www.site.example/robots.txt': robotsTxt('User-agent: *\nDisallow: /drafts\n'),
    });
    const robots = checker(http);

    expect(await robots.isAllowed('https://site.example/drafts/1', 'ResearchAgent')).toBe(false);
    expect(await robots.isAllowed('https://site.example/published', 'ResearchAgent')).toBe(true);
    expect(http.requested('https://www.site.example/robots.txt')).toBe(1);
  });

  it('does not follow a robots.txt redirect to a private address', async () => {
    const http = new FakeHttpClient({
      'https://site.example/robots.txt': redirect('http://10.0.0.5/robots.txt'),
    });
    expect(await checker(http).isAllowed('https://site.example/drafts/1', 'ResearchAgent')).toBe(true);
    expect(http.requested('http://10.0.0.5/robots.txt')).toBe(0);
  });

  it('treats an endless robots.txt redirect chain as unavailable', async () => {
    const http = new FakeHttpClient({
      'https://loop.example/robots.txt': redirect('/robots.txt'),
    });
    expect(await checker(http).isAllowed('https://loop.example/x', 'ResearchAgent')).toBe(true);
    expect(http.requested('https://loop.example/robots.txt')).toBe(MAX_ROBOTS_REDIRECTS + 1);
  });
});
