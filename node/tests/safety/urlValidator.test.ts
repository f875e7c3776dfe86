import { describe, expect, it } from 'vitest';
import type { LookupAddress } from 'node:dns';
import type { LookupFunction } from 'node:net';
import { UrlValidator, guardedLookup, isBlockedAddress, type HostResolver } from '@/safety/urlValidator';
import { PUBLIC_IP, fakeResolver } from '../helpers/fakes';

function validator(resolve = fakeResolver()) {
  return new UrlValidator({ allowedPorts: [80, 443], maxUrlLength: 2048, resolve });
}

async function reasonFor(url: string, v = validator()): Promise<string> {
  const result = await v.validate(url);
  return result.success ? 'accepted' : result.reason;
}

describe('UrlValidator', () => {
  it('accepts a public https URL', async () => {
    const result = await validator().validate('https://example.com/article');
    expect(result.success).toBe(true);
    if (result.success) expect(result.url.hostname).toBe('example.com');
  });

  it('rejects loopback and metadata addresses', async () => {
    expect(await reasonFor('http://127.0.0.1/')).toBe('private_address');
    expect(await reasonFor('http://169.254.169.254/latest/meta-data')).toBe('private_address');
    expect(await reasonFor('http://[::1]/')).toBe('private_address');
    expect(await reasonFor('http://10.1.2.3/')).toBe('private_address');
  });

  it('rejects non-http schemes', async () => {
    expect(await reasonFor('ftp://example.com')).toBe('unsupported_scheme');
    expect(await reasonFor('file:///etc/passwd')).toBe('unsupported_scheme');
  });

  it('rejects credentials, ports and internal names', async () => {
    expect(await reasonFor('https://user:pw@example.com/')).toBe('credentials');
    expect(await reasonFor('http://example.com:8080/')).toBe('blocked_port');
    expect(await reasonFor('http://localhost/')).toBe('blocked_host');
    expect(await reasonFor('http://printer.local/')).toBe('blocked_host');
    expect(await reasonFor('http://db.internal/')).toBe('blocked_host');
  });

  it('rejects garbage and overlong input', async () => {
    expect(await reasonFor('not a url')).toBe('invalid_url');
    expect(await reasonFor(`https://example.com/${'a'.repeat(2100)}`)).toBe('too_long');
  });

  it('rejects a public name that resolves to a private address', async () => {
    const v = validator(fakeResolver({ 'rebind.example': ['93.184.215.14', '192.168.1.10'] }));
    const result = await v.validate('https://rebind.example/');
    expect(result).toEqual({
      success: false,
      reason: 'private_address',
      message: 'Host rebind.example resolves to non-public address 192.168.1.10',
    });
  });

  it('reports unresolvable hosts', async () => {
    const v = validator(fakeResolver({ 'gone.example': new Error('ENOTFOUND'), 'empty.example': [] }));
    expect(await reasonFor('https://gone.example/', v)).toBe('unresolvable');
    expect(await reasonFor('https://empty.example/', v)).toBe('unresolvable');
  });
});

describe('isBlockedAddress', () => {
  it.each([
    ['127.0.0.1', true],
    ['172.20.0.1', true],
    ['100.64.0.1', true],
    ['224.0.0.1', true],
    ['::ffff:10.0.0.1', true],
    ['fd00::1', true],
    ['fe80::1', true],
    ['8.8.8.8', false],
    ['172.32.0.1', false],
    ['2606:4700::1111', false],
  ])('%s -> %s', (ip, blocked) => {
    expect(isBlockedAddress(ip)).toBe(blocked);
  });
});

type LookupResult = { error: NodeJS.ErrnoException | null; address: string | LookupAddress[]; family?: number };

function lookupOnce(lookup: LookupFunction, hostname: string, options: { all?: boolean; family?: number } = {}) {
  return new Promise<LookupResult>((resolve) => {
    lookup(hostname, options, (error, address, family) => resolve({ error, address, family }));
  });
}

describe('guardedLookup', () => {
  it('refuses a name that re-resolves to loopback after validation', async () => {
    const answers = [[PUBLIC_IP], ['127.0.0.1']];
    let calls = 0;
    const rebinding: HostResolver = async () => answers[Math.min(calls++, answers.length - 1)];

    expect((await validator(rebinding).validate('https://rebind.example/')).success).toBe(true);

    const result = await lookupOnce(guardedLookup(rebinding), 'rebind.example');
    expect(result.error?.code).toBe('EBLOCKED');
    expect(result.error?.message).toBe('rebind.example resolves to non-public address 127.0.0.1');
  });

  it('refuses when any one of several addresses is internal', async () => {
    const resolve = fakeResolver({ 'mixed.example': [PUBLIC_IP, '10.1.2.3'] });
    const result = await lookupOnce(guardedLookup(resolve), 'mixed.example', { all: true });
    expect(result.error?.code).toBe('EBLOCKED');
  });

  it('answers with the first public address and its family', async () => {
    const result = await lookupOnce(guardedLookup(fakeResolver()), 'ok.example');
    expect(result).toEqual({ error: null, address: PUBLIC_IP, family: 4 });
  });

  it('returns every address of the requested family when asked for all', async () => {
    const resolve = fakeResolver({ 'dual.example': ['2606:4700::1111', PUBLIC_IP] });
    const result = await lookupOnce(guardedLookup(resolve), 'dual.example', { all: true, family: 4 });
    expect(result).toEqual({ error: null, address: [{ address: PUBLIC_IP, family: 4 }], family: undefined });
  });

  it('passes resolver failures through', async () => {
    const resolve = fakeResolver({ 'gone.example': new Error('ENOTFOUND gone.example') });
    const result = await lookupOnce(guardedLookup(resolve), 'gone.example');
    expect(result.error?.message).toBe('ENOTFOUND gone.example');
  });
});
