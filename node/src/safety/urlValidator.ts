import { lookup } from 'node:dns/promises';
import { isIP, type LookupFunction } from 'node:net';

export type UrlRejectionReason =
  | 'invalid_url'
  | 'unsupported_scheme'
  | 'credentials'
  | 'too_long'
  | 'blocked_port'
  | 'blocked_host'
  | 'private_address'
  | 'unresolvable';

export type UrlValidation =
  | { success: true; url: URL }
  | { success: false; reason: UrlRejectionReason; message: string };

/** Resolves a host name to every address it currently points at. */
export type HostResolver = (hostname: string) => Promise<string[]>;

export interface UrlValidatorOptions {
  allowedPorts: number[];
  maxUrlLength: number;
  resolve?: HostResolver;
}

const DEFAULT_PORTS: Record<string, number> = { 'http:': 80, 'https:': 443 };

export const resolveWithDns: HostResolver = async (hostname) => {
  const records = await lookup(hostname, { all: true, verbatim: true });
  return records.map((r) => r.address);
};

function parseIPv4(ip: string): number[] | null {
  const parts = ip.split('.').map((p) => Number(p));
  if (parts.length !== 4 || parts.some((n) => !Number.isInteger(n) || n < 0 || n > 255)) {
    return null;
  }
  return parts;
}

function isBlockedIPv4(ip: string): boolean {
  const parts = parseIPv4(ip);
  if (!parts) return true;
  const [a, b] = parts;
  if (a === 0) return true; // "this" network
  if (a === 10) return true;
  if (a === 127) return true;
  if (a === 100 && b >= 64 && b <= 127) return true; // CGNAT
  if (a === 169 && b === 254) return true; // link-local, cloud metadata
  if (a === 172 && b >= 16 && b <= 31) return true;
  if (a === 192 && b === 168) return true;
  if (a === 192 && b === 0 && parts[2] === 0) return true; // IETF protocol assignments
  if (a === 198 && (b === 18 || b === 19)) return true; // benchmarking
  if (a >= 224) return true; // multicast, reserved, broadcast
  return false;
}

function expandIPv6(ip: string): number[] | null {
  let address = ip.toLowerCase();
  const zone = address.indexOf('%');
  if (zone !== -1) address = address.slice(0, zone);

  // Embedded dotted quad (::ffff:10.0.0.1) becomes the last two groups.
  const lastColon = address.lastIndexOf(':');
  const tail = address.slice(lastColon + 1);
  if (tail.includes('.')) {
    const v4 = parseIPv4(tail);
    if (!v4) return null;
    const hi = ((v4[0] << 8) | v4[1]).toString(16);
    const lo = ((v4[2] << 8) | v4[3]).toString(16);
    address = `${address.slice(0, lastColon + 1)}${hi}:${lo}`;
  }

  const halves = address.split('::');
  if (halves.length > 2) return null;
  const head = halves[0] ? halves[0].split(':') : [];
  const rest = halves.length === 2 && halves[1] ? halves[1].split(':') : [];
  const missing = 8 - head.length - rest.length;
  if (halves.length === 1 && missing !== 0) return null;
  if (missing < 0) return null;

  const groups = [...head, ...new Array<string>(missing).fill('0'), ...rest].map((g) =>
    parseInt(g, 16),
  );
  if (groups.length !== 8 || groups.some((g) => Number.isNaN(g) || g < 0 || g > 0xffff)) {
    return null;
  }
  return groups;
}

function isBlockedIPv6(ip: string): boolean {
  const g = expandIPv6(ip);
  if (!g) return true;

  const allZeroPrefix = g.slice(0, 5).every((x) => x === 0);
  if (allZeroPrefix && g[5] === 0xffff) {
    // IPv4-mapped
    const v4 = `${g[6] >> 8}.${g[6] & 0xff}.${g[7] >> 8}.${g[7] & 0xff}`;
    return isBlockedIPv4(v4);
  }
  if (g.slice(0, 7).every((x) => x === 0) && (g[7] === 0 || g[7] === 1)) return true; // :: and ::1
  if ((g[0] & 0xfe00) === 0xfc00) return true; // unique local fc00::/7
  if ((g[0] & 0xffc0) === 0xfe80) return true; // link-local fe80::/10
  if ((g[0] & 0xff00) === 0xff00) return true; // multicast
  if (g[0] === 0x2001 && g[1] === 0x0db8) return true; // documentation
  return false;
}

export function isBlockedAddress(ip: string): boolean {
  const family = isIP(ip);
  if (family === 4) return isBlockedIPv4(ip);
  if (family === 6) return isBlockedIPv6(ip);
  return true;
}

function familyOf(family: unknown): number {
  if (family === 4 || family === 'IPv4') return 4;
  if (family === 6 || family === 'IPv6') return 6;
  return 0;
}

function lookupError(code: string, hostname: string, message: string): Error & { code: string; hostname: string } {
  return Object.assign(new Error(message), { code, hostname });
}

/**
 * Socket `lookup` that refuses to connect when any address is non-public.
 * Validation resolves a name once; this runs again at connect time, so a
 * name that re-resolves to an internal address in between is still refused.
 */
export function guardedLookup(resolve: HostResolver = resolveWithDns): LookupFunction {
  return (hostname, options, callback) => {
    const wanted = familyOf(options.family);
    void resolve(hostname).then(
      (resolved) => {
        const blocked = resolved.find((a) => isBlockedAddress(a));
        if (blocked) {
          callback(lookupError('EBLOCKED', hostname, `${hostname} resolves to non-public address ${blocked}`), '');
          return;
        }
        const addresses = resolved.filter((a) => wanted === 0 || isIP(a) === wanted);
        if (addresses.length === 0) {
          callback(lookupError('ENOTFOUND', hostname, `${hostname} has no usable addresses`), '');
          return;
        }
        if (options.all) {
          callback(null, addresses.map((address) => ({ address, family: isIP(address) })));
        } else {
          callback(null, addresses[0], isIP(addresses[0]));
        }
      },
      (err: unknown) => callback(err instanceof Error ? err : new Error(String(err)), ''),
    );
  };
}

function reject(reason: UrlRejectionReason, message: string): UrlValidation {
  return { success: false, reason, message };
}

/**
 * Gatekeeper for every outbound fetch. Host names are resolved and each address
 * is checked, so a public name pointing at an internal address is refused.
 */
export class UrlValidator {
  private readonly allowedPorts: Set<number>;
  private readonly maxUrlLength: number;
  private readonly resolve: HostResolver;

  constructor(options: UrlValidatorOptions) {
    this.allowedPorts = new Set(options.allowedPorts);
    this.maxUrlLength = options.maxUrlLength;
    this.resolve = options.resolve ?? resolveWithDns;
  }

  async validate(raw: string): Promise<UrlValidation> {
    if (raw.length > this.maxUrlLength) {
      return reject('too_long', `URL exceeds ${this.maxUrlLength} characters`);
    }

    let url: URL;
    try {
      url = new URL(raw);
    } catch {
      return reject('invalid_url', 'URL could not be parsed');
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return reject('unsupported_scheme', `Scheme ${url.protocol.replace(':', '')} is not allowed`);
    }
    if (url.username || url.password) {
      return reject('credentials', 'URLs with embedded credentials are not allowed');
    }

    const port = url.port ? Number(url.port) : DEFAULT_PORTS[url.protocol];
    if (!this.allowedPorts.has(port)) {
      return reject('blocked_port', `Port ${port} is not allowed`);
    }

    const hostname = url.hostname.replace(/^\[|\]$/g, '').toLowerCase();
    if (!hostname) return reject('invalid_url', 'URL has no host');
    if (
      hostname === 'localhost' ||
      hostname.endsWith('.localhost') ||
      hostname.endsWith('.local') ||
      hostname.endsWith('.internal')
    ) {
      return reject('blocked_host', `Host ${hostname} is internal`);
    }

    if (isIP(hostname)) {
      return isBlockedAddress(hostname)
        ? reject('private_address', `Address ${hostname} is not public`)
        : { success: true, url };
    }

    let addresses: string[];
    try {
      addresses = await this.resolve(hostname);
    } catch {
      return reject('unresolvable', `Host ${hostname} could not be resolved`);
    }
    if (addresses.length === 0) {
      return reject('unresolvable', `Host ${hostname} has no addresses`);
    }

    const blocked = addresses.find((a) => isBlockedAddress(a));
    if (blocked) {
      return reject('private_address', `Host ${hostname} resolves to non-public address ${blocked}`);
    }
    return { success: true, url };
  }
}
