/**
 * Client identity extraction
 *
 * A client is identified by its canonical network address: port, brackets
 * and IPv6 zone id stripped, IPv4-mapped IPv6 reduced to plain IPv4,
 * hex digits lower-cased. Requests arriving over `::ffff:1.2.3.4` and
 * `1.2.3.4` therefore share one bucket.
 */

import { isIP } from 'net';
import type { IncomingMessage } from 'http';
import { IdentityUnavailableError } from '../errors.js';

const IPV4_MAPPED_PREFIX = '::ffff:';
const BRACKETED_HOST = /^\[([^\]]+)\](?::\d+)?$/;
const HOST_WITH_PORT = /^([^:]+):\d+$/;

/**
 * Canonical form of a raw transport address
 *
 * @example
 * canonicalizeAddress('203.0.113.7:51234')      // '203.0.113.7'
 * canonicalizeAddress('[2001:DB8::1]:443')      // '2001:db8::1'
 * canonicalizeAddress('::ffff:198.51.100.2')    // '198.51.100.2'
 * canonicalizeAddress('not-an-address')         // undefined
 *
 * @returns The canonical IP, or undefined if the input is not an address
 */
export function canonicalizeAddress(raw: string | null | undefined): string | undefined {
  if (typeof raw !== 'string') {
    return undefined;
  }

  let host = raw.trim();
  if (host.length === 0) {
    return undefined;
  }

  const bracketed = BRACKETED_HOST.exec(host);
  const withPort = bracketed ? undefined : HOST_WITH_PORT.exec(host);
  host = bracketed?.[1] ?? withPort?.[1] ?? host;

  const zoneIndex = host.indexOf('%');
  if (zoneIndex !== -1) {
    host = host.slice(0, zoneIndex);
  }

  host = host.toLowerCase();

  if (host.startsWith(IPV4_MAPPED_PREFIX)) {
    const mapped = host.slice(IPV4_MAPPED_PREFIX.length);
    if (isIP(mapped) === 4) {
      host = mapped;
    }
  }

  return isIP(host) === 0 ? undefined : host;
}

/**
 * Default identity resolver: the socket's remote address
 *
 * Forwarded headers are not consulted; behind a proxy, supply a resolver
 * that reads the address the proxy vouches for.
 *
 * @throws {IdentityUnavailableError} If the socket has no parsable address
 */
export function resolveClientIdentity(req: IncomingMessage): string {
  const raw = req.socket?.remoteAddress;
  const identity = canonicalizeAddress(raw);

  if (identity === undefined) {
    throw new IdentityUnavailableError(raw);
  }

  return identity;
}
