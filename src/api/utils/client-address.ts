/**
 * Client address resolution
 *
 * The socket peer is the only address a client cannot forge. Forwarded
 * headers count only when the peer is a configured proxy, and then only
 * up to the first hop that is not one.
 */

import { getConnInfo } from '@hono/node-server/conninfo';
import type { Context } from 'hono';

export type RemoteAddressReader = (c: Context) => string | undefined;

export interface ClientAddressOptions {
  remoteAddress?: RemoteAddressReader;
  trustedProxies?: readonly string[];
}

/**
 * Peer address of the Node.js socket behind the request
 */
export const socketAddress: RemoteAddressReader = (c) =>
  getConnInfo(c).remote.address;

export function normalizeAddress(address: string): string {
  const trimmed = address.trim().toLowerCase();
  // IPv4-mapped IPv6
  return trimmed.startsWith('::ffff:') && trimmed.includes('.')
    ? trimmed.slice(7)
    : trimmed;
}

export function resolveClientAddress(
  c: Context,
  options: ClientAddressOptions = {}
): string | undefined {
  const raw = options.remoteAddress?.(c);
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const peer = normalizeAddress(raw);
  const trusted = new Set((options.trustedProxies ?? []).map(normalizeAddress));
  if (!trusted.has(peer)) {
    return peer;
  }

  const hops = (c.req.header('x-forwarded-for') ?? '')
    .split(',')
    .map(normalizeAddress)
    .filter((hop) => hop !== '');

  for (let i = hops.length - 1; i >= 0; i--) {
    const hop = hops[i];
    if (hop !== undefined && !trusted.has(hop)) {
      return hop;
    }
  }
  return hops[0] ?? peer;
}
