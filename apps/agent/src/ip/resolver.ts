/**
 * Client Address Resolver
 * Picks the address admission state is keyed on. Forwarding headers are
 * trusted only when the socket peer sits inside a configured proxy range;
 * otherwise they are ignored (spoofable).
 *
 * Header priority behind a trusted proxy:
 *   1. X-Real-IP
 *   2. X-Forwarded-For, right to left, first entry not itself a proxy
 *   3. socket peer
 */

import type { IncomingHttpHeaders } from 'http';
import { isInAnyRange, normalizeAddress, type ParsedCIDR } from './cidr.js';

export interface ResolvedAddress {
    address: string;
    proxy: string | null;
    method: 'x-real-ip' | 'x-forwarded-for' | 'remote_addr';
}

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
    const value = headers[name];
    return Array.isArray(value) ? value[value.length - 1] : value;
}

/**
 * Returns null only when the socket address itself is missing or
 * malformed (a destroyed socket reports `undefined`).
 */
export function resolveClientAddress(
    remoteAddress: string | undefined,
    headers: IncomingHttpHeaders,
    trustedProxies: readonly ParsedCIDR[],
): ResolvedAddress | null {
    const peer = remoteAddress === undefined ? null : normalizeAddress(remoteAddress);
    if (peer === null) return null;

    if (trustedProxies.length === 0 || !isInAnyRange(peer, trustedProxies)) {
        return { address: peer, proxy: null, method: 'remote_addr' };
    }

    const realIp = headerValue(headers, 'x-real-ip');
    if (realIp) {
        const address = normalizeAddress(realIp);
        if (address) return { address, proxy: peer, method: 'x-real-ip' };
    }

    const forwarded = headerValue(headers, 'x-forwarded-for');
    if (forwarded) {
        // the right-most hops were appended by our own proxies
        const hops = forwarded.split(',').map(h => h.trim()).filter(h => h.length > 0);
        for (let i = hops.length - 1; i >= 0; i--) {
            const address = normalizeAddress(hops[i]);
            if (address === null) break;
            if (!isInAnyRange(address, trustedProxies)) {
                return { address, proxy: peer, method: 'x-forwarded-for' };
            }
        }
    }

    return { address: peer, proxy: null, method: 'remote_addr' };
}
