/**
 * CIDR Matching — Pure math, no I/O.
 * Supports IPv4 and IPv6. A bare address is treated as a single-host range.
 */

import { isIP } from 'net';

export interface ParsedCIDR {
    ip: bigint;
    mask: bigint;
    bits: 32 | 128;
}

const V4_MAPPED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/**
 * Canonical form used as the key for all per-address state:
 * IPv4-mapped IPv6 is reduced to dotted IPv4, IPv6 is lower-cased,
 * brackets and zone ids are dropped. Returns null for anything that is
 * not an IP address.
 */
export function normalizeAddress(raw: string): string | null {
    let value = raw.trim();
    if (value.startsWith('[') && value.endsWith(']')) value = value.slice(1, -1);
    const zone = value.indexOf('%');
    if (zone !== -1) value = value.slice(0, zone);

    const mapped = value.match(V4_MAPPED);
    if (mapped && isIP(mapped[1]) === 4) return mapped[1];

    switch (isIP(value)) {
        case 4: return value;
        case 6: return value.toLowerCase();
        default: return null;
    }
}

/** Parse an IPv4 address string to a 32-bit number */
export function ipv4ToNum(ip: string): bigint {
    const parts = ip.split('.');
    if (parts.length !== 4) return -1n;
    let num = 0n;
    for (const p of parts) {
        if (!/^\d{1,3}$/.test(p)) return -1n;
        const n = Number(p);
        if (n > 255) return -1n;
        num = (num << 8n) | BigInt(n);
    }
    return num;
}

/** Expand a (possibly abbreviated) IPv6 address to 8 hex groups */
function ipv6Groups(ip: string): number[] | null {
    let tail: number[] = [];
    let head = ip;

    // trailing dotted quad (::ffff:1.2.3.4, 64:ff9b::1.2.3.4)
    const dotted = ip.match(/^(.*:)(\d{1,3}(?:\.\d{1,3}){3})$/);
    if (dotted) {
        const v4 = ipv4ToNum(dotted[2]);
        if (v4 === -1n) return null;
        tail = [Number(v4 >> 16n), Number(v4 & 0xffffn)];
        head = dotted[1].endsWith('::') ? dotted[1] : dotted[1].slice(0, -1);
    }

    const halves = head.split('::');
    if (halves.length > 2) return null;

    const parse = (s: string): number[] | null => {
        if (s === '') return [];
        const out: number[] = [];
        for (const g of s.split(':')) {
            if (!/^[0-9a-f]{1,4}$/i.test(g)) return null;
            out.push(parseInt(g, 16));
        }
        return out;
    };

    const left = parse(halves[0]);
    if (!left) return null;

    if (halves.length === 2) {
        const right = parse(halves[1]);
        if (!right) return null;
        const fill = 8 - left.length - right.length - tail.length;
        if (fill < 1) return null;
        return [...left, ...new Array<number>(fill).fill(0), ...right, ...tail];
    }

    const groups = [...left, ...tail];
    return groups.length === 8 ? groups : null;
}

/** Parse an IPv6 address to a 128-bit bigint */
export function ipv6ToNum(ip: string): bigint {
    const groups = ipv6Groups(ip);
    if (!groups) return -1n;
    let num = 0n;
    for (const g of groups) num = (num << 16n) | BigInt(g);
    return num;
}

export function isIPv6(ip: string): boolean {
    return ip.includes(':');
}

/** Parse "10.0.0.0/8", "2001:db8::/32" or a bare address (host range). */
export function parseCIDR(cidr: string): ParsedCIDR | null {
    const slash = cidr.indexOf('/');
    const ipStr = (slash === -1 ? cidr : cidr.slice(0, slash)).trim();
    const v6 = isIPv6(ipStr);
    const bits = v6 ? 128 : 32;

    let prefix = bits;
    if (slash !== -1) {
        const prefixStr = cidr.slice(slash + 1).trim();
        if (!/^\d{1,3}$/.test(prefixStr)) return null;
        prefix = Number(prefixStr);
        if (prefix > bits) return null;
    }

    const ip = v6 ? ipv6ToNum(ipStr) : ipv4ToNum(ipStr);
    if (ip === -1n) return null;

    const width = BigInt(bits);
    const full = (1n << width) - 1n;
    const mask = prefix === 0 ? 0n : (full << BigInt(bits - prefix)) & full;
    return { ip: ip & mask, mask, bits };
}

/** Check if an IP is within a parsed CIDR range */
export function isInRange(ip: string, range: ParsedCIDR): boolean {
    const address = normalizeAddress(ip);
    if (address === null) return false;

    const v6 = isIPv6(address);
    if (v6 !== (range.bits === 128)) return false;

    const num = v6 ? ipv6ToNum(address) : ipv4ToNum(address);
    if (num === -1n) return false;
    return (num & range.mask) === range.ip;
}

export function isInAnyRange(ip: string, ranges: readonly ParsedCIDR[]): boolean {
    return ranges.some(range => isInRange(ip, range));
}

/**
 * Parse a configured list of addresses/CIDRs. Entries that do not parse
 * are returned separately so the caller can report them.
 */
export function parseRangeList(entries: readonly string[]): { ranges: ParsedCIDR[]; invalid: string[] } {
    const ranges: ParsedCIDR[] = [];
    const invalid: string[] = [];
    for (const entry of entries) {
        const parsed = parseCIDR(entry);
        if (parsed) ranges.push(parsed);
        else invalid.push(entry);
    }
    return { ranges, invalid };
}
