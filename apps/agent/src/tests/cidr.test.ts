import { describe, it, expect } from 'vitest';
import { ipv6ToNum, isInAnyRange, isInRange, normalizeAddress, parseCIDR, parseRangeList } from '../ip/cidr.js';

describe('normalizeAddress', () => {
    it.each([
        ['10.0.0.1', '10.0.0.1'],
        [' 10.0.0.1 ', '10.0.0.1'],
        ['::ffff:10.0.0.1', '10.0.0.1'],
        ['::FFFF:10.0.0.1', '10.0.0.1'],
        ['2001:DB8::1', '2001:db8::1'],
        ['[2001:db8::1]', '2001:db8::1'],
        ['fe80::1%eth0', 'fe80::1'],
    ])('%s → %s', (raw, expected) => {
        expect(normalizeAddress(raw)).toBe(expected);
    });

    it.each(['', 'example.com', '10.0.0', '256.0.0.1', '1::2::3'])('rejects %j', (raw) => {
        expect(normalizeAddress(raw)).toBeNull();
    });
});

describe('parseCIDR', () => {
    it('masks the network address', () => {
        expect(parseCIDR('10.1.2.3/8')).toEqual({ ip: 0x0a000000n, mask: 0xff000000n, bits: 32 });
    });

    it('treats a bare address as a host range', () => {
        expect(parseCIDR('192.0.2.1')).toEqual({ ip: 0xc0000201n, mask: 0xffffffffn, bits: 32 });
    });

    it('accepts /0', () => {
        const range = parseCIDR('0.0.0.0/0');
        expect(range).not.toBeNull();
        if (range) expect(isInRange('203.0.113.9', range)).toBe(true);
    });

    it.each(['10.0.0.0/33', '10.0.0.0/', '10.0.0.0/x', '2001:db8::/129', 'nonsense/8'])('rejects %s', (raw) => {
        expect(parseCIDR(raw)).toBeNull();
    });
});

describe('ipv6ToNum', () => {
    it('expands :: and a trailing dotted quad', () => {
        expect(ipv6ToNum('::1')).toBe(1n);
        expect(ipv6ToNum('::ffff:1.2.3.4')).toBe(0xffff01020304n);
        expect(ipv6ToNum('1::2::3')).toBe(-1n);
    });
});

describe('isInRange', () => {
    const v4 = parseRangeList(['10.0.0.0/8']).ranges;
    const v6 = parseRangeList(['2001:db8::/32']).ranges;

    it('matches within the family', () => {
        expect(isInAnyRange('10.200.1.1', v4)).toBe(true);
        expect(isInAnyRange('11.0.0.1', v4)).toBe(false);
        expect(isInAnyRange('2001:db8:ffff::5', v6)).toBe(true);
        expect(isInAnyRange('2001:db9::5', v6)).toBe(false);
    });

    it('matches mapped IPv4 against IPv4 ranges', () => {
        expect(isInAnyRange('::ffff:10.1.2.3', v4)).toBe(true);
    });

    it('never matches across families or on garbage', () => {
        expect(isInAnyRange('10.0.0.1', v6)).toBe(false);
        expect(isInAnyRange('2001:db8::1', v4)).toBe(false);
        expect(isInAnyRange('not-an-ip', v4)).toBe(false);
    });
});

describe('parseRangeList', () => {
    it('separates entries that do not parse', () => {
        const { ranges, invalid } = parseRangeList(['10.0.0.0/8', 'bogus', '2001:db8::1', '1.2.3.4/40']);
        expect(ranges.map(r => r.bits)).toEqual([32, 128]);
        expect(invalid).toEqual(['bogus', '1.2.3.4/40']);
    });
});
