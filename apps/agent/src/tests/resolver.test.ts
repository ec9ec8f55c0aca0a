import { describe, it, expect } from 'vitest';
import { parseRangeList } from '../ip/cidr.js';
import { resolveClientAddress } from '../ip/resolver.js';

const proxies = parseRangeList(['10.0.0.0/8']).ranges;

describe('resolveClientAddress', () => {
    it('uses the socket peer when no proxy is trusted', () => {
        expect(resolveClientAddress('198.51.100.7', { 'x-forwarded-for': '203.0.113.9' }, [])).toEqual({
            address: '198.51.100.7', proxy: null, method: 'remote_addr',
        });
    });

    it('ignores headers from an untrusted peer', () => {
        expect(resolveClientAddress('198.51.100.7', { 'x-real-ip': '203.0.113.9' }, proxies)).toEqual({
            address: '198.51.100.7', proxy: null, method: 'remote_addr',
        });
    });

    it('prefers X-Real-IP behind a trusted proxy', () => {
        const headers = { 'x-real-ip': '203.0.113.9', 'x-forwarded-for': '192.0.2.1' };
        expect(resolveClientAddress('10.0.0.2', headers, proxies)).toEqual({
            address: '203.0.113.9', proxy: '10.0.0.2', method: 'x-real-ip',
        });
    });

    it('takes the right-most X-Forwarded-For hop that is not a proxy', () => {
        const headers = { 'x-forwarded-for': '192.0.2.1, 198.51.100.7, 10.0.0.3' };
        expect(resolveClientAddress('::ffff:10.0.0.2', headers, proxies)).toEqual({
            address: '198.51.100.7', proxy: '10.0.0.2', method: 'x-forwarded-for',
        });
    });

    it('falls back to the peer on a malformed hop', () => {
        const headers = { 'x-forwarded-for': '198.51.100.7, unknown' };
        expect(resolveClientAddress('10.0.0.2', headers, proxies)?.method).toBe('remote_addr');
    });

    it('falls back to the peer when every hop is a proxy', () => {
        const headers = { 'x-forwarded-for': '10.0.0.5, 10.0.0.4' };
        expect(resolveClientAddress('10.0.0.2', headers, proxies)).toEqual({
            address: '10.0.0.2', proxy: null, method: 'remote_addr',
        });
    });

    it('normalizes the header address', () => {
        expect(resolveClientAddress('10.0.0.2', { 'x-real-ip': '2001:DB8::7' }, proxies)?.address).toBe('2001:db8::7');
    });

    it('returns null without a usable socket address', () => {
        expect(resolveClientAddress(undefined, {}, proxies)).toBeNull();
        expect(resolveClientAddress('garbage', {}, proxies)).toBeNull();
    });
});
