import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { TelemetrySignals } from '@edgeguard/core';
import { createDefense, DEFAULT_DEFENSE_CONFIG, type DefenseConfig, type RateLimiter, type Verdict } from '../defense/index.js';
import { AdmissionEngine } from '../defense/engine.js';

const A = '198.51.100.7';
const B = '203.0.113.9';
const T0 = 1_700_000_000_000;

function defense(overrides: Partial<DefenseConfig> = {}, signals?: () => TelemetrySignals | null) {
    return createDefense({ ...DEFAULT_DEFENSE_CONFIG, ...overrides }, { signals, clock: () => T0 });
}

function released(verdict: Verdict): Verdict {
    if (verdict.action === 'allow') verdict.lease.release();
    return verdict;
}

describe('AdmissionEngine', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    it('escalates a burst into an exclusion', () => {
        const { engine, registry } = defense({ rateBase: 5, rateBurst: 20, banThreshold: 5, banSeconds: 120 });

        const verdicts = Array.from({ length: 25 }, () => released(engine.admit({ address: A, path: '/' }, T0)));
        expect(verdicts.filter(v => v.action === 'allow')).toHaveLength(20);
        expect(verdicts.slice(20).every(v => v.action === 'reject' && v.reason === 'rate_limited')).toBe(true);
        expect(verdicts[20]).toEqual({ action: 'reject', status: 429, reason: 'rate_limited', message: 'Too many requests', retryAfterSeconds: 1 });

        expect(registry.isExcluded(A, T0)).toBe(true);
        expect(engine.admit({ address: A, path: '/' }, T0 + 1000)).toEqual({
            action: 'reject',
            status: 429,
            reason: 'excluded',
            message: 'Too many requests',
            retryAfterSeconds: 119,
        });
    });

    it('refuses the request over the per-address concurrency limit without touching rate state', () => {
        const { engine, limiter, escalator } = defense({ perAddressConcurrencyLimit: 10 });

        const held = Array.from({ length: 10 }, () => engine.admit({ address: A, path: '/slow' }, T0));
        expect(held.every(v => v.action === 'allow')).toBe(true);
        const sizeBefore = limiter.size;

        expect(engine.admit({ address: A, path: '/slow' }, T0)).toEqual({
            action: 'reject',
            status: 429,
            reason: 'address_concurrency',
            message: 'Too many concurrent requests',
            retryAfterSeconds: 1,
        });
        expect(limiter.size).toBe(sizeBefore);
        expect(escalator.violations(A)).toBe(0);

        expect(engine.admit({ address: B, path: '/' }, T0).action).toBe('allow');
    });

    it('answers 503 when the global limit is reached', () => {
        const { engine } = defense({ globalConcurrencyLimit: 2, perAddressConcurrencyLimit: 2 });
        engine.admit({ address: A, path: '/' }, T0);
        engine.admit({ address: B, path: '/' }, T0);
        const verdict = engine.admit({ address: '192.0.2.1', path: '/' }, T0);
        expect(verdict.action === 'reject' && [verdict.status, verdict.reason]).toEqual([503, 'global_concurrency']);
    });

    it('gives the slot back when the rate limiter refuses', () => {
        const { engine, gate } = defense({ rateBurst: 1, rateBase: 1, banThreshold: 100 });
        released(engine.admit({ address: A, path: '/' }, T0));
        const verdict = engine.admit({ address: A, path: '/' }, T0);

        expect(verdict.action).toBe('reject');
        expect(gate.globalCount).toBe(0);
        expect(gate.active(A)).toBe(0);
    });

    it('releases a lease once however often the transport calls it', () => {
        const { engine, gate } = defense();
        const verdict = engine.admit({ address: A, path: '/' }, T0);
        if (verdict.action !== 'allow') throw new Error('expected allow');
        verdict.lease.release();
        verdict.lease.release();
        expect(gate.globalCount).toBe(0);
    });

    it('skips the rate limiter for exempt paths but still counts concurrency', () => {
        const { engine, limiter, gate } = defense({ rateBurst: 1, rateBase: 1, exemptPaths: ['/healthz'] });
        for (let i = 0; i < 5; i++) {
            expect(released(engine.admit({ address: A, path: '/healthz/live' }, T0)).action).toBe('allow');
        }
        expect(limiter.size).toBe(0);

        engine.admit({ address: A, path: '/healthz' }, T0);
        expect(gate.active(A)).toBe(1);
    });

    it('matches exempt paths on segment boundaries', () => {
        const { engine, limiter } = defense({ exemptPaths: ['/healthz', '/static/'] });
        released(engine.admit({ address: A, path: '/healthz' }, T0));
        released(engine.admit({ address: A, path: '/static/app.css' }, T0));
        expect(limiter.size).toBe(0);

        released(engine.admit({ address: A, path: '/healthz-admin' }, T0));
        expect(limiter.size).toBe(1);
        released(engine.admit({ address: B, path: '/healthzz' }, T0));
        expect(limiter.size).toBe(2);
    });

    it('answers excluded addresses the configured way', () => {
        const until = T0 + 30_000;
        const build = (exclusionResponse: DefenseConfig['exclusionResponse']) => {
            const d = defense({ exclusionResponse });
            d.registry.exclude(A, { tier: 'local', expiresAt: until, reason: 'test', source: 'admin' }, T0);
            return d.engine;
        };

        expect(build('drop').admit({ address: A, path: '/' }, T0)).toEqual({ action: 'drop', reason: 'excluded' });
        expect(build('not_found').admit({ address: A, path: '/' }, T0)).toEqual({
            action: 'reject', status: 404, reason: 'excluded', message: 'Not found',
        });
        expect(build('too_many_requests').admit({ address: A, path: '/' }, T0 + 500)).toEqual({
            action: 'reject', status: 429, reason: 'excluded', message: 'Too many requests', retryAfterSeconds: 30,
        });
    });

    it('omits Retry-After for permanent exclusions', () => {
        const { engine, registry } = defense();
        registry.exclude(A, { tier: 'local', expiresAt: null, reason: 'test', source: 'admin' }, T0);
        expect(engine.admit({ address: A, path: '/' }, T0)).toEqual({
            action: 'reject', status: 429, reason: 'excluded', message: 'Too many requests',
        });
    });

    it('sheds load once established connections reach the threshold', () => {
        let tcpEstablished = 99;
        const signals = (): TelemetrySignals => ({ tcpEstablished, linkUtilizationPercent: null });
        const { engine, gate } = defense({ shedAtEstablished: 100 }, signals);

        expect(released(engine.admit({ address: A, path: '/' }, T0)).action).toBe('allow');
        tcpEstablished = 100;
        expect(engine.admit({ address: A, path: '/' }, T0)).toEqual({
            action: 'reject', status: 503, reason: 'load_shed', message: 'Server busy', retryAfterSeconds: 1,
        });
        expect(gate.globalCount).toBe(0);
    });

    it('never sheds without telemetry', () => {
        const { engine } = defense({ shedAtEstablished: 1 }, () => null);
        expect(engine.admit({ address: A, path: '/' }, T0).action).toBe('allow');
    });

    describe('when a component throws', () => {
        function failing(failMode: DefenseConfig['failMode']) {
            const d = defense({ failMode });
            const limiter: RateLimiter = {
                strategy: 'token_bucket',
                size: 0,
                check: () => { throw new Error('store offline'); },
                reset: () => {},
                evictIdle: () => 0,
            };
            const engine = new AdmissionEngine({ ...DEFAULT_DEFENSE_CONFIG, failMode }, {
                registry: d.registry, limiter, gate: d.gate, escalator: d.escalator,
            });
            return { engine, gate: d.gate };
        }

        it('rejects with 503 when failing closed and frees the slot', () => {
            const { engine, gate } = failing('closed');
            expect(engine.admit({ address: A, path: '/' }, T0)).toEqual({
                action: 'reject', status: 503, reason: 'engine_failure', message: 'Service unavailable',
            });
            expect(gate.globalCount).toBe(0);
        });

        it('admits with a detached lease when failing open', () => {
            const { engine, gate } = failing('open');
            const verdict = engine.admit({ address: A, path: '/' }, T0);
            expect(verdict.action).toBe('allow');
            expect(gate.globalCount).toBe(0);
            if (verdict.action === 'allow') verdict.lease.release();
            expect(gate.globalCount).toBe(0);
        });
    });

    it('reports a status snapshot', () => {
        const { engine, registry } = defense({ globalConcurrencyLimit: 50, perAddressConcurrencyLimit: 4 });
        engine.admit({ address: A, path: '/' }, T0);
        registry.exclude(B, { tier: 'local', expiresAt: null, reason: 'test', source: 'admin' }, T0);

        expect(engine.status(T0)).toEqual({
            globalActive: 1,
            globalLimit: 50,
            perAddressLimit: 4,
            strategy: 'token_bucket',
            profile: 'soft',
            failMode: 'closed',
            packetFilter: null,
            excludedCount: 1,
            excluded: [{ address: B, tier: 'local', remainingSeconds: null, reason: 'test', source: 'admin', sync: null }],
            tracked: { rate: 1, concurrency: 1, violations: 0 },
        });
    });
});
