/**
 * Admission Engine — one decision per inbound request.
 *
 * Order (fixed):
 *   1. exclusion registry   → excluded addresses never touch limiter state
 *   2. load shedding        → optional, from the latest telemetry signals
 *   3. concurrency gate     → global 503, per-address 429
 *   4. rate limiter         → 429, feeds the escalator
 *
 * A later stage that refuses releases what earlier stages acquired, so a
 * rejected request leaves the concurrency counters as it found them.
 */

import { log, type TelemetrySignals } from '@edgeguard/core';
import { DetachedLease, type ConcurrencyGate, type Lease } from './concurrency-gate.js';
import { errorMessage } from './errors.js';
import type { ViolationEscalator } from './escalator.js';
import type { RateLimiter } from './rate-limiter.js';
import type { ExclusionRegistry } from './registry.js';
import type { AdmissionRequest, DefenseConfig, ExclusionEntry, ExclusionView, RejectReason } from './types.js';

export type Verdict =
    | { action: 'allow'; lease: Lease }
    | {
        action: 'reject';
        status: 429 | 503 | 404;
        reason: RejectReason;
        retryAfterSeconds?: number;
        message: string;
    }
    | { action: 'drop'; reason: 'excluded' };

export type EngineConfig = Pick<DefenseConfig,
    'failMode' | 'exemptPaths' | 'exclusionResponse' | 'shedAtEstablished' |
    'globalConcurrencyLimit' | 'perAddressConcurrencyLimit' | 'profile'>;

export interface EngineComponents {
    registry: ExclusionRegistry;
    limiter: RateLimiter;
    gate: ConcurrencyGate;
    escalator: ViolationEscalator;
    /** Latest telemetry, or null before the first sample. */
    signals?: () => TelemetrySignals | null;
    clock?: () => number;
}

export interface DefenseStatus {
    globalActive: number;
    globalLimit: number;
    perAddressLimit: number;
    strategy: RateLimiter['strategy'];
    profile: EngineConfig['profile'];
    failMode: EngineConfig['failMode'];
    packetFilter: string | null;
    excludedCount: number;
    excluded: ExclusionView[];
    tracked: {
        rate: number;
        concurrency: number;
        violations: number;
    };
}

const MESSAGES: Record<RejectReason, string> = {
    excluded: 'Too many requests',
    global_concurrency: 'Server busy',
    address_concurrency: 'Too many concurrent requests',
    rate_limited: 'Too many requests',
    load_shed: 'Server busy',
    engine_failure: 'Service unavailable',
};

function reject(status: 429 | 503 | 404, reason: RejectReason, retryAfterSeconds?: number): Verdict {
    const message = status === 404 ? 'Not found' : MESSAGES[reason];
    if (retryAfterSeconds === undefined) return { action: 'reject', status, reason, message };
    return { action: 'reject', status, reason, message, retryAfterSeconds: Math.max(1, Math.ceil(retryAfterSeconds)) };
}

export class AdmissionEngine {
    private config: EngineConfig;
    private registry: ExclusionRegistry;
    private limiter: RateLimiter;
    private gate: ConcurrencyGate;
    private escalator: ViolationEscalator;
    private signals: () => TelemetrySignals | null;
    private clock: () => number;

    constructor(config: EngineConfig, components: EngineComponents) {
        this.config = { ...config };
        this.registry = components.registry;
        this.limiter = components.limiter;
        this.gate = components.gate;
        this.escalator = components.escalator;
        this.signals = components.signals ?? (() => null);
        this.clock = components.clock ?? Date.now;
    }

    admit(request: AdmissionRequest, now: number = this.clock()): Verdict {
        let lease: Lease | null = null;
        try {
            const { address, path } = request;

            const exclusion = this.registry.lookup(address, now);
            if (exclusion) return this.excludedVerdict(exclusion, now);

            if (this.shouldShed()) {
                log(`[Engine] Shedding ${address} ${path}`, 'debug');
                return reject(503, 'load_shed', 1);
            }

            const gate = this.gate.lease(address);
            if (!gate.admitted) {
                log(`[Engine] ${address} refused by ${gate.scope} concurrency limit`, 'debug');
                return gate.scope === 'global'
                    ? reject(503, 'global_concurrency', 1)
                    : reject(429, 'address_concurrency', 1);
            }
            lease = gate.lease;

            if (!this.isExempt(path)) {
                const decision = this.limiter.check(address, now);
                if (!decision.allowed) {
                    lease.release();
                    lease = null;

                    const outcome = this.escalator.recordViolation(address, now);
                    log(`[Engine] ${address} rate limited (${outcome.kind})`, 'debug');
                    return reject(429, 'rate_limited', decision.retryAfterSeconds ?? 1);
                }
            }

            return { action: 'allow', lease };
        } catch (e) {
            lease?.release();
            log(`[Engine] ❌ Admission failed for ${request.address}: ${errorMessage(e)}`, 'error');
            return this.config.failMode === 'open'
                ? { action: 'allow', lease: new DetachedLease() }
                : reject(503, 'engine_failure');
        }
    }

    status(now: number = this.clock()): DefenseStatus {
        const excluded = this.registry.list(now);
        return {
            globalActive: this.gate.globalCount,
            globalLimit: this.config.globalConcurrencyLimit,
            perAddressLimit: this.config.perAddressConcurrencyLimit,
            strategy: this.limiter.strategy,
            profile: this.config.profile,
            failMode: this.config.failMode,
            packetFilter: this.registry.backendName,
            excludedCount: excluded.length,
            excluded,
            tracked: {
                rate: this.limiter.size,
                concurrency: this.gate.trackedAddresses,
                violations: this.escalator.size,
            },
        };
    }

    private excludedVerdict(entry: ExclusionEntry, now: number): Verdict {
        switch (this.config.exclusionResponse) {
            case 'drop':
                return { action: 'drop', reason: 'excluded' };
            case 'not_found':
                return reject(404, 'excluded');
            case 'too_many_requests':
                return entry.expiresAt === null
                    ? reject(429, 'excluded')
                    : reject(429, 'excluded', (entry.expiresAt - now) / 1000);
        }
    }

    private shouldShed(): boolean {
        const threshold = this.config.shedAtEstablished;
        if (threshold === null) return false;
        const signals = this.signals();
        return signals !== null && signals.tcpEstablished >= threshold;
    }

    /** Whole path segments only: `/healthz` covers `/healthz/live`, not `/healthz-admin`. */
    private isExempt(path: string): boolean {
        return this.config.exemptPaths.some(prefix =>
            path === prefix || path.startsWith(prefix.endsWith('/') ? prefix : `${prefix}/`));
    }
}
