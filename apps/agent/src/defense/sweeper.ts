/**
 * Idle Sweeper — bounds per-address state.
 *
 * Every `sweepIntervalSeconds` it reaps expired exclusions and, when
 * `idleTtlSeconds` is set, drops limiter and violation state untouched for
 * longer than the TTL. With `idleTtlSeconds: null` per-address maps keep
 * every address they have seen.
 */

import { log } from '@edgeguard/core';
import { errorMessage } from './errors.js';
import type { ExclusionRegistry } from './registry.js';
import type { DefenseConfig, Evictable } from './types.js';

export type SweeperConfig = Pick<DefenseConfig, 'idleTtlSeconds' | 'sweepIntervalSeconds'>;

export interface SweepResult {
    evicted: number;
    expired: number;
}

export class IdleSweeper {
    private interval: NodeJS.Timeout | null = null;
    private config: SweeperConfig;
    private targets: Evictable[];
    private registry: ExclusionRegistry;
    private clock: () => number;

    constructor(config: SweeperConfig, targets: Evictable[], registry: ExclusionRegistry, clock: () => number = Date.now) {
        this.config = { ...config };
        this.targets = targets;
        this.registry = registry;
        this.clock = clock;
    }

    get running(): boolean {
        return this.interval !== null;
    }

    start(): void {
        if (this.interval) return;
        const ttl = this.config.idleTtlSeconds;
        log(`[Sweeper] Starting (every ${this.config.sweepIntervalSeconds}s, idle TTL ${ttl === null ? 'disabled' : `${ttl}s`})`);
        this.interval = setInterval(() => {
            try {
                this.sweep(this.clock());
            } catch (e) {
                log(`[Sweeper] ❌ Sweep failed: ${errorMessage(e)}`, 'error');
            }
        }, this.config.sweepIntervalSeconds * 1000);
        this.interval.unref();
    }

    stop(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
        }
    }

    sweep(now: number): SweepResult {
        const expired = this.registry.sweep(now);

        let evicted = 0;
        const ttl = this.config.idleTtlSeconds;
        if (ttl !== null) {
            for (const target of this.targets) evicted += target.evictIdle(now, ttl * 1000);
        }

        if (evicted > 0 || expired > 0) {
            log(`[Sweeper] Evicted ${evicted} idle record(s), reaped ${expired} expired exclusion(s)`, 'debug');
        }
        return { evicted, expired };
    }
}
