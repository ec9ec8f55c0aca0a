/**
 * Violation Escalator — turns repeated rate denials into an exclusion.
 *
 * CLEAN → WARNED(n) → EXCLUDED
 *
 * A violation older than `violationWindowSeconds` no longer counts, so an
 * address that trips the limiter once an hour never escalates. Reaching
 * `banThreshold` clears the count and hands the address to the registry;
 * the tier and expiry follow the configured profile. When the registry
 * releases the address (expiry or admin) its count starts over.
 */

import { log } from '@edgeguard/core';
import { reportCorruption } from './errors.js';
import { MemoryStateStore, evictWhere, type StateStore } from './store.js';
import type { ExclusionRegistry } from './registry.js';
import type { Address, DefenseConfig, Evictable, ExclusionEntry, ExclusionRequest, ViolationRecord } from './types.js';

export type EscalatorConfig = Pick<DefenseConfig, 'banThreshold' | 'banSeconds' | 'violationWindowSeconds' | 'profile'>;

export type EscalationOutcome =
    | { kind: 'exempt' }
    | { kind: 'warned'; count: number }
    | { kind: 'excluded'; entry: ExclusionEntry; newlyExcluded: boolean }
    | { kind: 'refused'; reason: string };

export type ViolationState =
    | { state: 'clean' }
    | { state: 'warned'; count: number }
    | { state: 'excluded'; entry: ExclusionEntry };

export class ViolationEscalator implements Evictable {
    private config: EscalatorConfig;
    private registry: ExclusionRegistry;
    private records: StateStore<ViolationRecord>;

    constructor(config: EscalatorConfig, registry: ExclusionRegistry, store: StateStore<ViolationRecord> = new MemoryStateStore()) {
        this.config = { ...config };
        this.registry = registry;
        this.records = store;

        this.registry.on('released', (event) => {
            this.records.delete(event.address);
        });
    }

    private exclusionRequest(now: number): ExclusionRequest {
        const { banSeconds, banThreshold, profile } = this.config;
        return {
            tier: profile === 'hard' ? 'packet-filter' : 'local',
            expiresAt: banSeconds === 'permanent' ? null : now + banSeconds * 1000,
            reason: `${banThreshold} rate-limit violations`,
            source: 'escalator',
        };
    }

    /** Record one rate denial for `address`. Concurrency denials never come here. */
    recordViolation(address: Address, now: number): EscalationOutcome {
        if (this.registry.isAllowlisted(address)) return { kind: 'exempt' };

        const existing = this.registry.lookup(address, now);
        if (existing) return { kind: 'excluded', entry: existing, newlyExcluded: false };

        const windowMs = this.config.violationWindowSeconds === null ? null : this.config.violationWindowSeconds * 1000;
        const record = this.records.update(address, (current) => {
            let count = current?.count ?? 0;
            let lastAt = current?.lastAt ?? now;
            if (!Number.isInteger(count) || count < 0) {
                reportCorruption('Escalator', `${address} count=${count}`);
                count = 0;
            }
            if (windowMs !== null && now - lastAt > windowMs) count = 0;
            lastAt = Math.max(now, lastAt);
            return { count: count + 1, lastAt };
        });
        const count = record?.count ?? 1;

        if (count < this.config.banThreshold) {
            log(`[Escalator] ${address} violation ${count}/${this.config.banThreshold}`, 'debug');
            return { kind: 'warned', count };
        }

        this.records.delete(address);
        const result = this.registry.exclude(address, this.exclusionRequest(now), now);
        if (!result.ok) {
            log(`[Escalator] ⚠️ Could not exclude ${address}: ${result.reason}`, 'warn');
            return { kind: 'refused', reason: result.reason };
        }
        return { kind: 'excluded', entry: result.entry, newlyExcluded: result.created };
    }

    state(address: Address, now: number): ViolationState {
        const entry = this.registry.lookup(address, now);
        if (entry) return { state: 'excluded', entry };
        const count = this.violations(address);
        return count > 0 ? { state: 'warned', count } : { state: 'clean' };
    }

    violations(address: Address): number {
        return this.records.get(address)?.count ?? 0;
    }

    reset(address: Address): void {
        this.records.delete(address);
    }

    evictIdle(now: number, idleMs: number): number {
        return evictWhere(this.records, (record) => now - record.lastAt > idleMs);
    }

    get size(): number {
        return this.records.size;
    }
}
