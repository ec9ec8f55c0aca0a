/**
 * Exclusion Registry — the authoritative local view of excluded addresses,
 * mirrored into the packet filter for `packet-filter` tier entries.
 *
 * Request-path operations (isExcluded, lookup, exclude, release) are
 * synchronous. Backend calls run in the background, bounded by a timeout,
 * and only ever update the entry's `sync` field.
 *
 * Events:
 *   'excluded' (entry)          → a new entry was created
 *   'released' (ReleaseEvent)   → an entry left the registry
 */

import { EventEmitter } from 'events';
import { log } from '@edgeguard/core';
import { isInAnyRange, normalizeAddress, type ParsedCIDR } from '../ip/cidr.js';
import { errorMessage, reportCorruption } from './errors.js';
import { MemoryStateStore, type StateStore } from './store.js';
import type { BackendListing, BackendOutcome, PacketFilterBackend } from './packet-filter.js';
import type {
    Address,
    ExclusionEntry,
    ExclusionRequest,
    ExclusionResult,
    ExclusionView,
    ReleaseCause,
    ReleaseEvent,
    ReleaseResult,
} from './types.js';

export interface RegistryOptions {
    backend?: PacketFilterBackend | null;
    allowlist?: readonly ParsedCIDR[];
    /** Upper bound for one backend call. */
    backendTimeoutMs?: number;
    store?: StateStore<ExclusionEntry>;
}

export interface ExclusionRegistry {
    on(event: 'excluded', listener: (entry: ExclusionEntry) => void): this;
    on(event: 'released', listener: (event: ReleaseEvent) => void): this;
    off(event: 'excluded', listener: (entry: ExclusionEntry) => void): this;
    off(event: 'released', listener: (event: ReleaseEvent) => void): this;
}

function isConsistent(entry: ExclusionEntry): boolean {
    if (!Number.isFinite(entry.createdAt)) return false;
    if (entry.expiresAt === null) return true;
    return Number.isFinite(entry.expiresAt) && entry.expiresAt >= entry.createdAt;
}

export class ExclusionRegistry extends EventEmitter {
    private entries: StateStore<ExclusionEntry>;
    private backend: PacketFilterBackend | null;
    private allowlist: readonly ParsedCIDR[];
    private timeoutMs: number;
    private inflight = new Set<Promise<void>>();
    /** Tail of the backend queue per address; calls for one address run in order. */
    private queues = new Map<Address, Promise<void>>();

    constructor(options: RegistryOptions = {}) {
        super();
        this.entries = options.store ?? new MemoryStateStore();
        this.backend = options.backend ?? null;
        this.allowlist = options.allowlist ?? [];
        this.timeoutMs = options.backendTimeoutMs ?? 5000;
    }

    get backendName(): string | null {
        return this.backend?.name ?? null;
    }

    get size(): number {
        return this.entries.size;
    }

    isAllowlisted(address: Address): boolean {
        return this.allowlist.length > 0 && isInAnyRange(address, this.allowlist);
    }

    isExcluded(address: Address, now: number): boolean {
        return this.lookup(address, now) !== null;
    }

    /** Current entry, reaping it first if it has expired or is inconsistent. */
    lookup(address: Address, now: number): ExclusionEntry | null {
        const entry = this.entries.get(address);
        if (!entry) return null;

        if (!isConsistent(entry)) {
            reportCorruption('Registry', `${address} createdAt=${entry.createdAt} expiresAt=${entry.expiresAt}`);
            this.drop(address, entry, 'corrupt');
            return null;
        }
        if (entry.expiresAt !== null && now >= entry.expiresAt) {
            this.drop(address, entry, 'expired');
            return null;
        }
        return entry;
    }

    exclude(rawAddress: string, request: ExclusionRequest, now: number): ExclusionResult {
        const address = normalizeAddress(rawAddress);
        if (address === null) return { ok: false, reason: 'invalid_address' };
        if (this.isAllowlisted(address)) {
            log(`[Registry] Refused to exclude allowlisted ${address} (${request.source})`, 'warn');
            return { ok: false, reason: 'allowlisted' };
        }
        if (request.expiresAt !== null && (!Number.isFinite(request.expiresAt) || request.expiresAt <= now)) {
            return { ok: false, reason: 'invalid_expiry' };
        }

        const existing = this.lookup(address, now);
        if (existing) return { ok: true, created: false, entry: existing };

        const base = {
            address,
            createdAt: now,
            expiresAt: request.expiresAt,
            reason: request.reason,
            source: request.source,
        };
        const entry: ExclusionEntry = request.tier === 'packet-filter' && this.backend
            ? { ...base, tier: 'packet-filter', sync: 'pending' }
            : { ...base, tier: 'local' };

        if (request.tier === 'packet-filter' && !this.backend) {
            log(`[Registry] No packet filter configured; ${address} excluded locally only`, 'debug');
        }

        this.entries.set(address, entry);
        const ttl = entry.expiresAt === null ? 'permanent' : `${Math.ceil((entry.expiresAt - now) / 1000)}s`;
        log(`[Registry] 🚫 Excluded ${address} (${entry.tier}, ${ttl}): ${entry.reason}`);
        this.emit('excluded', entry);

        if (entry.tier === 'packet-filter') this.mirror(address, 'block', entry.createdAt);
        return { ok: true, created: true, entry };
    }

    /**
     * Remove the local entry and, when a backend is configured, ask it to
     * drop the rule. The unblock goes out even without a local entry so a
     * rule left behind by an expired hard exclusion can still be cleared.
     */
    release(rawAddress: string, _now: number): ReleaseResult {
        const address = normalizeAddress(rawAddress);
        if (address === null) return { ok: false, reason: 'invalid_address' };

        const entry = this.entries.get(address) ?? null;
        if (entry) {
            this.entries.delete(address);
            log(`[Registry] ✅ Released ${address}`);
            this.emit('released', { address, cause: 'released', entry });
        }
        if (this.backend) this.mirror(address, 'unblock', null);
        return { ok: true, removed: entry !== null, entry };
    }

    list(now: number): ExclusionView[] {
        const views: ExclusionView[] = [];
        for (const address of [...this.entries.keys()]) {
            const entry = this.lookup(address, now);
            if (!entry) continue;
            views.push({
                address,
                tier: entry.tier,
                remainingSeconds: entry.expiresAt === null ? null : Math.max(0, Math.ceil((entry.expiresAt - now) / 1000)),
                reason: entry.reason,
                source: entry.source,
                sync: entry.tier === 'packet-filter' ? entry.sync : null,
            });
        }
        return views.sort((a, b) => a.address.localeCompare(b.address));
    }

    /** Reap every expired or inconsistent entry. Returns how many were removed. */
    sweep(now: number): number {
        let removed = 0;
        for (const address of [...this.entries.keys()]) {
            if (this.entries.has(address) && this.lookup(address, now) === null) removed++;
        }
        return removed;
    }

    /**
     * Import the backend's current block set as permanent packet-filter
     * entries. A backend failure leaves the registry as it was.
     */
    async reconcile(now: number): Promise<number> {
        const backend = this.backend;
        if (!backend) return 0;

        const listing = await this.bounded<BackendListing>('listBlocked', () => backend.listBlocked());
        if (!listing.ok) {
            log(`[Registry] ⚠️ Could not read ${backend.name} rules (${listing.message}); local enforcement only`, 'warn');
            return 0;
        }

        let imported = 0;
        for (const raw of listing.addresses) {
            const address = normalizeAddress(raw);
            if (address === null) continue;
            if (this.isAllowlisted(address)) {
                log(`[Registry] ⚠️ ${address} is blocked in ${backend.name} but allowlisted; not imported`, 'warn');
                continue;
            }

            const existing = this.lookup(address, now);
            if (existing) {
                if (existing.tier === 'packet-filter') this.entries.set(address, { ...existing, sync: 'installed' });
                continue;
            }

            const entry: ExclusionEntry = {
                address,
                tier: 'packet-filter',
                sync: 'installed',
                createdAt: now,
                expiresAt: null,
                reason: `present in ${backend.name}`,
                source: 'reconcile',
            };
            this.entries.set(address, entry);
            this.emit('excluded', entry);
            imported++;
        }

        if (imported > 0) log(`[Registry] Imported ${imported} existing ${backend.name} rule(s)`);
        return imported;
    }

    /** Wait for every in-flight backend call, including ones started meanwhile. */
    async flush(): Promise<void> {
        while (this.inflight.size > 0) {
            await Promise.all([...this.inflight]);
        }
    }

    // ── Internals ────────────────────────────────────────────────

    private drop(address: Address, entry: ExclusionEntry, cause: ReleaseCause): void {
        this.entries.delete(address);
        if (cause === 'expired') {
            if (entry.tier === 'packet-filter') {
                log(`[Registry] Local exclusion of ${address} expired; ${this.backendName ?? 'packet filter'} rule stays until unblocked`);
            } else {
                log(`[Registry] Exclusion of ${address} expired`, 'debug');
            }
        }
        const event: ReleaseEvent = { address, cause, entry };
        this.emit('released', event);
    }

    /** Resolves with a failed outcome on timeout or throw; never rejects. */
    private async bounded<T extends BackendOutcome | BackendListing>(label: string, call: () => Promise<T>): Promise<T | { ok: false; kind: 'unavailable' | 'failed'; message: string }> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<{ ok: false; kind: 'unavailable'; message: string }>((resolve) => {
            timer = setTimeout(
                () => resolve({ ok: false, kind: 'unavailable', message: `${label} timed out after ${this.timeoutMs}ms` }),
                this.timeoutMs,
            );
        });
        const attempt = Promise.resolve()
            .then(call)
            .catch((e: unknown) => ({ ok: false as const, kind: 'failed' as const, message: errorMessage(e) }));
        try {
            return await Promise.race([attempt, timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * Fire-and-forget backend call, queued behind earlier calls for the same
     * address so a release never overtakes the block it undoes. `createdAt`
     * identifies the entry whose sync state the outcome belongs to; a
     * replaced entry is left alone.
     */
    private mirror(address: Address, op: 'block' | 'unblock', createdAt: number | null): void {
        const backend = this.backend;
        if (!backend) return;

        const run = async (): Promise<void> => {
            const outcome = await this.bounded<BackendOutcome>(op, () => op === 'block' ? backend.block(address) : backend.unblock(address));
            if (!outcome.ok) {
                log(`[Registry] ⚠️ ${backend.name} ${op} ${address} failed (${outcome.kind}): ${outcome.message}`, 'warn');
            } else if (outcome.changed) {
                log(`[Registry] ${backend.name} ${op} ${address} applied`, 'debug');
            }
            if (op !== 'block' || createdAt === null) return;

            const sync = outcome.ok ? 'installed' : 'failed';
            this.entries.update(address, (current) =>
                current && current.tier === 'packet-filter' && current.createdAt === createdAt
                    ? { ...current, sync }
                    : current,
            );
        };

        const previous = this.queues.get(address) ?? Promise.resolve();
        const task = previous.then(run).catch((e: unknown) => {
            log(`[Registry] ❌ ${backend.name} ${op} ${address} bookkeeping failed: ${errorMessage(e)}`, 'error');
        });
        this.queues.set(address, task);

        const tracked: Promise<void> = task.finally(() => {
            this.inflight.delete(tracked);
            if (this.queues.get(address) === task) this.queues.delete(address);
        });
        this.inflight.add(tracked);
    }
}
