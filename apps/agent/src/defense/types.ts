/**
 * Defense Types — Shared across limiters, gate, escalator, registry and engine.
 */

import { DefenseConfigSchema, type DefenseSettings } from '@edgeguard/core';

/** Normalized client IP string. */
export type Address = string;

export type DefenseConfig = DefenseSettings;
export type MitigationProfile = DefenseConfig['profile'];
export type RateStrategy = DefenseConfig['rateStrategy'];

export const DEFAULT_DEFENSE_CONFIG: DefenseConfig = DefenseConfigSchema.parse({});

/** Token bucket state for one address */
export interface BucketState {
    tokens: number;
    lastRefill: number;     // epoch ms
}

/** Sliding window state for one address, oldest first */
export interface WindowState {
    timestamps: number[];
}

/** Violation tracker entry */
export interface ViolationRecord {
    count: number;
    lastAt: number;
}

/** Rate-limiter verdict */
export interface RateDecision {
    allowed: boolean;
    retryAfterSeconds?: number;
}

// ── Exclusions ──────────────────────────────────────────────────

export type ExclusionTier = 'local' | 'packet-filter';
export type ExclusionSource = 'escalator' | 'admin' | 'reconcile';
export type BackendSyncState = 'pending' | 'installed' | 'failed';

interface ExclusionBase {
    address: Address;
    createdAt: number;
    expiresAt: number | null;  // null = permanent
    reason: string;
    source: ExclusionSource;
}

/** In-process short-circuit only. */
export interface LocalExclusion extends ExclusionBase {
    tier: 'local';
}

/** Local entry mirrored into the packet filter. */
export interface PacketFilterExclusion extends ExclusionBase {
    tier: 'packet-filter';
    sync: BackendSyncState;
}

export type ExclusionEntry = LocalExclusion | PacketFilterExclusion;

export interface ExclusionRequest {
    tier: ExclusionTier;
    expiresAt: number | null;
    reason: string;
    source: ExclusionSource;
}

export type ExclusionResult =
    | { ok: true; created: boolean; entry: ExclusionEntry }
    | { ok: false; reason: 'invalid_address' | 'allowlisted' | 'invalid_expiry' };

export type ReleaseResult =
    | { ok: true; removed: boolean; entry: ExclusionEntry | null }
    | { ok: false; reason: 'invalid_address' };

export interface ExclusionView {
    address: Address;
    tier: ExclusionTier;
    remainingSeconds: number | null;  // null = permanent
    reason: string;
    source: ExclusionSource;
    sync: BackendSyncState | null;
}

export type ReleaseCause = 'expired' | 'released' | 'corrupt';

export interface ReleaseEvent {
    address: Address;
    cause: ReleaseCause;
    entry: ExclusionEntry;
}

// ── Admission ───────────────────────────────────────────────────

export interface AdmissionRequest {
    address: Address;
    path: string;
    method?: string;
}

export type RejectReason =
    | 'excluded'
    | 'global_concurrency'
    | 'address_concurrency'
    | 'rate_limited'
    | 'load_shed'
    | 'engine_failure';

/** Anything whose per-address state can go idle. */
export interface Evictable {
    /** Drop state untouched for longer than `idleMs`. Returns the number of addresses removed. */
    evictIdle(now: number, idleMs: number): number;
}
