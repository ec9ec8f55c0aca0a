/**
 * Defense wiring: builds the admission components from one config block
 * and exposes them for the transports, admin API and sweeper.
 */

import { ConfigError, type TelemetrySignals } from '@edgeguard/core';
import { parseRangeList } from '../ip/cidr.js';
import { ConcurrencyGate } from './concurrency-gate.js';
import { AdmissionEngine } from './engine.js';
import { ViolationEscalator } from './escalator.js';
import { createRateLimiter, type RateLimiter } from './rate-limiter.js';
import { ExclusionRegistry } from './registry.js';
import { IdleSweeper } from './sweeper.js';
import type { PacketFilterBackend } from './packet-filter.js';
import type { DefenseConfig } from './types.js';

export * from './types.js';
export * from './engine.js';
export * from './registry.js';
export * from './escalator.js';
export * from './concurrency-gate.js';
export * from './rate-limiter.js';
export * from './sweeper.js';
export * from './packet-filter.js';

export interface DefenseOptions {
    backend?: PacketFilterBackend | null;
    backendTimeoutMs?: number;
    signals?: () => TelemetrySignals | null;
    clock?: () => number;
}

export interface Defense {
    engine: AdmissionEngine;
    registry: ExclusionRegistry;
    escalator: ViolationEscalator;
    limiter: RateLimiter;
    gate: ConcurrencyGate;
    sweeper: IdleSweeper;
}

export function createDefense(config: DefenseConfig, options: DefenseOptions = {}): Defense {
    const { ranges, invalid } = parseRangeList(config.allowlist);
    if (invalid.length > 0) {
        throw new ConfigError('Invalid defense.allowlist entries', invalid.map(e => `not an address or CIDR: ${e}`));
    }

    const clock = options.clock ?? Date.now;
    const registry = new ExclusionRegistry({
        backend: options.backend ?? null,
        allowlist: ranges,
        backendTimeoutMs: options.backendTimeoutMs,
    });
    const limiter = createRateLimiter(config);
    const gate = new ConcurrencyGate(config);
    const escalator = new ViolationEscalator(config, registry);
    const engine = new AdmissionEngine(config, { registry, limiter, gate, escalator, signals: options.signals, clock });
    const sweeper = new IdleSweeper(config, [limiter, escalator], registry, clock);

    return { engine, registry, escalator, limiter, gate, sweeper };
}
