/**
 * Structured JSON Logger
 *
 * Emits security events (exclusions, releases, reconciled rules) to a .jsonl
 * file. Append-only, rotated by size (default 10MB, one previous file kept).
 */

import * as fs from 'fs';
import * as path from 'path';
import { log, SECURITY_LOG_FILE } from '@edgeguard/core';
import { errorMessage } from '../defense/errors.js';
import type { ExclusionRegistry } from '../defense/registry.js';
import type { ExclusionEntry, ReleaseEvent } from '../defense/types.js';

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB
const ROTATED_SUFFIX = '.1';

export type SecurityAction = 'excluded' | 'released' | 'expired' | 'reconciled';

export interface SecurityEvent {
    timestamp: string;
    address: string;
    action: SecurityAction;
    reason: string;
    source: string;
    tier?: string;
    expiresAt?: string | null;
    [key: string]: unknown;
}

let logFile = SECURITY_LOG_FILE;
let maxFileSize = DEFAULT_MAX_FILE_SIZE;
let fd: number | null = null;

function closeFd(): void {
    if (fd === null) return;
    try {
        fs.closeSync(fd);
    } catch (e) {
        log(`[StructuredLog] ⚠️ Close error: ${errorMessage(e)}`, 'warn');
    }
    fd = null;
}

/** Point the logger at another file (closes the current one). */
export function configureSecurityLog(options: { file?: string; maxFileSize?: number }): void {
    closeFd();
    if (options.file) logFile = options.file;
    if (options.maxFileSize) maxFileSize = options.maxFileSize;
}

export function closeSecurityLog(): void {
    closeFd();
}

function ensureOpen(): void {
    if (fd !== null) return;
    try {
        const dir = path.dirname(logFile);
        if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
        fd = fs.openSync(logFile, 'a');
    } catch (e) {
        log(`[StructuredLog] ⚠️ Failed to open log file: ${errorMessage(e)}`, 'warn');
    }
}

function rotateIfNeeded(): void {
    try {
        if (!fs.existsSync(logFile)) return;
        const stats = fs.statSync(logFile);
        if (stats.size >= maxFileSize) {
            closeFd();
            const rotated = logFile + ROTATED_SUFFIX;
            if (fs.existsSync(rotated)) fs.unlinkSync(rotated);
            fs.renameSync(logFile, rotated);
            log(`[StructuredLog] 🔄 Rotated security log (${(stats.size / 1024 / 1024).toFixed(1)}MB).`);
        }
    } catch (e) {
        log(`[StructuredLog] ⚠️ Rotation error: ${errorMessage(e)}`, 'warn');
    }
}

/**
 * Emit a structured security event to the JSONL log.
 */
export function emitSecurityEvent(event: SecurityEvent): void {
    rotateIfNeeded();
    ensureOpen();
    if (fd === null) return;

    try {
        fs.writeSync(fd, JSON.stringify(event) + '\n');
    } catch (e) {
        log(`[StructuredLog] ⚠️ Write error: ${errorMessage(e)}`, 'warn');
        closeFd();  // re-open on next write
    }
}

function isSecurityEvent(value: unknown): value is SecurityEvent {
    if (typeof value !== 'object' || value === null) return false;
    return 'timestamp' in value && typeof value.timestamp === 'string'
        && 'address' in value && typeof value.address === 'string'
        && 'action' in value && typeof value.action === 'string';
}

/**
 * Read recent security events (tail). Lines that are not valid events are skipped.
 */
export function readRecentEvents(count: number = 50): SecurityEvent[] {
    if (!fs.existsSync(logFile)) return [];
    let content: string;
    try {
        content = fs.readFileSync(logFile, 'utf-8');
    } catch (e) {
        log(`[StructuredLog] ⚠️ Read error: ${errorMessage(e)}`, 'warn');
        return [];
    }

    const events: SecurityEvent[] = [];
    for (const line of content.split('\n')) {
        if (!line.trim()) continue;
        try {
            const parsed: unknown = JSON.parse(line);
            if (isSecurityEvent(parsed)) events.push(parsed);
        } catch {
            log('[StructuredLog] Skipping malformed line', 'debug');
        }
    }
    return events.slice(-count);
}

// ── Registry bridge ─────────────────────────────────────────────

function iso(ms: number): string;
function iso(ms: number | null): string | null;
function iso(ms: number | null): string | null {
    return ms === null ? null : new Date(ms).toISOString();
}

/** Mirror registry events into the security log. Returns a detach function. */
export function recordRegistryEvents(registry: ExclusionRegistry, clock: () => number = Date.now): () => void {
    const onExcluded = (entry: ExclusionEntry): void => {
        emitSecurityEvent({
            timestamp: iso(clock()),
            address: entry.address,
            action: entry.source === 'reconcile' ? 'reconciled' : 'excluded',
            reason: entry.reason,
            source: entry.source,
            tier: entry.tier,
            expiresAt: iso(entry.expiresAt),
        });
    };
    const onReleased = (event: ReleaseEvent): void => {
        emitSecurityEvent({
            timestamp: iso(clock()),
            address: event.address,
            action: event.cause === 'released' ? 'released' : 'expired',
            reason: event.cause,
            source: event.entry.source,
            tier: event.entry.tier,
        });
    };

    registry.on('excluded', onExcluded);
    registry.on('released', onReleased);
    return () => {
        registry.off('excluded', onExcluded);
        registry.off('released', onReleased);
    };
}
