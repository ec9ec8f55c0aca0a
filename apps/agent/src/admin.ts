/**
 * Administrative API — loopback-only JSON surface.
 *
 *   GET    /exclusions            → active exclusions with remaining TTL
 *   PUT    /exclusions/:address   → idempotent block
 *   DELETE /exclusions/:address   → idempotent unblock
 *   GET    /defense/status        → engine counters
 *   GET    /events                → tail of the security event log
 *
 * `AdminApi.handle` is a pure function of (method, path, body) so routing
 * can be tested without sockets; `AdminServer` is the HTTP shell around it.
 */

import http from 'http';
import { z } from 'zod';
import { log } from '@edgeguard/core';
import { errorMessage } from './defense/errors.js';
import { readRecentEvents, type SecurityEvent } from './logging/structured.js';
import type { AdmissionEngine } from './defense/engine.js';
import type { ExclusionRegistry } from './defense/registry.js';
import type { DefenseConfig, ExclusionEntry, ExclusionTier } from './defense/types.js';
import type { DashboardHub } from './dashboard.js';

export interface AdminResponse {
    status: number;
    body: unknown;
}

export const BlockRequestSchema = z.object({
    seconds: z.number().positive().optional(),
    permanent: z.boolean().optional(),
    reason: z.string().min(1).max(200).optional(),
    tier: z.enum(['local', 'packet-filter']).optional(),
}).strict().refine(b => !(b.seconds !== undefined && b.permanent === true), {
    message: 'seconds and permanent are mutually exclusive',
});

export type BlockRequest = z.infer<typeof BlockRequestSchema>;

export interface AdminApiOptions {
    engine: AdmissionEngine;
    registry: ExclusionRegistry;
    defense: Pick<DefenseConfig, 'banSeconds' | 'profile'>;
    clock?: () => number;
    events?: (count: number) => SecurityEvent[];
}

function describe(entry: ExclusionEntry, now: number) {
    return {
        address: entry.address,
        tier: entry.tier,
        remainingSeconds: entry.expiresAt === null ? null : Math.max(0, Math.ceil((entry.expiresAt - now) / 1000)),
        reason: entry.reason,
        source: entry.source,
        sync: entry.tier === 'packet-filter' ? entry.sync : null,
    };
}

function refusal(address: string, reason: 'invalid_address' | 'allowlisted' | 'invalid_expiry'): AdminResponse {
    switch (reason) {
        case 'invalid_address':
            return { status: 400, body: { error: `not an IP address: ${address}` } };
        case 'allowlisted':
            return { status: 409, body: { error: `${address} is allowlisted` } };
        case 'invalid_expiry':
            return { status: 400, body: { error: 'expiry must be in the future' } };
    }
}

const EXCLUSION_PATH = /^\/exclusions\/([^/]+)$/;
const EVENT_TAIL = 50;

export class AdminApi {
    private engine: AdmissionEngine;
    private registry: ExclusionRegistry;
    private defense: Pick<DefenseConfig, 'banSeconds' | 'profile'>;
    private clock: () => number;
    private events: (count: number) => SecurityEvent[];

    constructor(options: AdminApiOptions) {
        this.engine = options.engine;
        this.registry = options.registry;
        this.defense = { ...options.defense };
        this.clock = options.clock ?? Date.now;
        this.events = options.events ?? readRecentEvents;
    }

    handle(method: string, path: string, body: unknown): AdminResponse {
        const now = this.clock();

        if (path === '/exclusions') {
            if (method !== 'GET') return { status: 405, body: { error: 'method not allowed' } };
            return { status: 200, body: { exclusions: this.registry.list(now) } };
        }

        if (path === '/defense/status') {
            if (method !== 'GET') return { status: 405, body: { error: 'method not allowed' } };
            return { status: 200, body: this.engine.status(now) };
        }

        if (path === '/events') {
            if (method !== 'GET') return { status: 405, body: { error: 'method not allowed' } };
            return { status: 200, body: { events: this.events(EVENT_TAIL) } };
        }

        const match = path.match(EXCLUSION_PATH);
        if (match) {
            let address: string;
            try {
                address = decodeURIComponent(match[1]);
            } catch {
                return { status: 400, body: { error: 'malformed address' } };
            }
            if (method === 'PUT') return this.block(address, body, now);
            if (method === 'DELETE') return this.unblock(address, now);
            return { status: 405, body: { error: 'method not allowed' } };
        }

        return { status: 404, body: { error: 'not found' } };
    }

    private block(address: string, body: unknown, now: number): AdminResponse {
        const parsed = BlockRequestSchema.safeParse(body ?? {});
        if (!parsed.success) {
            return { status: 400, body: { error: 'invalid body', issues: parsed.error.issues.map(i => i.message) } };
        }

        const request = parsed.data;
        const defaultTier: ExclusionTier = this.defense.profile === 'hard' ? 'packet-filter' : 'local';
        let expiresAt: number | null;
        if (request.permanent) expiresAt = null;
        else if (request.seconds !== undefined) expiresAt = now + request.seconds * 1000;
        else expiresAt = this.defense.banSeconds === 'permanent' ? null : now + this.defense.banSeconds * 1000;

        const result = this.registry.exclude(address, {
            tier: request.tier ?? defaultTier,
            expiresAt,
            reason: request.reason ?? 'manual block',
            source: 'admin',
        }, now);

        if (!result.ok) return refusal(address, result.reason);

        log(`[Admin] Block ${result.entry.address} (${result.created ? 'created' : 'already excluded'})`);
        return {
            status: result.created ? 201 : 200,
            body: { created: result.created, exclusion: describe(result.entry, now) },
        };
    }

    private unblock(address: string, now: number): AdminResponse {
        const result = this.registry.release(address, now);
        if (!result.ok) return { status: 400, body: { error: `not an IP address: ${address}` } };
        log(`[Admin] Unblock ${address} (${result.removed ? 'removed' : 'was not excluded'})`);
        return { status: 200, body: { removed: result.removed } };
    }
}

const MAX_BODY_BYTES = 64 * 1024;

export interface AdminServerOptions {
    host: string;
    port: number;
}

export class AdminServer {
    readonly server: http.Server;
    private options: AdminServerOptions;
    private api: AdminApi;

    constructor(options: AdminServerOptions, api: AdminApi, hub?: DashboardHub) {
        this.options = { ...options };
        this.api = api;
        this.server = http.createServer(this.handleRequest.bind(this));
        hub?.attach(this.server, '/ws');
    }

    start(): Promise<number> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(this.options.port, this.options.host, () => {
                this.server.off('error', reject);
                const address = this.server.address();
                const port = typeof address === 'object' && address !== null ? address.port : this.options.port;
                log(`[Admin] Listening on ${this.options.host}:${port}`);
                resolve(port);
            });
        });
    }

    stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close((err) => (err ? reject(err) : resolve()));
            this.server.closeAllConnections();
        });
    }

    private handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
        const chunks: Buffer[] = [];
        let size = 0;
        let aborted = false;

        req.on('data', (chunk: Buffer) => {
            size += chunk.length;
            if (size > MAX_BODY_BYTES && !aborted) {
                aborted = true;
                this.send(res, { status: 413, body: { error: 'body too large' } });
                req.destroy();
                return;
            }
            chunks.push(chunk);
        });

        req.on('end', () => {
            if (aborted) return;
            let body: unknown = undefined;
            const raw = Buffer.concat(chunks).toString('utf-8');
            if (raw.trim()) {
                try {
                    body = JSON.parse(raw);
                } catch (e) {
                    log(`[Admin] Error parsing body: ${errorMessage(e)}`, 'debug');
                    this.send(res, { status: 400, body: { error: 'invalid json' } });
                    return;
                }
            }

            let pathname = '/';
            try {
                pathname = new URL(req.url ?? '/', 'http://admin.local').pathname;
            } catch {
                this.send(res, { status: 400, body: { error: 'bad request' } });
                return;
            }

            try {
                this.send(res, this.api.handle(req.method ?? 'GET', pathname, body));
            } catch (e) {
                log(`[Admin] ❌ ${req.method} ${pathname} failed: ${errorMessage(e)}`, 'error');
                this.send(res, { status: 500, body: { error: 'internal error' } });
            }
        });
    }

    private send(res: http.ServerResponse, response: AdminResponse) {
        res.writeHead(response.status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(response.body));
    }
}
