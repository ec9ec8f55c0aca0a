/**
 * Edge HTTP transport. Every request passes the admission engine before
 * routing; an admitted request holds its concurrency lease until the
 * response closes (finished, errored or aborted by the client).
 *
 * Routes:
 *   GET /status                 → latest telemetry snapshot
 *   GET /_debug/defense_status  → in-flight count and active exclusions
 *   GET /*                      → static file, falling back to index.html
 */

import http from 'http';
import * as fs from 'fs';
import * as path from 'path';
import { log, type TelemetrySnapshot } from '@edgeguard/core';
import { errorMessage } from './defense/errors.js';
import type { AdmissionEngine, Verdict } from './defense/engine.js';
import { resolveClientAddress } from './ip/resolver.js';
import type { ParsedCIDR } from './ip/cidr.js';

export interface EdgeServerOptions {
    host: string;
    port: number;
    staticDir: string;
    trustedProxies: readonly ParsedCIDR[];
}

export interface TelemetryView {
    readonly latest: TelemetrySnapshot | null;
}

export interface PlainResponse {
    status: number;
    headers: Record<string, string>;
    body: string;
}

type Rejection = Extract<Verdict, { action: 'reject' }>;

/** Status, headers and body for a refused request. */
export function rejectionResponse(verdict: Rejection): PlainResponse {
    const headers: Record<string, string> = {
        'Content-Type': 'text/plain; charset=utf-8',
        'Cache-Control': 'no-store',
    };
    if (verdict.retryAfterSeconds !== undefined) headers['Retry-After'] = String(verdict.retryAfterSeconds);
    return { status: verdict.status, headers, body: `${verdict.message}\n` };
}

/**
 * Map a URL path onto a file under `root`. Returns null when the decoded
 * path would leave `root`.
 */
export function resolveStaticPath(root: string, urlPath: string): string | null {
    let decoded: string;
    try {
        decoded = decodeURIComponent(urlPath);
    } catch {
        return null;
    }
    if (decoded.includes('\0')) return null;

    const base = path.resolve(root);
    const target = path.resolve(base, decoded.replace(/^\/+/, ''));
    if (target !== base && !target.startsWith(base + path.sep)) return null;
    return target;
}

const CONTENT_TYPES: Record<string, string> = {
    '.html': 'text/html; charset=utf-8',
    '.css': 'text/css; charset=utf-8',
    '.js': 'text/javascript; charset=utf-8',
    '.json': 'application/json',
    '.svg': 'image/svg+xml',
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.ico': 'image/x-icon',
    '.txt': 'text/plain; charset=utf-8',
};

function contentType(file: string): string {
    return CONTENT_TYPES[path.extname(file).toLowerCase()] ?? 'application/octet-stream';
}

/** Path component of a request target, or null when it does not parse. */
export function requestPath(url: string | undefined): string | null {
    try {
        return new URL(url ?? '/', 'http://edge.local').pathname;
    } catch {
        return null;
    }
}

async function isFile(file: string): Promise<boolean> {
    try {
        return (await fs.promises.stat(file)).isFile();
    } catch {
        return false;
    }
}

export class EdgeServer {
    readonly server: http.Server;
    private options: EdgeServerOptions;
    private engine: AdmissionEngine;
    private telemetry: TelemetryView;

    constructor(options: EdgeServerOptions, engine: AdmissionEngine, telemetry: TelemetryView) {
        this.options = { ...options };
        this.engine = engine;
        this.telemetry = telemetry;
        this.server = http.createServer(this.handleRequest.bind(this));
    }

    /** Resolves with the bound port. */
    start(): Promise<number> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(this.options.port, this.options.host, () => {
                this.server.off('error', reject);
                const address = this.server.address();
                const port = typeof address === 'object' && address !== null ? address.port : this.options.port;
                log(`[Edge] Listening on ${this.options.host}:${port} (static: ${this.options.staticDir})`);
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
        const client = resolveClientAddress(req.socket.remoteAddress, req.headers, this.options.trustedProxies);
        if (!client) {
            req.socket.destroy();
            return;
        }

        const pathname = requestPath(req.url);
        if (pathname === null) {
            res.writeHead(400, { 'Content-Type': 'text/plain; charset=utf-8' });
            res.end('Bad request\n');
            return;
        }
        const verdict = this.engine.admit({ address: client.address, path: pathname, method: req.method });

        switch (verdict.action) {
            case 'drop':
                req.socket.destroy();
                return;
            case 'reject': {
                const plan = rejectionResponse(verdict);
                res.writeHead(plan.status, plan.headers);
                res.end(req.method === 'HEAD' ? undefined : plan.body);
                return;
            }
            case 'allow': {
                const lease = verdict.lease;
                res.on('close', () => lease.release());
                this.route(req, res, pathname).catch((e: unknown) => {
                    log(`[Edge] ❌ ${req.method} ${pathname} failed: ${errorMessage(e)}`, 'error');
                    if (!res.headersSent) res.writeHead(500, { 'Content-Type': 'text/plain; charset=utf-8' });
                    res.end();
                });
                return;
            }
        }
    }

    private async route(req: http.IncomingMessage, res: http.ServerResponse, pathname: string): Promise<void> {
        if (req.method !== 'GET' && req.method !== 'HEAD') {
            this.sendJson(res, 405, { error: 'method not allowed' }, { Allow: 'GET, HEAD' });
            return;
        }

        if (pathname === '/status') {
            const latest = this.telemetry.latest;
            if (latest) this.sendJson(res, 200, latest);
            else this.sendJson(res, 503, { error: 'no telemetry sample yet' });
            return;
        }

        if (pathname === '/_debug/defense_status') {
            const status = this.engine.status();
            this.sendJson(res, 200, {
                globalActiveRequests: status.globalActive,
                excludedCount: status.excludedCount,
                excluded: status.excluded.map(e => ({ address: e.address, remainingSeconds: e.remainingSeconds })),
            });
            return;
        }

        await this.serveStatic(req, res, pathname);
    }

    private async serveStatic(req: http.IncomingMessage, res: http.ServerResponse, pathname: string): Promise<void> {
        const root = path.resolve(this.options.staticDir);
        const requested = resolveStaticPath(root, pathname);
        if (requested === null) {
            this.sendJson(res, 403, { error: 'forbidden' });
            return;
        }

        const candidates = [requested, path.join(requested, 'index.html'), path.join(root, 'index.html')];
        for (const file of candidates) {
            if (!(await isFile(file))) continue;
            const body = await fs.promises.readFile(file);
            res.writeHead(200, { 'Content-Type': contentType(file), 'Content-Length': body.length });
            res.end(req.method === 'HEAD' ? undefined : body);
            return;
        }

        this.sendJson(res, 404, { error: 'not found' });
    }

    private sendJson(res: http.ServerResponse, status: number, payload: unknown, headers: Record<string, string> = {}) {
        res.writeHead(status, { 'Content-Type': 'application/json', ...headers });
        res.end(JSON.stringify(payload));
    }
}
