import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import http from 'http';
import * as os from 'os';
import * as path from 'path';
import type { TelemetrySnapshot } from '@edgeguard/core';
import { createDefense, DEFAULT_DEFENSE_CONFIG, type Defense, type DefenseConfig } from '../defense/index.js';
import { EdgeServer, rejectionResponse, requestPath, resolveStaticPath, type TelemetryView } from '../server.js';

describe('rejectionResponse', () => {
    it('adds Retry-After when the verdict carries one', () => {
        expect(rejectionResponse({ action: 'reject', status: 429, reason: 'rate_limited', message: 'Too many requests', retryAfterSeconds: 3 })).toEqual({
            status: 429,
            headers: {
                'Content-Type': 'text/plain; charset=utf-8',
                'Cache-Control': 'no-store',
                'Retry-After': '3',
            },
            body: 'Too many requests\n',
        });
    });

    it('leaves Retry-After out otherwise', () => {
        const plan = rejectionResponse({ action: 'reject', status: 404, reason: 'excluded', message: 'Not found' });
        expect(plan.status).toBe(404);
        expect(plan.headers['Retry-After']).toBeUndefined();
        expect(plan.body).toBe('Not found\n');
    });
});

describe('resolveStaticPath', () => {
    const root = path.resolve('/srv/site');

    it('maps a URL path under the root', () => {
        expect(resolveStaticPath(root, '/css/app.css')).toBe(path.join(root, 'css', 'app.css'));
        expect(resolveStaticPath(root, '/')).toBe(root);
    });

    it('decodes percent escapes', () => {
        expect(resolveStaticPath(root, '/my%20page.html')).toBe(path.join(root, 'my page.html'));
    });

    it('refuses paths that leave the root', () => {
        expect(resolveStaticPath(root, '/../etc/passwd')).toBeNull();
        expect(resolveStaticPath(root, '/%2e%2e/%2e%2e/etc/passwd')).toBeNull();
        expect(resolveStaticPath(root, '/../site-other/x')).toBeNull();
    });

    it('refuses malformed escapes and NUL bytes', () => {
        expect(resolveStaticPath(root, '/%E0%A4%A')).toBeNull();
        expect(resolveStaticPath(root, '/index.html%00.txt')).toBeNull();
    });
});

describe('requestPath', () => {
    it('strips the query string', () => {
        expect(requestPath('/status?verbose=1')).toBe('/status');
        expect(requestPath(undefined)).toBe('/');
    });

    it('collapses dot segments', () => {
        expect(requestPath('/a/../b')).toBe('/b');
    });
});

interface Reply {
    status: number;
    headers: http.IncomingHttpHeaders;
    body: string;
}

function send(port: number, urlPath: string, onRequest?: (req: http.ClientRequest) => void): Promise<Reply> {
    return new Promise((resolve, reject) => {
        const req = http.get({ host: '127.0.0.1', port, path: urlPath, agent: false }, (res) => {
            let body = '';
            res.setEncoding('utf-8');
            res.on('data', (chunk: string) => { body += chunk; });
            res.on('end', () => resolve({ status: res.statusCode ?? 0, headers: res.headers, body }));
            res.on('error', reject);
        });
        req.on('error', reject);
        onRequest?.(req);
    });
}

describe('EdgeServer', () => {
    const T0 = 1_700_000_000_000;
    const LOOPBACK = '127.0.0.1';
    let edge: EdgeServer | null = null;

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(async () => {
        await edge?.stop();
        edge = null;
    });

    async function serve(overrides: Partial<DefenseConfig> = {}, telemetry: TelemetryView = { latest: null }): Promise<{ port: number; defense: Defense }> {
        const config: DefenseConfig = { ...DEFAULT_DEFENSE_CONFIG, perAddressConcurrencyLimit: 1, ...overrides };
        const defense = createDefense(config, { clock: () => T0 });
        edge = new EdgeServer({
            host: LOOPBACK,
            port: 0,
            staticDir: path.join(os.tmpdir(), 'edgeguard-missing-static-root'),
            trustedProxies: [],
        }, defense.engine, telemetry);
        return { port: await edge.start(), defense };
    }

    it('frees the slot when the client aborts mid-request', async () => {
        const { port, defense } = await serve();
        const heldWhileRouting: number[] = [];
        let client: http.ClientRequest | null = null;
        edge?.server.on('request', () => {
            heldWhileRouting.push(defense.gate.globalCount);
            client?.destroy();
        });

        const aborted = send(port, '/page', (req) => { client = req; });
        await expect(aborted).rejects.toThrow();
        expect(heldWhileRouting).toEqual([1]);
        await vi.waitFor(() => expect(defense.gate.globalCount).toBe(0));
        expect((await send(port, '/page')).status).toBe(404);
    });

    it('frees the slot when a route throws', async () => {
        const failing: TelemetryView = {
            get latest(): TelemetrySnapshot | null {
                throw new Error('sensor offline');
            },
        };
        const { port, defense } = await serve({}, failing);

        expect((await send(port, '/status')).status).toBe(500);
        await vi.waitFor(() => expect(defense.gate.globalCount).toBe(0));
        expect((await send(port, '/page')).status).toBe(404);
    });

    it('resets the connection of an excluded address in drop mode', async () => {
        const { port, defense } = await serve({ exclusionResponse: 'drop' });
        defense.registry.exclude(LOOPBACK, { tier: 'local', expiresAt: null, reason: 'test', source: 'admin' }, T0);

        await expect(send(port, '/page')).rejects.toMatchObject({ code: 'ECONNRESET' });
        expect(defense.gate.globalCount).toBe(0);
    });

    it('sends Retry-After with a rate-limited response', async () => {
        const { port } = await serve({ rateStrategy: 'token_bucket', rateBurst: 1, rateBase: 1 });

        expect((await send(port, '/page')).status).toBe(404);
        const limited = await send(port, '/page');
        expect(limited.status).toBe(429);
        expect(limited.headers['retry-after']).toBe('1');
        expect(limited.body).toBe('Too many requests\n');
    });
});
