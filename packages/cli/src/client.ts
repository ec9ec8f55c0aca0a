import { z } from 'zod';

/**
 * Thin client for the agent's loopback admin API. Responses are validated
 * before they reach the formatter.
 */

export const ExclusionViewSchema = z.object({
    address: z.string(),
    tier: z.enum(['local', 'packet-filter']),
    remainingSeconds: z.number().nullable(),
    reason: z.string(),
    source: z.string(),
    sync: z.enum(['pending', 'installed', 'failed']).nullable(),
});

export type ExclusionView = z.infer<typeof ExclusionViewSchema>;

const ExclusionListSchema = z.object({ exclusions: z.array(ExclusionViewSchema) });

export const DefenseStatusSchema = z.object({
    globalActive: z.number(),
    globalLimit: z.number(),
    perAddressLimit: z.number(),
    strategy: z.string(),
    profile: z.string(),
    failMode: z.string(),
    packetFilter: z.string().nullable(),
    excludedCount: z.number(),
    excluded: z.array(ExclusionViewSchema),
    tracked: z.object({
        rate: z.number(),
        concurrency: z.number(),
        violations: z.number(),
    }),
});

export type DefenseStatusView = z.infer<typeof DefenseStatusSchema>;

const BlockResponseSchema = z.object({
    created: z.boolean(),
    exclusion: ExclusionViewSchema,
});

export type BlockResponse = z.infer<typeof BlockResponseSchema>;

const UnblockResponseSchema = z.object({ removed: z.boolean() });

export const SecurityEventSchema = z.object({
    timestamp: z.string(),
    address: z.string(),
    action: z.string(),
    reason: z.string().optional(),
    source: z.string().optional(),
    tier: z.string().optional(),
    expiresAt: z.string().nullable().optional(),
});

export type SecurityEventView = z.infer<typeof SecurityEventSchema>;

const EventListSchema = z.object({ events: z.array(SecurityEventSchema) });

const ErrorBodySchema = z.object({ error: z.string() });

export interface BlockOptions {
    seconds?: number;
    permanent?: boolean;
    reason?: string;
}

export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

export class AdminRequestError extends Error {
    constructor(message: string, public readonly status: number | null) {
        super(message);
        this.name = 'AdminRequestError';
    }
}

export class AdminClient {
    private baseUrl: string;
    private fetcher: Fetcher;

    constructor(baseUrl: string, fetcher: Fetcher = fetch) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.fetcher = fetcher;
    }

    private async request<T>(schema: z.ZodType<T>, method: string, path: string, body?: unknown): Promise<T> {
        let response: Response;
        try {
            response = await this.fetcher(`${this.baseUrl}${path}`, {
                method,
                headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
                body: body === undefined ? undefined : JSON.stringify(body),
            });
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new AdminRequestError(`Agent not reachable at ${this.baseUrl} (${reason})`, null);
        }

        const text = await response.text();
        let payload: unknown = null;
        if (text) {
            try {
                payload = JSON.parse(text);
            } catch {
                throw new AdminRequestError(`Unexpected response from agent (HTTP ${response.status})`, response.status);
            }
        }

        if (!response.ok) {
            const error = ErrorBodySchema.safeParse(payload);
            throw new AdminRequestError(error.success ? error.data.error : `HTTP ${response.status}`, response.status);
        }

        const parsed = schema.safeParse(payload);
        if (!parsed.success) {
            throw new AdminRequestError(`Malformed response for ${method} ${path}`, response.status);
        }
        return parsed.data;
    }

    async list(): Promise<ExclusionView[]> {
        const body = await this.request(ExclusionListSchema, 'GET', '/exclusions');
        return body.exclusions;
    }

    status(): Promise<DefenseStatusView> {
        return this.request(DefenseStatusSchema, 'GET', '/defense/status');
    }

    async events(): Promise<SecurityEventView[]> {
        const body = await this.request(EventListSchema, 'GET', '/events');
        return body.events;
    }

    block(address: string, options: BlockOptions = {}): Promise<BlockResponse> {
        return this.request(BlockResponseSchema, 'PUT', `/exclusions/${encodeURIComponent(address)}`, options);
    }

    async unblock(address: string): Promise<boolean> {
        const body = await this.request(UnblockResponseSchema, 'DELETE', `/exclusions/${encodeURIComponent(address)}`);
        return body.removed;
    }
}
