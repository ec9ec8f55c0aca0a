import os from 'os';
import path from 'path';
import * as fs from 'fs';
import { z } from 'zod';

export const EDGEGUARD_CONFIG_DIR = process.env.EDGEGUARD_CONFIG_DIR || path.join(os.homedir(), '.edgeguard');
export const EDGEGUARD_DATA_DIR = process.env.EDGEGUARD_DATA_DIR || EDGEGUARD_CONFIG_DIR;

export const CONFIG_FILE = path.join(EDGEGUARD_CONFIG_DIR, 'config.json');
export const METRICS_DB_FILE = path.join(EDGEGUARD_DATA_DIR, 'metrics.db');
export const SECURITY_LOG_FILE = path.join(EDGEGUARD_DATA_DIR, 'security.jsonl');

const positiveInt = z.coerce.number().int().positive();
const nullableSeconds = z.number().positive().nullable();

export const DefenseConfigSchema = z.object({
    rateStrategy: z.enum(['token_bucket', 'sliding_window']).default('token_bucket'),
    rateBase: z.coerce.number().positive().default(5),
    rateBurst: z.coerce.number().min(1).default(20),
    windowSeconds: z.coerce.number().positive().default(10),
    windowMaxRequests: positiveInt.default(12),
    perAddressConcurrencyLimit: positiveInt.default(6),
    globalConcurrencyLimit: positiveInt.default(80),
    banThreshold: positiveInt.default(4),
    banSeconds: z.union([z.literal('permanent'), z.coerce.number().positive()]).default(120),
    violationWindowSeconds: nullableSeconds.default(60),
    profile: z.enum(['soft', 'hard']).default('soft'),
    // null keeps per-address state until it is naturally removed (unbounded growth)
    idleTtlSeconds: nullableSeconds.default(null),
    sweepIntervalSeconds: z.number().positive().default(60),
    failMode: z.enum(['open', 'closed']).default('closed'),
    allowlist: z.array(z.string()).default([]),
    exemptPaths: z.array(z.string().startsWith('/')).default([]),
    exclusionResponse: z.enum(['too_many_requests', 'not_found', 'drop']).default('too_many_requests'),
    shedAtEstablished: z.number().int().positive().nullable().default(null),
});

export const PacketFilterConfigSchema = z.object({
    kind: z.enum(['iptables', 'memory', 'none']).default('iptables'),
    chain: z.string().regex(/^[A-Za-z0-9_-]+$/, 'Chain names are alphanumeric').default('INPUT'),
    useSudo: z.boolean().default(false),
    timeoutMs: positiveInt.default(3000),
});

export const EdgeGuardConfigSchema = z.object({
    server: z.object({
        port: z.coerce.number().int().min(1).max(65535).default(8080),
        host: z.string().default('0.0.0.0'),
        staticDir: z.string().default('site'),
        trustedProxies: z.array(z.string()).default([]),
    }).default({}),
    admin: z.object({
        port: z.coerce.number().int().min(1).max(65535).default(8081),
        host: z.string().default('127.0.0.1'),
    }).default({}),
    telemetry: z.object({
        intervalSeconds: z.coerce.number().positive().default(5),
        linkCapacityMbps: z.number().positive().nullable().default(null),
        dbFile: z.string().default(METRICS_DB_FILE),
        retentionHours: z.number().positive().default(24),
        cpuAlertPercent: z.number().min(1).max(100).default(95),
        memoryAlertPercent: z.number().min(1).max(100).default(90),
        alertAfterSeconds: z.number().positive().default(60),
    }).default({}),
    defense: DefenseConfigSchema.default({}),
    packetFilter: PacketFilterConfigSchema.default({}),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type EdgeGuardConfig = z.infer<typeof EdgeGuardConfigSchema>;
export type DefenseSettings = z.infer<typeof DefenseConfigSchema>;
export type PacketFilterSettings = z.infer<typeof PacketFilterConfigSchema>;

export class ConfigError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
        this.name = 'ConfigError';
    }
}

type RawSection = Record<string, unknown>;

function asRecord(value: unknown): RawSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

function compact(section: RawSection): RawSection {
    return Object.fromEntries(Object.entries(section).filter(([, v]) => v !== undefined));
}

function secondsOrNull(raw: string | undefined): number | null | undefined {
    if (raw === undefined || raw === '') return undefined;
    if (raw === 'null' || raw === 'off') return null;
    return Number(raw);
}

function list(raw: string | undefined): string[] | undefined {
    if (raw === undefined || raw === '') return undefined;
    return raw.split(',').map(s => s.trim()).filter(Boolean);
}

/** Environment overrides, grouped by config section. Unset variables are left out. */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, RawSection> {
    return {
        server: compact({
            port: env.PORT,
            host: env.HOST,
            staticDir: env.STATIC_DIR,
            trustedProxies: list(env.TRUSTED_PROXIES),
        }),
        admin: compact({ port: env.ADMIN_PORT, host: env.ADMIN_HOST }),
        telemetry: compact({
            intervalSeconds: env.TELEMETRY_INTERVAL_SECONDS,
            linkCapacityMbps: secondsOrNull(env.LINK_CAPACITY_MBPS),
            dbFile: env.METRICS_DB_FILE,
        }),
        defense: compact({
            rateStrategy: env.RATE_STRATEGY,
            rateBase: env.RATE_BASE,
            rateBurst: env.RATE_BURST,
            windowSeconds: env.WINDOW_SECONDS,
            windowMaxRequests: env.WINDOW_MAX_REQUESTS,
            perAddressConcurrencyLimit: env.PER_ADDRESS_LIMIT,
            globalConcurrencyLimit: env.GLOBAL_LIMIT,
            banThreshold: env.BAN_THRESHOLD,
            banSeconds: env.BAN_SECONDS,
            profile: env.PROFILE,
            idleTtlSeconds: secondsOrNull(env.IDLE_TTL_SECONDS),
            failMode: env.FAIL_MODE,
            allowlist: list(env.ALLOWLIST),
        }),
        packetFilter: compact({ kind: env.PACKET_FILTER, chain: env.PACKET_FILTER_CHAIN }),
    };
}

export function readConfigFile(file: string = CONFIG_FILE): RawSection {
    if (!fs.existsSync(file)) return {};
    try {
        return asRecord(JSON.parse(fs.readFileSync(file, 'utf8')));
    } catch (e) {
        throw new ConfigError(`Failed to read config file ${file}: ${e instanceof Error ? e.message : e}`);
    }
}

export function parseConfig(raw: unknown): EdgeGuardConfig {
    const result = EdgeGuardConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError('Invalid configuration',
            result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
    }
    return result.data;
}

/**
 * Load config.json (when present), overlay environment variables, validate.
 */
export function loadConfig(options: { file?: string; env?: NodeJS.ProcessEnv } = {}): EdgeGuardConfig {
    const fromFile = readConfigFile(options.file);
    const fromEnv = envOverrides(options.env ?? process.env);

    const merged: RawSection = { ...fromFile };
    for (const [section, values] of Object.entries(fromEnv)) {
        merged[section] = { ...asRecord(fromFile[section]), ...values };
    }
    const logLevel = (options.env ?? process.env).EDGEGUARD_LOG_LEVEL;
    if (logLevel) merged.logLevel = logLevel;

    return parseConfig(merged);
}

function parseValue(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch {
        return raw;
    }
}

/**
 * Set a dotted key (e.g. `defense.rateBase`) in config.json.
 * The whole file is validated before it is written.
 */
export function setConfigValue(key: string, rawValue: string, file: string = CONFIG_FILE): EdgeGuardConfig {
    const parts = key.split('.').filter(Boolean);
    if (parts.length === 0) throw new ConfigError('Empty config key');

    const root = readConfigFile(file);
    let cursor = root;
    for (const part of parts.slice(0, -1)) {
        const next = asRecord(cursor[part]);
        cursor[part] = next;
        cursor = next;
    }
    cursor[parts[parts.length - 1]] = parseValue(rawValue);

    const parsed = parseConfig(root);
    const dir = path.dirname(file);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(file, JSON.stringify(root, null, 2));
    return parsed;
}
