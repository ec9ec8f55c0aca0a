/**
 * Packet-Filter Backends — kernel-level drop rules addressed by IP.
 *
 * Backends:
 *  - iptables → DROP rules in a configurable chain (ip6tables for IPv6)
 *  - memory   → dry run; rules live in a Set, nothing touches the host
 *  - none     → no backend, local enforcement only
 *
 * Contract:
 *  - block/unblock are idempotent: "already in the desired state" is success
 *  - a missing binary, missing privilege or timeout is a soft failure
 *    (`kind: 'unavailable'`), never a thrown error
 */

import { execFile } from 'child_process';
import { isIP } from 'net';
import { log, type PacketFilterSettings } from '@edgeguard/core';
import { BackendUnavailableError, errorMessage } from './errors.js';
import type { Address } from './types.js';

export type BackendFailureKind = 'unavailable' | 'failed';

export type BackendOutcome =
    | { ok: true; changed: boolean }
    | { ok: false; kind: BackendFailureKind; message: string };

export type BackendListing =
    | { ok: true; addresses: Set<Address> }
    | { ok: false; kind: BackendFailureKind; message: string };

export interface PacketFilterBackend {
    readonly name: string;
    block(address: Address): Promise<BackendOutcome>;
    unblock(address: Address): Promise<BackendOutcome>;
    listBlocked(): Promise<BackendListing>;
}

function failure(e: unknown): { ok: false; kind: BackendFailureKind; message: string } {
    return {
        ok: false,
        kind: e instanceof BackendUnavailableError ? 'unavailable' : 'failed',
        message: errorMessage(e),
    };
}

// ── Command execution ───────────────────────────────────────────

export interface CommandResult {
    stdout: string;
    stderr: string;
}

export class CommandError extends Error {
    constructor(
        message: string,
        readonly exitCode: number | null,
        readonly stderr: string,
        readonly errno: string | null = null,
        readonly timedOut: boolean = false,
    ) {
        super(message);
        this.name = 'CommandError';
    }
}

export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

/** execFile without a shell; the address never reaches a shell parser. */
export const execCommand: CommandRunner = (file, args, timeoutMs) => new Promise((resolve, reject) => {
    execFile(file, args, { timeout: timeoutMs }, (error, stdout, stderr) => {
        if (error) {
            reject(new CommandError(
                error.message,
                typeof error.code === 'number' ? error.code : null,
                String(stderr),
                typeof error.code === 'string' ? error.code : null,
                error.killed === true,
            ));
            return;
        }
        resolve({ stdout: String(stdout), stderr: String(stderr) });
    });
});

const PRIVILEGE_PATTERN = /permission denied|you must be root|a password is required|operation not permitted/i;

function isUnavailable(e: CommandError): boolean {
    return e.errno === 'ENOENT' || e.errno === 'EACCES' || e.timedOut || PRIVILEGE_PATTERN.test(e.stderr);
}

// ── iptables ────────────────────────────────────────────────────

export interface IptablesOptions {
    chain?: string;
    useSudo?: boolean;
    timeoutMs?: number;
    run?: CommandRunner;
}

const RULE_PATTERN = /^-A\s+(\S+)\s+-s\s+([0-9a-fA-F:.]+)\/(32|128)\s+-j\s+DROP\s*$/;

/** Extract single-host DROP sources from `iptables -S <chain>` output. */
export function parseRuleListing(stdout: string, chain: string): Address[] {
    const found: Address[] = [];
    for (const line of stdout.split('\n')) {
        const m = line.trim().match(RULE_PATTERN);
        if (m && m[1] === chain && isIP(m[2])) found.push(m[2].toLowerCase());
    }
    return found;
}

export class IptablesBackend implements PacketFilterBackend {
    readonly name = 'iptables';
    private chain: string;
    private useSudo: boolean;
    private timeoutMs: number;
    private run: CommandRunner;

    constructor(options: IptablesOptions = {}) {
        this.chain = options.chain ?? 'INPUT';
        this.useSudo = options.useSudo ?? false;
        this.timeoutMs = options.timeoutMs ?? 3000;
        this.run = options.run ?? execCommand;
    }

    private async iptables(binary: 'iptables' | 'ip6tables', args: string[]): Promise<CommandResult> {
        const [file, argv]: [string, string[]] = this.useSudo ? ['sudo', ['-n', binary, ...args]] : [binary, args];
        try {
            return await this.run(file, argv, this.timeoutMs);
        } catch (e) {
            if (e instanceof CommandError && isUnavailable(e)) {
                throw new BackendUnavailableError(`${binary} unavailable: ${e.stderr.trim() || e.message}`, e);
            }
            throw e;
        }
    }

    private binaryFor(address: Address): 'iptables' | 'ip6tables' {
        return isIP(address) === 6 ? 'ip6tables' : 'iptables';
    }

    private ruleArgs(op: '-C' | '-D', address: Address): string[] {
        return [op, this.chain, '-s', address, '-j', 'DROP'];
    }

    /** -C exits non-zero when the rule is absent; unavailability still throws. */
    private async ruleExists(address: Address): Promise<boolean> {
        try {
            await this.iptables(this.binaryFor(address), this.ruleArgs('-C', address));
            return true;
        } catch (e) {
            if (e instanceof CommandError) return false;
            throw e;
        }
    }

    async block(address: Address): Promise<BackendOutcome> {
        if (!isIP(address)) return { ok: false, kind: 'failed', message: `not an IP address: ${address}` };
        try {
            if (await this.ruleExists(address)) return { ok: true, changed: false };
            await this.iptables(this.binaryFor(address), ['-I', this.chain, '1', '-s', address, '-j', 'DROP']);
            return { ok: true, changed: true };
        } catch (e) {
            return failure(e);
        }
    }

    /** Deletes until no rule is left, which also clears duplicates. */
    async unblock(address: Address): Promise<BackendOutcome> {
        if (!isIP(address)) return { ok: false, kind: 'failed', message: `not an IP address: ${address}` };
        let removed = 0;
        try {
            for (let i = 0; i < 32; i++) {
                try {
                    await this.iptables(this.binaryFor(address), this.ruleArgs('-D', address));
                    removed++;
                } catch (e) {
                    if (e instanceof CommandError) break;
                    throw e;
                }
            }
            return { ok: true, changed: removed > 0 };
        } catch (e) {
            return failure(e);
        }
    }

    async listBlocked(): Promise<BackendListing> {
        const addresses = new Set<Address>();
        try {
            const v4 = await this.iptables('iptables', ['-S', this.chain]);
            for (const a of parseRuleListing(v4.stdout, this.chain)) addresses.add(a);
        } catch (e) {
            return failure(e);
        }
        try {
            const v6 = await this.iptables('ip6tables', ['-S', this.chain]);
            for (const a of parseRuleListing(v6.stdout, this.chain)) addresses.add(a);
        } catch (e) {
            log(`[PacketFilter] ip6tables listing skipped: ${errorMessage(e)}`, 'debug');
        }
        return { ok: true, addresses };
    }
}

// ── In-memory (dry run) ─────────────────────────────────────────

export interface MemoryBackendOptions {
    /** Delay before a block/unblock becomes visible in listBlocked(). */
    propagationDelayMs?: number;
    available?: boolean;
}

export class MemoryPacketFilter implements PacketFilterBackend {
    readonly name = 'memory';
    private rules = new Set<Address>();
    private delayMs: number;
    private available: boolean;

    constructor(options: MemoryBackendOptions = {}) {
        this.delayMs = options.propagationDelayMs ?? 0;
        this.available = options.available ?? true;
    }

    setAvailable(available: boolean): void {
        this.available = available;
    }

    private async settle(): Promise<void> {
        if (this.delayMs > 0) await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }

    async block(address: Address): Promise<BackendOutcome> {
        if (!this.available) return failure(new BackendUnavailableError('memory backend marked unavailable'));
        await this.settle();
        const changed = !this.rules.has(address);
        this.rules.add(address);
        log(`[PacketFilter] 🔶 DRY RUN: DROP ${address}${changed ? '' : ' (already present)'}`, 'debug');
        return { ok: true, changed };
    }

    async unblock(address: Address): Promise<BackendOutcome> {
        if (!this.available) return failure(new BackendUnavailableError('memory backend marked unavailable'));
        await this.settle();
        const changed = this.rules.delete(address);
        log(`[PacketFilter] 🔶 DRY RUN: ACCEPT ${address}${changed ? '' : ' (already absent)'}`, 'debug');
        return { ok: true, changed };
    }

    async listBlocked(): Promise<BackendListing> {
        if (!this.available) return failure(new BackendUnavailableError('memory backend marked unavailable'));
        return { ok: true, addresses: new Set(this.rules) };
    }
}

export function createPacketFilter(settings: PacketFilterSettings, run?: CommandRunner): PacketFilterBackend | null {
    switch (settings.kind) {
        case 'iptables':
            return new IptablesBackend({
                chain: settings.chain,
                useSudo: settings.useSudo,
                timeoutMs: settings.timeoutMs,
                run,
            });
        case 'memory':
            return new MemoryPacketFilter();
        case 'none':
            return null;
    }
}
