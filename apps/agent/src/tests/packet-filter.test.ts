import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
    CommandError,
    IptablesBackend,
    MemoryPacketFilter,
    createPacketFilter,
    parseRuleListing,
    type CommandRunner,
} from '../defense/packet-filter.js';

interface Call { file: string; args: string[] }

/** Simulates one iptables chain: -C/-D exit 1 when the rule is absent. */
function fakeIptables(rules: Set<string> = new Set()) {
    const calls: Call[] = [];
    const run: CommandRunner = async (file, args) => {
        calls.push({ file, args });
        const argv = file === 'sudo' ? args.slice(2) : args;
        const [op, chain] = argv;
        const address = argv[3];
        switch (op) {
            case '-C':
                if (rules.has(address)) return { stdout: '', stderr: '' };
                throw new CommandError('Command failed', 1, 'Bad rule (does a matching rule exist in that chain?)');
            case '-D':
                if (rules.delete(address)) return { stdout: '', stderr: '' };
                throw new CommandError('Command failed', 1, 'Bad rule');
            case '-I':
                rules.add(argv[4]);
                return { stdout: '', stderr: '' };
            case '-S':
                return {
                    stdout: [`-N ${chain}`, ...[...rules].map(a => `-A ${chain} -s ${a}/${a.includes(':') ? 128 : 32} -j DROP`)].join('\n'),
                    stderr: '',
                };
            default:
                throw new Error(`unexpected ${op}`);
        }
    };
    return { run, calls, rules };
}

describe('parseRuleListing', () => {
    it('keeps single-host DROP rules in the named chain', () => {
        const out = [
            '-N EDGEGUARD',
            '-A EDGEGUARD -s 198.51.100.7/32 -j DROP',
            '-A EDGEGUARD -s 10.0.0.0/8 -j DROP',
            '-A EDGEGUARD -s 203.0.113.9/32 -j ACCEPT',
            '-A OTHER -s 203.0.113.10/32 -j DROP',
            '-A EDGEGUARD -s 2001:DB8::1/128 -j DROP',
        ].join('\n');
        expect(parseRuleListing(out, 'EDGEGUARD')).toEqual(['198.51.100.7', '2001:db8::1']);
    });
});

describe('IptablesBackend', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    it('inserts a rule once and reports later blocks as unchanged', async () => {
        const fake = fakeIptables();
        const backend = new IptablesBackend({ chain: 'EDGEGUARD', run: fake.run });

        expect(await backend.block('198.51.100.7')).toEqual({ ok: true, changed: true });
        expect(await backend.block('198.51.100.7')).toEqual({ ok: true, changed: false });
        expect(fake.calls.map(c => c.args[0])).toEqual(['-C', '-I', '-C']);
        expect(fake.calls[1]).toEqual({ file: 'iptables', args: ['-I', 'EDGEGUARD', '1', '-s', '198.51.100.7', '-j', 'DROP'] });
    });

    it('uses ip6tables for IPv6 addresses', async () => {
        const fake = fakeIptables();
        const backend = new IptablesBackend({ run: fake.run });
        await backend.block('2001:db8::1');
        expect(fake.calls.every(c => c.file === 'ip6tables')).toBe(true);
    });

    it('runs through sudo -n when configured', async () => {
        const fake = fakeIptables();
        const backend = new IptablesBackend({ chain: 'EDGEGUARD', useSudo: true, run: fake.run });
        await backend.block('198.51.100.7');
        expect(fake.calls[0]).toEqual({ file: 'sudo', args: ['-n', 'iptables', '-C', 'EDGEGUARD', '-s', '198.51.100.7', '-j', 'DROP'] });
    });

    it('removes duplicate rules on unblock and is idempotent', async () => {
        const fake = fakeIptables(new Set(['198.51.100.7']));
        const backend = new IptablesBackend({ run: fake.run });
        expect(await backend.unblock('198.51.100.7')).toEqual({ ok: true, changed: true });
        expect(await backend.unblock('198.51.100.7')).toEqual({ ok: true, changed: false });
        expect(fake.rules.size).toBe(0);
    });

    it('rejects anything that is not an IP before running a command', async () => {
        const fake = fakeIptables();
        const backend = new IptablesBackend({ run: fake.run });
        const outcome = await backend.block('1.2.3.4; rm -rf /');
        expect(outcome).toEqual({ ok: false, kind: 'failed', message: 'not an IP address: 1.2.3.4; rm -rf /' });
        expect(fake.calls).toHaveLength(0);
    });

    it('maps a missing binary to unavailable', async () => {
        const run: CommandRunner = async () => {
            throw new CommandError('spawn iptables ENOENT', null, '', 'ENOENT');
        };
        const outcome = await new IptablesBackend({ run }).block('198.51.100.7');
        expect(outcome.ok).toBe(false);
        expect(!outcome.ok && outcome.kind).toBe('unavailable');
    });

    it('maps missing privileges to unavailable', async () => {
        const run: CommandRunner = async () => {
            throw new CommandError('Command failed', 4, 'iptables v1.8.7 (nf_tables): Could not fetch rule set generation id: Permission denied (you must be root)');
        };
        const listing = await new IptablesBackend({ run }).listBlocked();
        expect(!listing.ok && listing.kind).toBe('unavailable');
    });

    it('lists rules from both address families', async () => {
        const fake = fakeIptables(new Set(['198.51.100.7']));
        const backend = new IptablesBackend({ chain: 'EDGEGUARD', run: fake.run });
        const listing = await backend.listBlocked();
        expect(listing.ok && [...listing.addresses]).toEqual(['198.51.100.7']);
        expect(fake.calls.map(c => c.file)).toEqual(['iptables', 'ip6tables']);
    });
});

describe('MemoryPacketFilter', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    it('reports unavailable while marked down', async () => {
        const backend = new MemoryPacketFilter();
        backend.setAvailable(false);
        expect(await backend.block('198.51.100.7')).toEqual({ ok: false, kind: 'unavailable', message: 'memory backend marked unavailable' });
        backend.setAvailable(true);
        expect(await backend.block('198.51.100.7')).toEqual({ ok: true, changed: true });
    });

    it('delays visibility by the propagation delay', async () => {
        vi.useFakeTimers();
        try {
            const backend = new MemoryPacketFilter({ propagationDelayMs: 100 });
            const pending = backend.block('198.51.100.7');
            const before = await backend.listBlocked();
            expect(before.ok && before.addresses.size).toBe(0);

            await vi.advanceTimersByTimeAsync(100);
            expect(await pending).toEqual({ ok: true, changed: true });
            const after = await backend.listBlocked();
            expect(after.ok && [...after.addresses]).toEqual(['198.51.100.7']);
        } finally {
            vi.useRealTimers();
        }
    });
});

describe('createPacketFilter', () => {
    const settings = { kind: 'none' as const, chain: 'INPUT', useSudo: false, timeoutMs: 3000 };

    it('builds the configured backend', () => {
        expect(createPacketFilter(settings)).toBeNull();
        expect(createPacketFilter({ ...settings, kind: 'memory' })?.name).toBe('memory');
        expect(createPacketFilter({ ...settings, kind: 'iptables' })?.name).toBe('iptables');
    });
});
