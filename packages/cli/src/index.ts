import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { spawn } from 'child_process';
import path from 'path';
import { fileURLToPath } from 'url';
import { CONFIG_FILE, loadConfig, log, setConfigValue } from '@edgeguard/core';
import { AdminClient } from './client.js';
import { formatEvents, formatExclusions, formatRemaining, formatStatus } from './format.js';
import { runSetup } from './setup.js';

const program = new Command();

function adminUrl(explicit: string | undefined): string {
    if (explicit) return explicit;
    if (process.env.EDGEGUARD_ADMIN_URL) return process.env.EDGEGUARD_ADMIN_URL;
    const { admin } = loadConfig();
    const host = admin.host === '0.0.0.0' ? '127.0.0.1' : admin.host;
    return `http://${host.includes(':') ? `[${host}]` : host}:${admin.port}`;
}

function client(): AdminClient {
    const opts = program.opts<{ adminUrl?: string }>();
    return new AdminClient(adminUrl(opts.adminUrl));
}

function positiveCount(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Must be a positive whole number.');
    return n;
}

function positiveSeconds(value: string): number {
    const n = Number(value);
    if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('Must be a positive number of seconds.');
    return n;
}

/** Print the failure and set a non-zero exit code. */
async function run(action: () => Promise<void>) {
    try {
        await action();
    } catch (e) {
        console.error(chalk.red(`❌ ${e instanceof Error ? e.message : String(e)}`));
        process.exitCode = 1;
    }
}

program
    .name('edgeguardctl')
    .description('Control the EdgeGuard admission-control agent')
    .version('0.1.0')
    .option('--admin-url <url>', 'Admin API base URL (default: from config)');

program
    .command('setup')
    .description('Run interactive configuration wizard')
    .action(async () => {
        await runSetup();
    });

program
    .command('start')
    .description('Start the EdgeGuard agent in the foreground')
    .action(() => {
        console.log('🚀 Starting EdgeGuard...');
        const rootDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../..');

        const agent = spawn('npm', ['start'], {
            cwd: rootDir,
            stdio: 'inherit',
            env: process.env,
        });
        agent.on('exit', (code) => {
            process.exitCode = code ?? 1;
        });

        process.on('SIGINT', () => {
            agent.kill('SIGINT');
        });
    });

program
    .command('status')
    .description('Show in-flight requests, strategy and exclusion count')
    .action(() => run(async () => {
        console.log(formatStatus(await client().status()));
    }));

program
    .command('list')
    .description('List active exclusions with remaining time')
    .action(() => run(async () => {
        console.log(formatExclusions(await client().list()));
    }));

program
    .command('events')
    .description('Show recent exclusion and release events')
    .option('-n, --count <n>', 'Number of events to show', positiveCount, 20)
    .action((opts: { count: number }) => run(async () => {
        console.log(formatEvents(await client().events(), opts.count));
    }));

program
    .command('block <address>')
    .description('Exclude an address (idempotent)')
    .option('-s, --seconds <n>', 'Exclusion length in seconds', positiveSeconds)
    .option('-p, --permanent', 'Never expire')
    .option('-r, --reason <text>', 'Reason recorded with the exclusion')
    .action((address: string, opts: { seconds?: number; permanent?: boolean; reason?: string }) => run(async () => {
        if (opts.seconds !== undefined && opts.permanent) {
            throw new Error('--seconds and --permanent are mutually exclusive');
        }
        const result = await client().block(address, opts);
        const ttl = formatRemaining(result.exclusion.remainingSeconds);
        console.log(result.created
            ? chalk.green(`🛡️ ${result.exclusion.address} excluded (${ttl}, ${result.exclusion.tier})`)
            : chalk.yellow(`${result.exclusion.address} was already excluded (${ttl} left)`));
    }));

program
    .command('unblock <address>')
    .description('Release an exclusion and remove its packet-filter rule (idempotent)')
    .action((address: string) => run(async () => {
        const removed = await client().unblock(address);
        console.log(removed
            ? chalk.green(`✅ ${address} released`)
            : chalk.dim(`${address} was not excluded; packet-filter rule removal requested`));
    }));

program
    .command('config <key> <value>')
    .description('Set a configuration value, e.g. `config defense.rateBase 10`')
    .action((key: string, value: string) => run(async () => {
        setConfigValue(key, value);
        log(`Configuration saved to ${CONFIG_FILE}`);
        log('Restart the agent to apply changes: edgeguardctl start');
    }));

await program.parseAsync(process.argv);
