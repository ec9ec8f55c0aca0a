import inquirer from 'inquirer';
import figlet from 'figlet';
import chalk from 'chalk';
import ora from 'ora';
import { execFile } from 'child_process';
import { CONFIG_FILE, readConfigFile, setConfigValue, log } from '@edgeguard/core';

export interface SetupAnswers {
    profile: 'soft' | 'hard';
    rateStrategy: 'token_bucket' | 'sliding_window';
    rateBase: number;
    rateBurst: number;
    windowSeconds: number;
    windowMaxRequests: number;
    perAddressConcurrencyLimit: number;
    globalConcurrencyLimit: number;
    banThreshold: number;
    banSeconds: number;
    permanentBans: boolean;
    packetFilter: 'iptables' | 'memory' | 'none';
}

/** Dotted config keys and JSON values the wizard writes, in order. */
export function setupEntries(answers: SetupAnswers): Array<[string, string]> {
    const entries: Array<[string, string]> = [
        ['defense.profile', JSON.stringify(answers.profile)],
        ['defense.rateStrategy', JSON.stringify(answers.rateStrategy)],
    ];
    if (answers.rateStrategy === 'token_bucket') {
        entries.push(['defense.rateBase', String(answers.rateBase)], ['defense.rateBurst', String(answers.rateBurst)]);
    } else {
        entries.push(['defense.windowSeconds', String(answers.windowSeconds)], ['defense.windowMaxRequests', String(answers.windowMaxRequests)]);
    }
    entries.push(
        ['defense.perAddressConcurrencyLimit', String(answers.perAddressConcurrencyLimit)],
        ['defense.globalConcurrencyLimit', String(answers.globalConcurrencyLimit)],
        ['defense.banThreshold', String(answers.banThreshold)],
        ['defense.banSeconds', answers.permanentBans ? JSON.stringify('permanent') : String(answers.banSeconds)],
        ['packetFilter.kind', JSON.stringify(answers.packetFilter)],
    );
    return entries;
}

/** True when `iptables --version` runs. */
export function detectIptables(timeoutMs = 3000): Promise<boolean> {
    return new Promise((resolve) => {
        execFile('iptables', ['--version'], { timeout: timeoutMs }, (error) => resolve(error === null));
    });
}

const positive = (input: number) => (Number.isFinite(input) && input > 0) || 'Enter a positive number.';

function numberAt(value: unknown, path: string[], fallback: number): number {
    let current: unknown = value;
    for (const key of path) {
        if (typeof current !== 'object' || current === null || !(key in current)) return fallback;
        current = Object.fromEntries(Object.entries(current))[key];
    }
    return typeof current === 'number' ? current : fallback;
}

export async function runSetup(file: string = CONFIG_FILE) {
    console.clear();
    console.log(
        chalk.cyan(
            figlet.textSync('EdgeGuard', { horizontalLayout: 'full' })
        )
    );
    console.log(chalk.dim(' Edge Admission Control\n'));

    const existing = readConfigFile(file);
    const current = (key: string, fallback: number) => numberAt(existing, ['defense', key], fallback);

    const spinner = ora('Probing packet filter...').start();
    const hasIptables = await detectIptables();
    if (hasIptables) spinner.succeed('iptables is available');
    else spinner.warn('iptables not usable here (missing or not root); hard profile will run as dry run');

    const answers = await inquirer.prompt<SetupAnswers>([
        {
            type: 'list',
            name: 'profile',
            message: 'Mitigation profile:',
            choices: [
                { name: 'soft: local exclusion that expires on its own', value: 'soft' },
                { name: 'hard: drop rule in the packet filter, removed only by unblock', value: 'hard' },
            ],
            default: 'soft',
        },
        {
            type: 'list',
            name: 'rateStrategy',
            message: 'Rate limiting strategy:',
            choices: [
                { name: 'Token bucket (sustained rate + burst)', value: 'token_bucket' },
                { name: 'Sliding window (requests per window)', value: 'sliding_window' },
            ],
            default: 'token_bucket',
        },
        {
            type: 'number',
            name: 'rateBase',
            message: 'Sustained requests per second per address:',
            default: current('rateBase', 5),
            when: (a: Partial<SetupAnswers>) => a.rateStrategy === 'token_bucket',
            validate: positive,
        },
        {
            type: 'number',
            name: 'rateBurst',
            message: 'Burst size:',
            default: current('rateBurst', 20),
            when: (a: Partial<SetupAnswers>) => a.rateStrategy === 'token_bucket',
            validate: positive,
        },
        {
            type: 'number',
            name: 'windowSeconds',
            message: 'Window length (seconds):',
            default: current('windowSeconds', 10),
            when: (a: Partial<SetupAnswers>) => a.rateStrategy === 'sliding_window',
            validate: positive,
        },
        {
            type: 'number',
            name: 'windowMaxRequests',
            message: 'Requests allowed per window:',
            default: current('windowMaxRequests', 12),
            when: (a: Partial<SetupAnswers>) => a.rateStrategy === 'sliding_window',
            validate: positive,
        },
        {
            type: 'number',
            name: 'perAddressConcurrencyLimit',
            message: 'Concurrent requests per address:',
            default: current('perAddressConcurrencyLimit', 6),
            validate: positive,
        },
        {
            type: 'number',
            name: 'globalConcurrencyLimit',
            message: 'Concurrent requests in total:',
            default: current('globalConcurrencyLimit', 80),
            validate: positive,
        },
        {
            type: 'number',
            name: 'banThreshold',
            message: 'Rate violations before exclusion:',
            default: current('banThreshold', 4),
            validate: positive,
        },
        {
            type: 'confirm',
            name: 'permanentBans',
            message: 'Make exclusions permanent?',
            default: false,
        },
        {
            type: 'number',
            name: 'banSeconds',
            message: 'Exclusion length (seconds):',
            default: current('banSeconds', 120),
            when: (a: Partial<SetupAnswers>) => !a.permanentBans,
            validate: positive,
        },
        {
            type: 'list',
            name: 'packetFilter',
            message: 'Packet filter backend:',
            choices: [
                { name: 'iptables', value: 'iptables' },
                { name: 'memory (dry run, nothing touches the host)', value: 'memory' },
                { name: 'none (local enforcement only)', value: 'none' },
            ],
            default: hasIptables ? 'iptables' : 'memory',
        },
    ]);

    const saving = ora('Saving configuration...').start();
    try {
        for (const [key, value] of setupEntries(answers)) setConfigValue(key, value, file);
        saving.succeed(`Configuration saved to ${file}`);
    } catch (e) {
        saving.fail('Configuration rejected');
        log(e instanceof Error ? e.message : String(e), 'error');
        process.exitCode = 1;
        return;
    }

    console.log('\n' + chalk.green('✔ Setup Complete!'));
    console.log(chalk.cyan('Run `edgeguardctl start` to launch the agent.'));
}
