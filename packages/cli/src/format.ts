import chalk from 'chalk';
import type { DefenseStatusView, ExclusionView, SecurityEventView } from './client.js';

export function formatRemaining(seconds: number | null): string {
    if (seconds === null) return 'permanent';
    if (seconds < 60) return `${seconds}s`;
    const m = Math.floor(seconds / 60);
    const s = seconds % 60;
    if (m < 60) return `${m}m ${String(s).padStart(2, '0')}s`;
    const h = Math.floor(m / 60);
    return `${h}h ${String(m % 60).padStart(2, '0')}m`;
}

function syncLabel(sync: ExclusionView['sync']): string {
    switch (sync) {
        case null: return '';
        case 'installed': return chalk.green(' [filter: installed]');
        case 'pending': return chalk.yellow(' [filter: pending]');
        case 'failed': return chalk.red(' [filter: failed]');
    }
}

export function formatExclusions(list: ExclusionView[]): string {
    if (list.length === 0) return chalk.dim('No active exclusions.');
    const width = Math.max(...list.map(e => e.address.length));
    return list
        .map(e => `${chalk.bold(e.address.padEnd(width))}  ${formatRemaining(e.remainingSeconds).padEnd(9)}  ${e.tier}/${e.source}  ${e.reason}${syncLabel(e.sync)}`)
        .join('\n');
}

export function formatStatus(status: DefenseStatusView): string {
    const load = status.globalActive / status.globalLimit;
    const color = load >= 0.9 ? chalk.red : load >= 0.6 ? chalk.yellow : chalk.green;
    return [
        `${chalk.bold('In flight:')}      ${color(`${status.globalActive}/${status.globalLimit}`)} (per address ${status.perAddressLimit})`,
        `${chalk.bold('Strategy:')}       ${status.strategy}, profile ${status.profile}, fail ${status.failMode}`,
        `${chalk.bold('Packet filter:')}  ${status.packetFilter ?? 'none'}`,
        `${chalk.bold('Excluded:')}       ${status.excludedCount}`,
        `${chalk.bold('Tracked:')}        rate ${status.tracked.rate}, concurrency ${status.tracked.concurrency}, violations ${status.tracked.violations}`,
    ].join('\n');
}

function actionLabel(action: string): string {
    switch (action) {
        case 'excluded': return chalk.red(action.padEnd(10));
        case 'released':
        case 'expired': return chalk.green(action.padEnd(10));
        default: return action.padEnd(10);
    }
}

/** Oldest first, one line per event; `limit` keeps the newest. */
export function formatEvents(events: SecurityEventView[], limit: number = events.length): string {
    const shown = events.slice(Math.max(0, events.length - limit));
    if (shown.length === 0) return chalk.dim('No security events recorded.');
    const width = Math.max(...shown.map(e => e.address.length));
    return shown
        .map(e => {
            const origin = [e.tier, e.source].filter(Boolean).join('/');
            return `${chalk.dim(e.timestamp)}  ${actionLabel(e.action)}  ${chalk.bold(e.address.padEnd(width))}  ${origin}${e.reason ? `  ${e.reason}` : ''}`;
        })
        .join('\n');
}
