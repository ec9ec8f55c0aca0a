import { describe, it, expect } from 'vitest';
import { countEstablished, parseNetDev, TelemetrySampler, type CpuTimes } from '../system.js';

const GiB = 1024 * 1024 * 1024;

function netDev(eth0Recv: number, eth0Sent: number): string {
    return [
        'Inter-|   Receive                                                |  Transmit',
        ' face |bytes    packets errs drop fifo frame compressed multicast|bytes    packets errs drop fifo colls carrier compressed',
        '    lo:  5000      50    0    0    0     0          0         0     5000      50    0    0    0     0       0          0',
        `  eth0: ${eth0Recv}      10    0    0    0     0          0         0     ${eth0Sent}      20    0    0    0     0       0          0`,
        '',
    ].join('\n');
}

const TCP_HEADER = '  sl  local_address rem_address   st tx_queue rx_queue tr tm->when retrnsmt   uid  timeout inode';
const tcpTable = (...states: string[]) => [
    TCP_HEADER,
    ...states.map((st, i) => `   ${i}: 0100007F:1F90 0100007F:D2A4 ${st} 00000000:00000000 00:00000000 00000000  1000        0 ${1000 + i} 1`),
    '',
].join('\n');

function sequence<T>(values: T[]): () => T {
    let i = 0;
    return () => values[Math.min(i++, values.length - 1)];
}

describe('parseNetDev', () => {
    it('sums every interface except loopback', () => {
        const content = netDev(1000, 2000) + '  eth1: 500 5 0 0 0 0 0 0 300 3 0 0 0 0 0 0\n';
        expect(parseNetDev(content)).toEqual({ bytesRecv: 1500, bytesSent: 2300 });
    });

    it('returns null without any non-loopback interface', () => {
        expect(parseNetDev('    lo: 1 1 0 0 0 0 0 0 1 1 0 0 0 0 0 0\n')).toBeNull();
    });
});

describe('countEstablished', () => {
    it('counts state 01 rows and skips the header', () => {
        expect(countEstablished(tcpTable('0A', '01', '01', '06'))).toBe(2);
    });
});

describe('TelemetrySampler', () => {
    it('derives rates from deltas between samples', () => {
        let devReads = 0;
        const sampler = new TelemetrySampler({
            linkCapacityMbps: 1,
            sources: {
                cpuTimes: sequence<CpuTimes>([{ idle: 100, total: 200 }, { idle: 150, total: 400 }]),
                memory: () => ({ total: 8 * GiB, free: 2 * GiB }),
                now: sequence([0, 2000]),
                readProc: (file) => {
                    if (file === '/proc/net/dev') return devReads++ === 0 ? netDev(1000, 2000) : netDev(3000, 6000);
                    if (file === '/proc/net/tcp') return tcpTable('01', '01', '0A');
                    return null;
                },
            },
        });

        expect(sampler.sample()).toEqual({
            timestamp: 2000,
            cpuPercent: 75,
            memoryPercent: 75,
            memoryUsedMb: 6144,
            memoryTotalMb: 8192,
            bytesSentPerSec: 2000,
            bytesRecvPerSec: 1000,
            tcpEstablished: 2,
            linkUtilizationPercent: 1.6,
        });
    });

    it('reports -1 for unreadable kernel tables', () => {
        const sampler = new TelemetrySampler({
            linkCapacityMbps: 100,
            sources: {
                cpuTimes: () => ({ idle: 0, total: 0 }),
                memory: () => ({ total: GiB, free: GiB }),
                now: sequence([0, 1000]),
                readProc: () => null,
            },
        });

        const snapshot = sampler.sample();
        expect(snapshot.bytesSentPerSec).toBe(-1);
        expect(snapshot.bytesRecvPerSec).toBe(-1);
        expect(snapshot.tcpEstablished).toBe(-1);
        expect(snapshot.linkUtilizationPercent).toBeNull();
        expect(snapshot.cpuPercent).toBe(0);
    });
});
