import os from 'os';
import * as fs from 'fs';
import type { ServerProfile, TelemetrySnapshot } from './types.js';

export function getServerProfile(): ServerProfile {
    return {
        hostname: os.hostname(),
        platform: os.platform(),
        release: os.release(),
        arch: os.arch(),
        cpus: os.cpus().length,
        uptime: os.uptime(),
    };
}

/** Reads a kernel table; returns null when it is missing or unreadable. */
export type ProcReader = (file: string) => string | null;

export interface CpuTimes {
    idle: number;
    total: number;
}

export interface NetCounters {
    bytesSent: number;
    bytesRecv: number;
}

export interface SamplerSources {
    readProc: ProcReader;
    cpuTimes: () => CpuTimes;
    memory: () => { total: number; free: number };
    now: () => number;
}

const defaultSources: SamplerSources = {
    readProc: (file) => {
        try {
            return fs.readFileSync(file, 'utf8');
        } catch {
            return null;
        }
    },
    cpuTimes: () => {
        let idle = 0;
        let total = 0;
        for (const cpu of os.cpus()) {
            const t = cpu.times;
            idle += t.idle;
            total += t.user + t.nice + t.sys + t.idle + t.irq;
        }
        return { idle, total };
    },
    memory: () => ({ total: os.totalmem(), free: os.freemem() }),
    now: () => Date.now(),
};

/** Sum transmit/receive bytes from /proc/net/dev, loopback excluded. */
export function parseNetDev(content: string): NetCounters | null {
    let bytesSent = 0;
    let bytesRecv = 0;
    let seen = false;
    for (const line of content.split('\n')) {
        const sep = line.indexOf(':');
        if (sep === -1) continue;
        const iface = line.slice(0, sep).trim();
        if (!iface || iface === 'lo') continue;
        const fields = line.slice(sep + 1).trim().split(/\s+/).map(Number);
        if (fields.length < 9 || fields.some(n => Number.isNaN(n))) continue;
        bytesRecv += fields[0];
        bytesSent += fields[8];
        seen = true;
    }
    return seen ? { bytesSent, bytesRecv } : null;
}

/** Count sockets in state 01 (ESTABLISHED) in a /proc/net/tcp table. */
export function countEstablished(content: string): number {
    let count = 0;
    for (const line of content.split('\n').slice(1)) {
        const fields = line.trim().split(/\s+/);
        if (fields.length > 3 && fields[3] === '01') count++;
    }
    return count;
}

const round = (n: number, digits: number) => Number(n.toFixed(digits));

/**
 * Host telemetry sampler. Rates (CPU, bytes/s) are deltas against the previous
 * sample, so the first sample after construction reports 0 for them.
 */
export class TelemetrySampler {
    private sources: SamplerSources;
    private linkCapacityBps: number | null;
    private prevCpu: CpuTimes;
    private prevNet: NetCounters | null;
    private prevTs: number;

    constructor(options: { linkCapacityMbps?: number | null; sources?: Partial<SamplerSources> } = {}) {
        this.sources = { ...defaultSources, ...options.sources };
        this.linkCapacityBps = options.linkCapacityMbps ? options.linkCapacityMbps * 1_000_000 : null;
        this.prevCpu = this.sources.cpuTimes();
        this.prevNet = this.readNet();
        this.prevTs = this.sources.now();
    }

    private readNet(): NetCounters | null {
        const content = this.sources.readProc('/proc/net/dev');
        return content === null ? null : parseNetDev(content);
    }

    private readEstablished(): number {
        const v4 = this.sources.readProc('/proc/net/tcp');
        const v6 = this.sources.readProc('/proc/net/tcp6');
        if (v4 === null && v6 === null) return -1;
        return (v4 === null ? 0 : countEstablished(v4)) + (v6 === null ? 0 : countEstablished(v6));
    }

    sample(): TelemetrySnapshot {
        const now = this.sources.now();

        const cpu = this.sources.cpuTimes();
        const totalDelta = cpu.total - this.prevCpu.total;
        const idleDelta = cpu.idle - this.prevCpu.idle;
        const cpuPercent = totalDelta > 0 ? Math.min(100, Math.max(0, (1 - idleDelta / totalDelta) * 100)) : 0;
        this.prevCpu = cpu;

        const mem = this.sources.memory();
        const used = mem.total - mem.free;

        const net = this.readNet();
        const elapsedSec = Math.max(1e-6, (now - this.prevTs) / 1000);
        let bytesSentPerSec = -1;
        let bytesRecvPerSec = -1;
        if (net && this.prevNet) {
            bytesSentPerSec = Math.max(0, net.bytesSent - this.prevNet.bytesSent) / elapsedSec;
            bytesRecvPerSec = Math.max(0, net.bytesRecv - this.prevNet.bytesRecv) / elapsedSec;
        }
        this.prevNet = net;
        this.prevTs = now;

        let linkUtilizationPercent: number | null = null;
        if (this.linkCapacityBps !== null && bytesSentPerSec >= 0) {
            const busiest = Math.max(bytesSentPerSec, bytesRecvPerSec) * 8;
            linkUtilizationPercent = round((busiest / this.linkCapacityBps) * 100, 2);
        }

        return {
            timestamp: now,
            cpuPercent: round(cpuPercent, 2),
            memoryPercent: mem.total > 0 ? round((used / mem.total) * 100, 2) : 0,
            memoryUsedMb: round(used / 1024 / 1024, 2),
            memoryTotalMb: round(mem.total / 1024 / 1024, 2),
            bytesSentPerSec: round(bytesSentPerSec, 1),
            bytesRecvPerSec: round(bytesRecvPerSec, 1),
            tcpEstablished: this.readEstablished(),
            linkUtilizationPercent,
        };
    }
}
