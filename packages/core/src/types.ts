/** One host telemetry sample, as exposed on `/status` and stored in the metrics sink. */
export interface TelemetrySnapshot {
    timestamp: number;          // epoch ms
    cpuPercent: number;
    memoryPercent: number;
    memoryUsedMb: number;
    memoryTotalMb: number;
    bytesSentPerSec: number;
    bytesRecvPerSec: number;
    tcpEstablished: number;     // -1 when the kernel tables are unreadable
    linkUtilizationPercent: number | null;
}

/** Read-only signals the admission path may consult. */
export interface TelemetrySignals {
    tcpEstablished: number;
    linkUtilizationPercent: number | null;
}

export interface ServerProfile {
    hostname: string;
    platform: string;
    release: string;
    arch: string;
    cpus: number;
    uptime: number;
}
