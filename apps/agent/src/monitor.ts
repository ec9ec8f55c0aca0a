import { log, type EdgeGuardConfig, type TelemetrySignals, type TelemetrySnapshot } from "@edgeguard/core";
import { errorMessage } from "./defense/errors.js";

export type TelemetrySettings = EdgeGuardConfig["telemetry"];

/** Where snapshots go. MetricsDB satisfies this. */
export interface SnapshotSink {
    saveSnapshot(snapshot: TelemetrySnapshot): void;
    pruneSnapshots(cutoff: number): number;
}

export interface SnapshotSource {
    sample(): TelemetrySnapshot;
}

export type AlertKind = "CPU" | "MEMORY";

export interface ResourceAlert {
    kind: AlertKind;
    value: number;
    threshold: number;
    durationSeconds: number;
}

export interface MonitorListeners {
    onSnapshot?: (snapshot: TelemetrySnapshot) => void;
    onAlert?: (alert: ResourceAlert) => void;
}

const PRUNE_EVERY_MS = 10 * 60 * 1000;

export class TelemetryMonitor {
    private checkInterval: NodeJS.Timeout | null = null;
    private settings: TelemetrySettings;
    private sampler: SnapshotSource;
    private sink: SnapshotSink | null;
    private listeners: MonitorListeners;
    private latestSnapshot: TelemetrySnapshot | null = null;
    private lastPruneAt = 0;

    // State
    private highCpuSince: number | null = null;
    private highMemSince: number | null = null;

    constructor(settings: TelemetrySettings, sampler: SnapshotSource, sink: SnapshotSink | null, listeners: MonitorListeners = {}) {
        this.settings = { ...settings };
        this.sampler = sampler;
        this.sink = sink;
        this.listeners = listeners;
    }

    start() {
        if (this.checkInterval) return;
        log(`[Monitor] Starting telemetry sampling (every ${this.settings.intervalSeconds}s)`);
        this.checkInterval = setInterval(() => {
            try {
                this.tick();
            } catch (e) {
                log(`[Monitor] Error sampling telemetry: ${errorMessage(e)}`, "error");
            }
        }, this.settings.intervalSeconds * 1000);
        this.checkInterval.unref();
    }

    stop() {
        if (this.checkInterval) {
            clearInterval(this.checkInterval);
            this.checkInterval = null;
        }
    }

    get latest(): TelemetrySnapshot | null {
        return this.latestSnapshot;
    }

    /** Read-only view for the admission path; null before the first sample. */
    signals(): TelemetrySignals | null {
        const s = this.latestSnapshot;
        if (!s || s.tcpEstablished < 0) return null;
        return { tcpEstablished: s.tcpEstablished, linkUtilizationPercent: s.linkUtilizationPercent };
    }

    /** Take one sample, persist it and evaluate alerts. */
    tick(): TelemetrySnapshot {
        const snapshot = this.sampler.sample();
        this.latestSnapshot = snapshot;

        if (this.sink) {
            try {
                this.sink.saveSnapshot(snapshot);
                if (snapshot.timestamp - this.lastPruneAt >= PRUNE_EVERY_MS) {
                    const removed = this.sink.pruneSnapshots(snapshot.timestamp - this.settings.retentionHours * 3600 * 1000);
                    this.lastPruneAt = snapshot.timestamp;
                    if (removed > 0) log(`[Monitor] Pruned ${removed} old snapshot(s)`, "debug");
                }
            } catch (e) {
                log(`[Monitor] ⚠️ Metrics sink write failed: ${errorMessage(e)}`, "warn");
            }
        }

        this.listeners.onSnapshot?.(snapshot);
        this.checkThresholds(snapshot);
        return snapshot;
    }

    private checkThresholds(snapshot: TelemetrySnapshot) {
        const now = snapshot.timestamp;
        const durationMs = this.settings.alertAfterSeconds * 1000;

        // CPU Check
        if (snapshot.cpuPercent > this.settings.cpuAlertPercent) {
            if (this.highCpuSince === null) this.highCpuSince = now;
            else if (now - this.highCpuSince >= durationMs) {
                this.triggerAlert("CPU", snapshot.cpuPercent, this.settings.cpuAlertPercent);
                this.highCpuSince = null; // re-arm
            }
        } else {
            this.highCpuSince = null;
        }

        // Memory Check
        if (snapshot.memoryPercent > this.settings.memoryAlertPercent) {
            if (this.highMemSince === null) this.highMemSince = now;
            else if (now - this.highMemSince >= durationMs) {
                this.triggerAlert("MEMORY", snapshot.memoryPercent, this.settings.memoryAlertPercent);
                this.highMemSince = null;
            }
        } else {
            this.highMemSince = null;
        }
    }

    private triggerAlert(kind: AlertKind, value: number, threshold: number) {
        log(`[Monitor] 🚨 High ${kind} usage detected: ${value}% (threshold ${threshold}%)`, "warn");
        this.listeners.onAlert?.({ kind, value, threshold, durationSeconds: this.settings.alertAfterSeconds });
    }
}
