/**
 * Agent assembly: config → packet filter → defense → telemetry → servers.
 */

import {
    ConfigError,
    log,
    MetricsDB,
    TelemetrySampler,
    type EdgeGuardConfig,
} from '@edgeguard/core';
import { AdminApi, AdminServer } from './admin.js';
import { DashboardHub } from './dashboard.js';
import { createDefense, createPacketFilter, type Defense, type PacketFilterBackend } from './defense/index.js';
import { parseRangeList } from './ip/cidr.js';
import { configureSecurityLog, closeSecurityLog, recordRegistryEvents } from './logging/structured.js';
import { TelemetryMonitor } from './monitor.js';
import { EdgeServer } from './server.js';

export interface AgentOptions {
    /** Overrides the backend built from `packetFilter`. */
    backend?: PacketFilterBackend | null;
    /** Security log file; defaults to the data directory. */
    securityLogFile?: string;
}

export interface RunningAgent {
    defense: Defense;
    monitor: TelemetryMonitor;
    edgePort: number;
    adminPort: number;
    stop(): Promise<void>;
}

export async function startAgent(config: EdgeGuardConfig, options: AgentOptions = {}): Promise<RunningAgent> {
    const { ranges: trustedProxies, invalid } = parseRangeList(config.server.trustedProxies);
    if (invalid.length > 0) {
        throw new ConfigError('Invalid server.trustedProxies entries', invalid.map(e => `not an address or CIDR: ${e}`));
    }

    if (options.securityLogFile) configureSecurityLog({ file: options.securityLogFile });

    const backend = options.backend !== undefined ? options.backend : createPacketFilter(config.packetFilter);
    log(`[Agent] Packet filter: ${backend ? backend.name : 'none (local enforcement only)'}`);

    // Monitor is created first so the engine can read its signals.
    const db = new MetricsDB(config.telemetry.dbFile);
    const sampler = new TelemetrySampler({ linkCapacityMbps: config.telemetry.linkCapacityMbps });
    let hub: DashboardHub | null = null;
    const monitor = new TelemetryMonitor(config.telemetry, sampler, db, {
        onSnapshot: (snapshot) => hub?.publishTelemetry(snapshot),
        onAlert: (alert) => hub?.publishAlert(alert),
    });

    const defense = createDefense(config.defense, {
        backend,
        backendTimeoutMs: config.packetFilter.timeoutMs * 2,
        signals: () => monitor.signals(),
    });
    const detachSecurityLog = recordRegistryEvents(defense.registry);

    const imported = await defense.registry.reconcile(Date.now());
    if (imported > 0) log(`[Agent] Restored ${imported} exclusion(s) from the packet filter`);

    hub = new DashboardHub({
        latest: () => monitor.latest,
        exclusions: () => defense.registry.list(Date.now()),
    });
    const detachHub = hub.follow(defense.registry);

    const edge = new EdgeServer({ ...config.server, trustedProxies }, defense.engine, monitor);
    const admin = new AdminServer(
        config.admin,
        new AdminApi({ engine: defense.engine, registry: defense.registry, defense: config.defense }),
        hub,
    );

    monitor.tick();
    monitor.start();
    defense.sweeper.start();

    const edgePort = await edge.start();
    const adminPort = await admin.start();
    log(`[Agent] ✅ Admission control active (${config.defense.rateStrategy}, profile ${config.defense.profile})`);

    const dashboard = hub;
    return {
        defense,
        monitor,
        edgePort,
        adminPort,
        async stop() {
            monitor.stop();
            defense.sweeper.stop();
            detachHub();
            detachSecurityLog();
            await Promise.all([edge.stop(), admin.stop(), dashboard.close()]);
            await defense.registry.flush();
            db.close();
            closeSecurityLog();
            log('[Agent] Stopped');
        },
    };
}
