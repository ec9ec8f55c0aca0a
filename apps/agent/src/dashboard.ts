import { log, type ServerProfile, type TelemetrySnapshot, getServerProfile } from "@edgeguard/core";
import { WebSocketServer, WebSocket } from "ws";
import type { Server } from "http";
import type { ExclusionEntry, ExclusionView, ReleaseEvent } from "./defense/types.js";
import type { ExclusionRegistry } from "./defense/registry.js";
import type { ResourceAlert } from "./monitor.js";

/** The part of a connected client the hub uses. */
export interface DashboardClient {
    readonly readyState: number;
    send(data: string): void;
}

export type DashboardMessage =
    | { type: "identity"; data: ServerProfile }
    | { type: "telemetry"; data: TelemetrySnapshot }
    | { type: "exclusions"; data: ExclusionView[] }
    | { type: "exclusion"; data: ExclusionEntry }
    | { type: "release"; data: { address: string; cause: ReleaseEvent["cause"] } }
    | { type: "alert"; data: ResourceAlert };

export interface DashboardState {
    latest(): TelemetrySnapshot | null;
    exclusions(): ExclusionView[];
}

/**
 * Pushes live telemetry and exclusion changes to dashboard sockets.
 * New clients get the server identity, the latest snapshot and the
 * current exclusion list.
 */
export class DashboardHub {
    private clients = new Set<DashboardClient>();
    private profile: ServerProfile;
    private state: DashboardState;
    private wss: WebSocketServer | null = null;

    constructor(state: DashboardState, profile: ServerProfile = getServerProfile()) {
        this.state = state;
        this.profile = profile;
        log(`[Dashboard] Server Identity: ${this.profile.hostname} (${this.profile.platform} ${this.profile.arch})`);
    }

    /** Accept sockets on `path` of an existing HTTP server. */
    attach(server: Server, path = "/ws") {
        if (this.wss) return;
        this.wss = new WebSocketServer({ server, path });
        this.wss.on("connection", (socket: WebSocket) => {
            this.addClient(socket);
            socket.on("close", () => this.clients.delete(socket));
            socket.on("error", (e) => {
                log(`[Dashboard] Socket error: ${e.message}`, "debug");
                this.clients.delete(socket);
            });
        });
        log(`[Dashboard] Accepting dashboard sockets on ${path}`);
    }

    addClient(client: DashboardClient) {
        this.clients.add(client);
        this.sendTo(client, { type: "identity", data: this.profile });
        const latest = this.state.latest();
        if (latest) this.sendTo(client, { type: "telemetry", data: latest });
        this.sendTo(client, { type: "exclusions", data: this.state.exclusions() });
    }

    removeClient(client: DashboardClient) {
        this.clients.delete(client);
    }

    get clientCount(): number {
        return this.clients.size;
    }

    /** Forward registry events. Returns a detach function. */
    follow(registry: ExclusionRegistry): () => void {
        const onExcluded = (entry: ExclusionEntry) => this.broadcast({ type: "exclusion", data: entry });
        const onReleased = (event: ReleaseEvent) =>
            this.broadcast({ type: "release", data: { address: event.address, cause: event.cause } });
        registry.on("excluded", onExcluded);
        registry.on("released", onReleased);
        return () => {
            registry.off("excluded", onExcluded);
            registry.off("released", onReleased);
        };
    }

    publishTelemetry(snapshot: TelemetrySnapshot) {
        this.broadcast({ type: "telemetry", data: snapshot });
    }

    publishAlert(alert: ResourceAlert) {
        this.broadcast({ type: "alert", data: alert });
    }

    broadcast(message: DashboardMessage) {
        const data = JSON.stringify(message);
        for (const client of this.clients) {
            if (client.readyState === WebSocket.OPEN) client.send(data);
        }
    }

    close(): Promise<void> {
        const wss = this.wss;
        this.wss = null;
        this.clients.clear();
        if (!wss) return Promise.resolve();
        for (const client of wss.clients) client.terminate();
        return new Promise((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
    }

    private sendTo(client: DashboardClient, message: DashboardMessage) {
        if (client.readyState === WebSocket.OPEN) client.send(JSON.stringify(message));
    }
}
