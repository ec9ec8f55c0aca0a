import "dotenv/config";
import { ConfigError, loadConfig, log, setLogLevel, type EdgeGuardConfig } from "@edgeguard/core";
import { startAgent } from "./agent.js";
import { errorMessage } from "./defense/errors.js";

function readConfig(): EdgeGuardConfig {
    try {
        return loadConfig();
    } catch (e) {
        log(`[Config] ❌ ${errorMessage(e)}`, "error");
        process.exit(e instanceof ConfigError ? 78 : 1);
    }
}

const config = readConfig();

setLogLevel(config.logLevel);
log("[EdgeGuard] Starting edge admission control...");

const agent = await startAgent(config);

let stopping = false;
const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log(`[EdgeGuard] ${signal} received, shutting down...`);
    agent.stop().then(
        () => process.exit(0),
        (e: unknown) => {
            log(`[EdgeGuard] ❌ Shutdown error: ${errorMessage(e)}`, "error");
            process.exit(1);
        },
    );
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
