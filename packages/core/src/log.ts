export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: unknown): value is LogLevel {
    return value === "debug" || value === "info" || value === "warn" || value === "error";
}

const envLevel = process.env.EDGEGUARD_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel) {
    threshold = level;
}

export function log(message: string, level: LogLevel = "info") {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const line = `[${level.toUpperCase()}] ${message}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
}
