import { log } from '@edgeguard/core';

/**
 * The packet-filter backend cannot be used: binary missing, no privilege,
 * or the call timed out. Converted to a failed outcome at the backend
 * boundary; never reaches the request path.
 */
export class BackendUnavailableError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'BackendUnavailableError';
    }
}

/**
 * Report self-healed state corruption (a counter below zero, an exclusion
 * with an impossible expiry). The caller has already repaired the state.
 */
export function reportCorruption(component: string, detail: string): void {
    log(`[${component}] ⚠️ State corruption repaired: ${detail}`, 'warn');
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
