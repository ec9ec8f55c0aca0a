/**
 * Concurrency Gate — global and per-address in-flight ceilings.
 *
 * acquire() checks global first, then the address. A refusal leaves both
 * counters exactly as they were. Leases make release one-shot so the
 * transport can release from every exit path without double counting.
 */

import { MemoryStateStore, type StateStore } from './store.js';
import { reportCorruption } from './errors.js';
import type { Address } from './types.js';

export interface ConcurrencyLimits {
    globalConcurrencyLimit: number;
    perAddressConcurrencyLimit: number;
}

export type GateScope = 'global' | 'address';

export type GateResult =
    | { admitted: true; lease: SlotLease }
    | { admitted: false; scope: GateScope };

/** Handle the transport holds for an admitted request. */
export interface Lease {
    readonly released: boolean;
    release(): void;
}

/** Lease for requests admitted without a slot (fail-open). */
export class DetachedLease implements Lease {
    private _released = false;

    get released(): boolean {
        return this._released;
    }

    release(): void {
        this._released = true;
    }
}

export class SlotLease implements Lease {
    private _released = false;

    constructor(readonly address: Address, private gate: ConcurrencyGate) { }

    get released(): boolean {
        return this._released;
    }

    /** Safe to call any number of times; only the first call frees the slot. */
    release(): void {
        if (this._released) return;
        this._released = true;
        this.gate.release(this.address);
    }
}

export class ConcurrencyGate {
    private limits: ConcurrencyLimits;
    private perAddress: StateStore<number>;
    private globalActive = 0;

    constructor(limits: ConcurrencyLimits, store: StateStore<number> = new MemoryStateStore()) {
        this.limits = { ...limits };
        this.perAddress = store;
    }

    private tryAcquire(address: Address): GateScope | null {
        if (this.globalActive >= this.limits.globalConcurrencyLimit) return 'global';
        this.globalActive++;

        let refused = false;
        this.perAddress.update(address, (active = 0) => {
            if (active >= this.limits.perAddressConcurrencyLimit) {
                refused = true;
                return active === 0 ? undefined : active;
            }
            return active + 1;
        });

        if (refused) {
            this.globalActive--;
            return 'address';
        }
        return null;
    }

    acquire(address: Address): boolean {
        return this.tryAcquire(address) === null;
    }

    lease(address: Address): GateResult {
        const refusedBy = this.tryAcquire(address);
        if (refusedBy !== null) return { admitted: false, scope: refusedBy };
        return { admitted: true, lease: new SlotLease(address, this) };
    }

    /**
     * Frees one slot held by `address`. Counters at zero are left alone, so
     * a release without a matching acquire changes nothing.
     */
    release(address: Address): void {
        let held = false;
        this.perAddress.update(address, (active) => {
            if (active === undefined) return undefined;
            if (active <= 0) {
                reportCorruption('ConcurrencyGate', `${address} active=${active}`);
                return undefined;
            }
            held = true;
            return active > 1 ? active - 1 : undefined;
        });
        if (!held) return;

        if (this.globalActive > 0) {
            this.globalActive--;
        } else {
            reportCorruption('ConcurrencyGate', `global active=${this.globalActive} while ${address} held a slot`);
            this.globalActive = 0;
        }
    }

    active(address: Address): number {
        return this.perAddress.get(address) ?? 0;
    }

    get globalCount(): number {
        return this.globalActive;
    }

    get trackedAddresses(): number {
        return this.perAddress.size;
    }
}
