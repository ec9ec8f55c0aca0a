/**
 * Per-address state store.
 *
 * Every mutation of admission state goes through `update`, a synchronous
 * read-modify-write. Admission runs on the event loop, so nothing else can
 * observe the key between the read and the write. A sharded or external
 * store can implement the same interface as long as `update` stays atomic
 * per key.
 */

export interface StateStore<T> {
    get(key: string): T | undefined;
    set(key: string, value: T): void;
    delete(key: string): boolean;
    has(key: string): boolean;
    /**
     * Atomically replace the value for `key` with `fn(current)`.
     * Returning `undefined` deletes the key.
     */
    update(key: string, fn: (current: T | undefined) => T | undefined): T | undefined;
    entries(): IterableIterator<[string, T]>;
    keys(): IterableIterator<string>;
    clear(): void;
    readonly size: number;
}

export class MemoryStateStore<T> implements StateStore<T> {
    private map = new Map<string, T>();

    get(key: string): T | undefined {
        return this.map.get(key);
    }

    set(key: string, value: T): void {
        this.map.set(key, value);
    }

    delete(key: string): boolean {
        return this.map.delete(key);
    }

    has(key: string): boolean {
        return this.map.has(key);
    }

    update(key: string, fn: (current: T | undefined) => T | undefined): T | undefined {
        const next = fn(this.map.get(key));
        if (next === undefined) this.map.delete(key);
        else this.map.set(key, next);
        return next;
    }

    entries(): IterableIterator<[string, T]> {
        return this.map.entries();
    }

    keys(): IterableIterator<string> {
        return this.map.keys();
    }

    clear(): void {
        this.map.clear();
    }

    get size(): number {
        return this.map.size;
    }
}

/** Remove every entry for which `isIdle` holds. */
export function evictWhere<T>(store: StateStore<T>, isIdle: (value: T) => boolean): number {
    const idle: string[] = [];
    for (const [key, value] of store.entries()) {
        if (isIdle(value)) idle.push(key);
    }
    for (const key of idle) store.delete(key);
    return idle.length;
}
