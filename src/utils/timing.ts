/**
 * Sleep for `ms` milliseconds. Resolves early, without throwing, when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }

        const finish = (): void => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', finish);
            resolve();
        };

        const timer = setTimeout(finish, Math.max(0, ms));
        signal?.addEventListener('abort', finish, { once: true });
    });
}

/** Signature of {@link sleep}; injectable so tests can record delays instead of waiting. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Uniformly random integer delay in `[minMs, maxMs]`. */
export function randomDelayMs(minMs: number, maxMs: number, random: () => number = Math.random): number {
    const min = Math.ceil(Math.min(minMs, maxMs));
    const max = Math.floor(Math.max(minMs, maxMs));
    return Math.floor(random() * (max - min + 1)) + min;
}

/**
 * A latch that callers wait on while it is closed.
 *
 * Opening releases every pending waiter. A waiter also returns when its
 * abort signal fires, so a cancelled job never stays parked on a closed gate.
 */
export class ResumeGate {
    #open = true;
    #waiters: Array<() => void> = [];

    get isOpen(): boolean {
        return this.#open;
    }

    close(): void {
        this.#open = false;
    }

    open(): void {
        this.#open = true;
        const waiters = this.#waiters.splice(0);
        for (const release of waiters) release();
    }

    wait(signal?: AbortSignal): Promise<void> {
        if (this.#open || signal?.aborted) return Promise.resolve();

        return new Promise((resolve) => {
            const release = (): void => {
                this.#waiters = this.#waiters.filter((waiter) => waiter !== release);
                signal?.removeEventListener('abort', release);
                resolve();
            };
            this.#waiters.push(release);
            signal?.addEventListener('abort', release, { once: true });
        });
    }
}
