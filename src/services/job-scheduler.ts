import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type {
    OneShotConfig,
    SchedulerEvent,
    SchedulerEventListener,
    SchedulerEventType,
    StartScheduler,
    TimerSnapshot,
    TimerStatus,
} from '../types/scheduler.js';

/** Internal bookkeeping for a registered timer. */
interface RegisteredTimer {
    config: OneShotConfig;
    cronExpression: string;
    task: ScheduledTask | null;
    status: TimerStatus;
    lastError: string | null;
}

/** Ticks that arrive this long before `runAt` are ignored (the expression repeats yearly). */
const EARLY_TOLERANCE_MS = 1000;

/** Six-field node-cron expression matching the local second, minute, hour, day and month of `date`. */
export function toCronExpression(date: Date): string {
    return `${date.getSeconds()} ${date.getMinutes()} ${date.getHours()} ${date.getDate()} ${date.getMonth() + 1} *`;
}

/**
 * One-shot timers for delayed job starts, on top of `node-cron`.
 *
 * Each timer is a cron task pinned to a single calendar second; it unregisters
 * itself after its handler runs.
 *
 * Usage:
 * ```ts
 * const scheduler = new JobScheduler();
 * scheduler.scheduleOnce({
 *   id: 'job-42',
 *   runAt: new Date(Date.now() + 60_000),
 *   description: 'Delayed start',
 *   handler: async () => { … },
 * });
 * ```
 */
export class JobScheduler implements StartScheduler {
    readonly #timers: Map<string, RegisteredTimer> = new Map();
    readonly #listeners: Map<SchedulerEventType, Set<SchedulerEventListener>> = new Map();
    readonly #now: () => Date;

    constructor(now: () => Date = () => new Date()) {
        this.#now = now;
    }

    /** Register a handler to run once at `runAt`. Throws if the id is taken or the time has passed. */
    scheduleOnce(config: OneShotConfig): void {
        if (this.#timers.has(config.id)) {
            throw new Error(`[JobScheduler] Timer '${config.id}' is already registered.`);
        }
        if (config.runAt.getTime() <= this.#now().getTime()) {
            throw new Error(`[JobScheduler] Timer '${config.id}' is due in the past (${config.runAt.toISOString()}).`);
        }

        const cronExpression = toCronExpression(config.runAt);
        if (!cron.validate(cronExpression)) {
            throw new Error(`[JobScheduler] Invalid cron expression for timer '${config.id}': ${cronExpression}`);
        }

        const entry: RegisteredTimer = {
            config,
            cronExpression,
            task: null,
            status: 'waiting',
            lastError: null,
        };
        entry.task = cron.schedule(cronExpression, async () => {
            await this.#fire(entry);
        });
        this.#timers.set(config.id, entry);
    }

    /** Unregister and stop a timer by ID. */
    unregister(timerId: string): boolean {
        const entry = this.#timers.get(timerId);
        if (!entry) return false;

        entry.task?.stop();
        this.#timers.delete(timerId);
        return true;
    }

    /** Stop every timer. */
    stopAll(): void {
        for (const entry of this.#timers.values()) {
            entry.task?.stop();
            entry.task = null;
        }
        this.#timers.clear();
    }

    /** Return a read-only snapshot of all registered timers. */
    listTimers(): TimerSnapshot[] {
        return [...this.#timers.values()].map((entry) => ({
            id: entry.config.id,
            runAt: entry.config.runAt.toISOString(),
            cronExpression: entry.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastError: entry.lastError,
        }));
    }

    /** Subscribe to scheduler events. Returns an unsubscribe function. */
    on(eventType: SchedulerEventType, listener: SchedulerEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #fire(entry: RegisteredTimer): Promise<void> {
        const { config } = entry;
        if (entry.status !== 'waiting') return;
        if (this.#now().getTime() < config.runAt.getTime() - EARLY_TOLERANCE_MS) return;

        entry.status = 'running';
        entry.task?.stop();
        entry.task = null;
        this.#timers.delete(config.id);

        this.#emit({ type: 'timer:fire', timerId: config.id, timestamp: this.#now() });

        try {
            await logThought(`[JobScheduler] Firing timer '${config.id}' (${config.description}).`);
            await config.handler();
            entry.status = 'done';
            this.#emit({ type: 'timer:done', timerId: config.id, timestamp: this.#now() });
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            entry.status = 'error';
            entry.lastError = message;

            console.error(`[JobScheduler] Timer '${config.id}' failed:`, message);
            await logThought(`[JobScheduler] Timer '${config.id}' failed: ${message}`);

            this.#emit({ type: 'timer:error', timerId: config.id, timestamp: this.#now(), error: message });
        }
    }

    #emit(event: SchedulerEvent): void {
        const listeners = this.#listeners.get(event.type);
        if (!listeners) return;

        for (const listener of listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[JobScheduler] Event listener threw an error:', listenerErr);
            }
        }
    }
}
