/** Status of a registered one-shot timer. */
export type TimerStatus = 'waiting' | 'running' | 'done' | 'error';

/** A handler to run once at a given time. */
export interface OneShotConfig {
    /** Unique identifier (the dispatch job id for delayed starts). */
    id: string;
    runAt: Date;
    description: string;
    handler: () => Promise<void> | void;
}

/** Read-only snapshot of a registered timer. */
export interface TimerSnapshot {
    id: string;
    runAt: string;
    cronExpression: string;
    description: string;
    status: TimerStatus;
    lastError: string | null;
}

/**
 * Event types emitted by the start scheduler.
 * - 'timer:fire'  — fired just before a handler executes.
 * - 'timer:done'  — fired after a handler completes successfully.
 * - 'timer:error' — fired when a handler throws.
 */
export type SchedulerEventType = 'timer:fire' | 'timer:done' | 'timer:error';

export interface SchedulerEvent {
    type: SchedulerEventType;
    timerId: string;
    timestamp: Date;
    error?: string;
}

export type SchedulerEventListener = (event: SchedulerEvent) => void;

/** What the job manager needs from a scheduler for delayed starts. */
export interface StartScheduler {
    scheduleOnce(config: OneShotConfig): void;
    unregister(timerId: string): boolean;
    stopAll(): void;
}
