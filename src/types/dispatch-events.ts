import type { JobStatus } from './dispatch.js';

/**
 * Events emitted while a job executes.
 * - 'job:status'           — status transition (running, paused, completed, ...).
 * - 'recipient:delivered'  — a message was accepted by the provider.
 * - 'recipient:failed'     — rejected or unclassified delivery failure.
 * - 'recipient:skipped'    — unresolvable or blacklisted recipient.
 * - 'delivery:throttled'   — provider cooldown; the same recipient is retried.
 * - 'identity:unavailable' — channel acquisition failed; rotating.
 * - 'identity:switched'    — per-identity cap reached; rotated to the next one.
 * - 'delay'                — a pacing or identity-switch sleep is starting.
 * - 'job:settled'          — an execution returned (emitted by the job manager).
 */
export type DispatchEvent =
    | { type: 'job:status'; jobId: string; status: JobStatus; timestamp: string }
    | { type: 'recipient:delivered'; jobId: string; position: number; recipient: string; identity: string }
    | { type: 'recipient:failed'; jobId: string; position: number; recipient: string; identity: string; reason: string }
    | { type: 'recipient:skipped'; jobId: string; position: number; recipient: string; reason: string }
    | { type: 'delivery:throttled'; jobId: string; position: number; recipient: string; identity: string; waitMs: number }
    | { type: 'identity:unavailable'; jobId: string; identity: string; reason: string }
    | { type: 'identity:switched'; jobId: string; from: string; to: string }
    | { type: 'delay'; jobId: string; reason: 'pacing' | 'identity-switch'; delayMs: number }
    | { type: 'job:settled'; jobId: string; status: JobStatus };

export type DispatchEventType = DispatchEvent['type'];

export type DispatchEventListener = (event: DispatchEvent) => void;
