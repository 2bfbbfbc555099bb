import type { IdentityPool, JobRepository, RecipientSetStore, TemplateStore } from '../types/collaborators.js';
import type {
    AddressableTarget,
    Channel,
    DeliveryOutcome,
    DispatchSettings,
    Identity,
    Job,
    JobStatus,
    PositionedRecipient,
    Template,
} from '../types/dispatch.js';
import type { DispatchEvent, DispatchEventListener } from '../types/dispatch-events.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { randomDelayMs, ResumeGate, sleep as defaultSleep, type Sleeper } from '../utils/timing.js';
import { JobAlreadyRunningError, JobStateError } from './job-errors.js';
import { renderContent } from './template-renderer.js';

export interface DispatchEngineOptions {
    identities: IdentityPool;
    recipients: RecipientSetStore;
    templates: TemplateStore;
    repository: JobRepository;
    settings: DispatchSettings;
    sleep?: Sleeper;
    random?: () => number;
    now?: () => Date;
}

interface OwedDelay {
    reason: 'pacing' | 'identity-switch';
    delayMs: number;
}

/** State owned by one running `execute` call. */
interface ExecutionContext {
    job: Job;
    gate: ResumeGate;
    abort: AbortController;
    identities: Identity[];
    /** Channels this execution holds, by identity handle. */
    channels: Map<string, Channel>;
    sentSinceSwitch: number;
    owedDelay: OwedDelay | null;
}

interface Lease {
    identity: Identity;
    channel: Channel;
}

type RecipientResult = 'sent' | 'skipped' | 'interrupted';

const EXECUTABLE_STATUSES: readonly JobStatus[] = ['pending', 'paused'];

function describe(err: unknown): string {
    return scrubSensitiveText(err instanceof Error ? err.message : String(err));
}

/**
 * Runs jobs: walks the recipient set from the job's cursor, rotating identities,
 * pacing sends and honouring pause / resume / cancel.
 *
 * Progress is checkpointed through the job repository after every recipient
 * whose outcome is final, so a later execution continues from the next one.
 */
export class DispatchEngine {
    readonly #identities: IdentityPool;
    readonly #recipients: RecipientSetStore;
    readonly #templates: TemplateStore;
    readonly #repository: JobRepository;
    readonly #settings: DispatchSettings;
    readonly #sleep: Sleeper;
    readonly #random: () => number;
    readonly #now: () => Date;

    readonly #executions = new Map<string, ExecutionContext>();
    readonly #listeners = new Set<DispatchEventListener>();

    constructor(options: DispatchEngineOptions) {
        this.#identities = options.identities;
        this.#recipients = options.recipients;
        this.#templates = options.templates;
        this.#repository = options.repository;
        this.#settings = options.settings;
        this.#sleep = options.sleep ?? defaultSleep;
        this.#random = options.random ?? Math.random;
        this.#now = options.now ?? (() => new Date());
    }

    /** Subscribe to dispatch events. Returns an unsubscribe function. */
    on(listener: DispatchEventListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    isActive(jobId: string): boolean {
        return this.#executions.has(jobId);
    }

    /**
     * Run the job until its recipients are exhausted, it is cancelled, or it fails.
     * The job object is updated in place and returned.
     */
    async execute(job: Job): Promise<Job> {
        if (this.#executions.has(job.id)) {
            throw new JobAlreadyRunningError(job.id);
        }
        if (!EXECUTABLE_STATUSES.includes(job.status)) {
            throw new JobStateError(job.id, job.status, 'execute', 'DispatchEngine');
        }

        const ctx: ExecutionContext = {
            job,
            gate: new ResumeGate(),
            abort: new AbortController(),
            identities: [],
            channels: new Map(),
            sentSinceSwitch: 0,
            owedDelay: null,
        };
        this.#executions.set(job.id, ctx);

        try {
            const template = this.#templates.get(job.templateId);
            if (!template) {
                return this.#failEarly(ctx, `Template '${job.templateId}' does not exist.`);
            }

            const remaining = this.#recipients.countValid(job.recipientSetId, job.recipientCursor);
            if (remaining === 0) {
                return this.#failEarly(ctx, `Recipient set '${job.recipientSetId}' has no valid recipients left.`);
            }

            ctx.identities = this.#identities.listByHandles(job.identityHandles).filter((identity) => identity.canSend);
            if (ctx.identities.length === 0) {
                return this.#failEarly(ctx, 'None of the job identities can send.');
            }

            if (!job.startedAt) {
                job.startedAt = this.#timestamp();
                job.totalTargets = remaining;
            }
            job.identityCursor %= ctx.identities.length;
            this.#setStatus(ctx, 'running');
            this.#repository.save(job);

            void logThought(
                `[DispatchEngine] Job '${job.id}' running: ${remaining} recipients left, ` +
                `${ctx.identities.length} identities, cursor ${job.recipientCursor}.`,
            );

            await this.#run(ctx, template);

            if (!this.#isCancelled(ctx)) {
                this.#setStatus(ctx, 'completed');
            }
        } catch (err) {
            if (!this.#isCancelled(ctx)) {
                const reason = describe(err);
                job.errorLog.push({ recipient: null, reason, timestamp: this.#timestamp() });
                this.#setStatus(ctx, 'failed');
                console.error(`[DispatchEngine] Job '${job.id}' failed: ${reason}`);
            }
        } finally {
            try {
                await this.#releaseAll(ctx);
                if (job.status === 'completed' || job.status === 'cancelled' || job.status === 'failed') {
                    job.completedAt ??= this.#timestamp();
                }
                this.#saveFinal(job);
            } finally {
                this.#executions.delete(job.id);
            }
        }

        void logThought(
            `[DispatchEngine] Job '${job.id}' ${job.status}: ${job.successCount} delivered, ` +
            `${job.failedCount} failed, ${job.skippedCount} skipped of ${job.totalTargets}.`,
        );
        return job;
    }

    /** Pause a running execution. Returns `false` when the job is not running here. */
    pause(jobId: string): boolean {
        const ctx = this.#executions.get(jobId);
        if (!ctx || ctx.job.status !== 'running') return false;

        ctx.gate.close();
        this.#setStatus(ctx, 'paused');
        this.#repository.save(ctx.job);
        return true;
    }

    /** Resume a paused execution. Returns `false` when the job is not paused here. */
    resume(jobId: string): boolean {
        const ctx = this.#executions.get(jobId);
        if (!ctx || ctx.job.status !== 'paused') return false;

        this.#setStatus(ctx, 'running');
        this.#repository.save(ctx.job);
        ctx.gate.open();
        return true;
    }

    /** Cancel a running or paused execution and interrupt any sleep it is in. */
    cancel(jobId: string): boolean {
        const ctx = this.#executions.get(jobId);
        if (!ctx || (ctx.job.status !== 'running' && ctx.job.status !== 'paused')) return false;

        this.#setStatus(ctx, 'cancelled');
        this.#repository.save(ctx.job);
        ctx.abort.abort();
        ctx.gate.open();
        return true;
    }

    // ── Send loop ─────────────────────────────────────────────────────────────

    async #run(ctx: ExecutionContext, template: Template): Promise<void> {
        const { job } = ctx;
        const signal = ctx.abort.signal;

        for (const recipient of this.#recipients.validTargetsInOrder(job.recipientSetId, job.recipientCursor)) {
            if (signal.aborted) return;

            await this.#applyOwedDelay(ctx);
            if (signal.aborted) return;

            await ctx.gate.wait(signal);
            if (signal.aborted) return;

            const lease = await this.#acquire(ctx);
            if (signal.aborted) return;

            const result = await this.#processRecipient(ctx, lease, recipient, template);
            if (result === 'interrupted') return;

            job.recipientCursor = recipient.position + 1;
            this.#repository.save(job);

            if (result === 'sent') {
                await this.#afterSend(ctx, lease.identity);
            }
        }
    }

    async #applyOwedDelay(ctx: ExecutionContext): Promise<void> {
        const owed = ctx.owedDelay;
        if (!owed) return;

        ctx.owedDelay = null;
        this.#emit({ type: 'delay', jobId: ctx.job.id, reason: owed.reason, delayMs: owed.delayMs });
        await this.#sleep(owed.delayMs, ctx.abort.signal);
    }

    /** Channel for the identity at the cursor, rotating past identities that cannot connect. */
    async #acquire(ctx: ExecutionContext): Promise<Lease> {
        const { job, identities } = ctx;

        for (let attempt = 0; attempt < identities.length; attempt++) {
            const identity = identities[job.identityCursor];
            if (!identity) break;

            const held = ctx.channels.get(identity.handle);
            if (held) return { identity, channel: held };

            try {
                const channel = await this.#identities.acquireChannel(identity);
                ctx.channels.set(identity.handle, channel);
                return { identity, channel };
            } catch (err) {
                const reason = describe(err);
                this.#emit({ type: 'identity:unavailable', jobId: job.id, identity: identity.handle, reason });
                void logThought(`[DispatchEngine] Job '${job.id}': identity '${identity.handle}' unavailable (${reason}).`);

                job.identityCursor = (job.identityCursor + 1) % identities.length;
                ctx.sentSinceSwitch = 0;
            }
        }

        throw new Error(`[DispatchEngine] No identity could open a channel after a full rotation.`);
    }

    async #processRecipient(
        ctx: ExecutionContext,
        lease: Lease,
        recipient: PositionedRecipient,
        template: Template,
    ): Promise<RecipientResult> {
        const { job } = ctx;

        let target: AddressableTarget | null = null;
        let unresolvedReason = 'Could not resolve recipient';
        try {
            target = await lease.channel.resolve(recipient);
        } catch (err) {
            unresolvedReason = describe(err);
        }

        if (!target) {
            this.#skip(ctx, recipient, unresolvedReason);
            return 'skipped';
        }
        this.#recipients.markResolved?.(recipient.setId, recipient.position, target);

        if (this.#recipients.isBlacklisted(recipient.identifier)) {
            this.#skip(ctx, recipient, 'Blacklisted');
            return 'skipped';
        }

        const content = renderContent(
            template,
            { username: target.handle ?? recipient.identifier, user_id: target.id },
            this.#now(),
        );

        for (;;) {
            let outcome: DeliveryOutcome;
            try {
                outcome = await lease.channel.deliver(target, content);
            } catch (err) {
                outcome = { kind: 'failed', reason: describe(err) };
            }

            switch (outcome.kind) {
                case 'throttled':
                    this.#emit({
                        type: 'delivery:throttled',
                        jobId: job.id,
                        position: recipient.position,
                        recipient: recipient.identifier,
                        identity: lease.identity.handle,
                        waitMs: outcome.waitMs,
                    });
                    void logThought(
                        `[DispatchEngine] Job '${job.id}': throttled on '${lease.identity.handle}', waiting ${outcome.waitMs}ms.`,
                    );
                    await this.#sleep(outcome.waitMs, ctx.abort.signal);
                    if (ctx.abort.signal.aborted) return 'interrupted';
                    continue;

                case 'delivered':
                    job.sentCount++;
                    job.successCount++;
                    this.#identities.recordUsage(lease.identity, true);
                    this.#emit({
                        type: 'recipient:delivered',
                        jobId: job.id,
                        position: recipient.position,
                        recipient: recipient.identifier,
                        identity: lease.identity.handle,
                    });
                    return 'sent';

                case 'rejected':
                case 'failed':
                    job.sentCount++;
                    job.failedCount++;
                    job.errorLog.push({ recipient: recipient.identifier, reason: outcome.reason, timestamp: this.#timestamp() });
                    this.#identities.recordUsage(lease.identity, false);
                    this.#emit({
                        type: 'recipient:failed',
                        jobId: job.id,
                        position: recipient.position,
                        recipient: recipient.identifier,
                        identity: lease.identity.handle,
                        reason: outcome.reason,
                    });
                    return 'sent';
            }
        }
    }

    #skip(ctx: ExecutionContext, recipient: PositionedRecipient, reason: string): void {
        ctx.job.skippedCount++;
        this.#recipients.markInvalid(recipient.setId, recipient.identifier, reason);
        this.#emit({
            type: 'recipient:skipped',
            jobId: ctx.job.id,
            position: recipient.position,
            recipient: recipient.identifier,
            reason,
        });
    }

    /** Count a finalized send against the identity and decide what delay is owed before the next one. */
    async #afterSend(ctx: ExecutionContext, identity: Identity): Promise<void> {
        const { job, identities } = ctx;
        ctx.sentSinceSwitch++;

        if (ctx.sentSinceSwitch < this.#settings.messagesPerIdentity) {
            ctx.owedDelay = {
                reason: 'pacing',
                delayMs: randomDelayMs(this.#settings.minDelayMs, this.#settings.maxDelayMs, this.#random),
            };
            return;
        }

        ctx.channels.delete(identity.handle);
        await this.#identities.releaseChannel(identity);

        job.identityCursor = (job.identityCursor + 1) % identities.length;
        ctx.sentSinceSwitch = 0;
        this.#repository.save(job);

        const next = identities[job.identityCursor] ?? identity;
        this.#emit({ type: 'identity:switched', jobId: job.id, from: identity.handle, to: next.handle });
        ctx.owedDelay = { reason: 'identity-switch', delayMs: this.#settings.identitySwitchDelayMs };
    }

    // ── Helpers ───────────────────────────────────────────────────────────────

    #failEarly(ctx: ExecutionContext, reason: string): Job {
        ctx.job.errorLog.push({ recipient: null, reason, timestamp: this.#timestamp() });
        this.#setStatus(ctx, 'failed');
        console.error(`[DispatchEngine] Job '${ctx.job.id}' cannot start: ${reason}`);
        return ctx.job;
    }

    /** A failed terminal save is logged; the in-memory job still carries the final state. */
    #saveFinal(job: Job): void {
        try {
            this.#repository.save(job);
        } catch (err) {
            const reason = describe(err);
            console.error(`[DispatchEngine] Could not persist final state of job '${job.id}': ${reason}`);
            void logThought(`[DispatchEngine] Could not persist final state of job '${job.id}' (${job.status}): ${reason}`);
        }
    }

    async #releaseAll(ctx: ExecutionContext): Promise<void> {
        for (const identity of ctx.identities) {
            if (!ctx.channels.has(identity.handle)) continue;
            ctx.channels.delete(identity.handle);
            try {
                await this.#identities.releaseChannel(identity);
            } catch (err) {
                console.warn(`[DispatchEngine] Releasing channel for '${identity.handle}' failed: ${describe(err)}`);
            }
        }
    }

    #isCancelled(ctx: ExecutionContext): boolean {
        return ctx.abort.signal.aborted;
    }

    #setStatus(ctx: ExecutionContext, status: JobStatus): void {
        ctx.job.status = status;
        this.#emit({ type: 'job:status', jobId: ctx.job.id, status, timestamp: this.#timestamp() });
    }

    #timestamp(): string {
        return this.#now().toISOString();
    }

    #emit(event: DispatchEvent): void {
        for (const listener of this.#listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[DispatchEngine] Event listener threw an error:', listenerErr);
            }
        }
    }
}
