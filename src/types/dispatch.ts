// ── Identities & Routes ──────────────────────────────────────────────────────

/** Lifecycle status reported by identity validation. */
export type IdentityStatus = 'unknown' | 'active' | 'restricted' | 'banned' | 'invalid';

/** An authorized sender credential. Owned by the identity pool. */
export interface Identity {
    /** Unique handle (e.g. the session name the credential is stored under). */
    handle: string;
    displayName?: string;
    /** Public identifier of the sender on the provider, when known. */
    publicId?: string;
    canSend: boolean;
    status: IdentityStatus;
    /** Weak reference to the egress route this identity connects through. */
    routeId?: string;
    sentCount: number;
    errorCount: number;
    lastUsedAt?: string;
}

export type RouteTransport = 'http' | 'socks5';

/** An egress endpoint an identity may be assigned to. */
export interface Route {
    id: string;
    transport: RouteTransport;
    host: string;
    port: number;
    username?: string;
    password?: string;
    isActive: boolean;
    lastTestedAt?: string;
    isWorking: boolean;
}

// ── Recipients ───────────────────────────────────────────────────────────────

export type RecipientKind = 'handle' | 'numeric-id' | 'phone';

export interface Recipient {
    identifier: string;
    kind: RecipientKind;
    resolvedId?: string;
    resolvedHandle?: string;
    isValid: boolean;
    errorReason?: string;
}

/** A recipient together with its stable position inside its recipient set. */
export interface PositionedRecipient extends Recipient {
    setId: string;
    position: number;
}

// ── Templates ────────────────────────────────────────────────────────────────

export type MediaKind = 'photo' | 'document' | 'video';

export interface LinkButton {
    label: string;
    url: string;
}

export interface TextContent {
    mode: 'text';
    text: string;
}

export interface MediaContent {
    mode: 'media';
    mediaKind: MediaKind;
    mediaRef: string;
    caption?: string;
}

export interface ForwardContent {
    mode: 'forward';
    fromChannel: string;
    messageId: number;
}

export type TemplateContent = TextContent | MediaContent | ForwardContent;

export interface Template {
    id: string;
    name: string;
    content: TemplateContent;
    buttons?: LinkButton[];
    createdAt: string;
}

/** Content after placeholder substitution, ready for a channel to deliver. */
export type RenderedContent =
    | { mode: 'text'; text: string; buttons: LinkButton[] }
    | { mode: 'media'; mediaKind: MediaKind; mediaRef: string; caption?: string; buttons: LinkButton[] }
    | { mode: 'forward'; fromChannel: string; messageId: number };

// ── Channels ─────────────────────────────────────────────────────────────────

/** A recipient resolved by a channel into something it can deliver to. */
export interface AddressableTarget {
    id: string;
    handle?: string;
}

/**
 * Classified result of a delivery attempt.
 * - `throttled`: provider-issued cooldown; retry after exactly `waitMs`.
 * - `rejected`:  permanent per-recipient rejection (blocked, privacy, deactivated).
 * - `failed`:    anything the transport could not classify.
 */
export type DeliveryOutcome =
    | { kind: 'delivered'; messageId?: string }
    | { kind: 'throttled'; waitMs: number }
    | { kind: 'rejected'; reason: string }
    | { kind: 'failed'; reason: string };

/** A live connection through which one identity resolves and delivers. */
export interface Channel {
    resolve(recipient: Recipient): Promise<AddressableTarget | null>;
    deliver(target: AddressableTarget, content: RenderedContent): Promise<DeliveryOutcome>;
    close?(): Promise<void>;
}

// ── Jobs ─────────────────────────────────────────────────────────────────────

export type JobStatus = 'pending' | 'running' | 'paused' | 'completed' | 'cancelled' | 'failed';

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['completed', 'cancelled', 'failed'];

export interface JobErrorEntry {
    /** Recipient identifier, or `null` for job-level faults. */
    recipient: string | null;
    reason: string;
    timestamp: string;
}

export interface Job {
    id: string;
    name: string;
    status: JobStatus;
    identityHandles: string[];
    recipientSetId: string;
    templateId: string;

    totalTargets: number;
    sentCount: number;
    successCount: number;
    failedCount: number;
    skippedCount: number;
    /** Position of the next unprocessed recipient in the recipient set. */
    recipientCursor: number;
    /** Index, among the job's identities that may send, of the one currently sending. */
    identityCursor: number;

    createdAt: string;
    startedAt?: string;
    completedAt?: string;
    scheduledAt?: string;

    errorLog: JobErrorEntry[];
}

export interface CreateJobInput {
    name: string;
    templateId: string;
    recipientSetId: string;
    identityHandles: string[];
    scheduledAt?: Date;
}

/** Pacing and rotation limits applied by the dispatch engine. */
export interface DispatchSettings {
    minDelayMs: number;
    maxDelayMs: number;
    identitySwitchDelayMs: number;
    messagesPerIdentity: number;
}
